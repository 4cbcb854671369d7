import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { IS_PUBLIC_KEY, ROLES_KEY } from '../../core/auth/auth.decorators';
import {
  AuthenticatedRequest,
  StaffPrincipal,
} from '../../core/auth/auth.types';
import { TokenService } from '../../core/auth/token.service';
import { logger } from '../../core/logger/logger.config';
import { StaffRole } from '../staff/entities/staff-user.entity';
import { StaffService } from '../staff/staff.service';

/**
 * The token only identifies the caller. Account state and role are read from
 * the staff table on every request, so deletions, deactivations and role
 * changes apply immediately.
 */
@Injectable()
export class AuthGuard implements CanActivate {
  private readonly logger = logger();

  constructor(
    private readonly reflector: Reflector,
    private readonly tokenService: TokenService,
    private readonly staffService: StaffService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const targets = [context.getHandler(), context.getClass()];
    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(
      IS_PUBLIC_KEY,
      targets,
    );
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const [scheme, token] = (request.headers.authorization ?? '').split(' ');
    if (scheme !== 'Bearer' || !token) {
      throw new UnauthorizedException('Authorization header required');
    }

    const claims = this.tokenService.verify(token);
    const user = await this.staffService.findById(claims.id);
    if (!user) {
      this.logger.warn({ staffId: claims.id }, 'Token for a deleted account');
      throw new UnauthorizedException('Account no longer exists');
    }
    if (!user.isActive) {
      throw new ForbiddenException('This account has been disabled');
    }

    const staff: StaffPrincipal = {
      id: user.id,
      username: user.username,
      role: user.role,
    };
    request.staff = staff;

    const roles = this.reflector.getAllAndOverride<StaffRole[] | undefined>(
      ROLES_KEY,
      targets,
    );
    if (
      roles &&
      roles.length > 0 &&
      staff.role !== 'admin' &&
      !roles.includes(staff.role)
    ) {
      throw new ForbiddenException('Access denied');
    }

    return true;
  }
}
