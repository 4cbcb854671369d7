import {
  createParamDecorator,
  ExecutionContext,
  SetMetadata,
  UnauthorizedException,
} from '@nestjs/common';
import { StaffRole } from '../../modules/staff/entities/staff-user.entity';
import { AuthenticatedRequest, StaffPrincipal } from './auth.types';

export const IS_PUBLIC_KEY = 'auth:public';
export const ROLES_KEY = 'auth:roles';

/**
 * Skips authentication for a handler or controller
 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);

/**
 * Restricts a handler or controller to the given roles. Admins pass every
 * role check.
 */
export const Roles = (...roles: StaffRole[]) => SetMetadata(ROLES_KEY, roles);

export const CurrentStaff = createParamDecorator(
  (_data: unknown, context: ExecutionContext): StaffPrincipal => {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.staff) {
      throw new UnauthorizedException('Authentication required');
    }
    return request.staff;
  },
);
