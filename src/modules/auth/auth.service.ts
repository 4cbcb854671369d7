import {
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { verifyPassword } from '../../core/auth/password.util';
import { TokenService } from '../../core/auth/token.service';
import { logger } from '../../core/logger/logger.config';
import { StaffService } from '../staff/staff.service';
import { LoginDto, LoginResponseDto } from './dto/login.dto';

@Injectable()
export class AuthService {
  private readonly logger = logger();

  constructor(
    private readonly staffService: StaffService,
    private readonly tokenService: TokenService,
  ) {}

  async login(dto: LoginDto): Promise<LoginResponseDto> {
    const user = await this.staffService.findWithPassword(dto.username);
    if (!user || !(await verifyPassword(dto.password, user.passwordHash))) {
      this.logger.warn(
        { username: dto.username },
        'Login rejected: bad credentials',
      );
      throw new UnauthorizedException('Invalid username or password');
    }

    if (!user.isActive) {
      this.logger.warn(
        { staffId: user.id },
        'Login rejected: account disabled',
      );
      throw new ForbiddenException(
        'This account has been disabled. Contact an administrator.',
      );
    }

    const accessToken = this.tokenService.sign({
      id: user.id,
      username: user.username,
      role: user.role,
    });

    this.logger.info({ staffId: user.id, role: user.role }, 'Staff logged in');
    return { accessToken, user: this.staffService.toView(user) };
  }
}
