import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import jwt from 'jsonwebtoken';
import { getNumber } from '../config/config.util';
import {
  STAFF_ROLES,
  StaffRole,
} from '../../modules/staff/entities/staff-user.entity';
import { StaffPrincipal } from './auth.types';

const isStaffRole = (value: unknown): value is StaffRole =>
  typeof value === 'string' && STAFF_ROLES.some((role) => role === value);

@Injectable()
export class TokenService {
  private readonly secret: string;
  private readonly expiresInSeconds: number;

  constructor(private readonly configService: ConfigService) {
    this.secret = this.configService.get<string>(
      'JWT_SECRET',
      'dev-secret-key',
    );
    this.expiresInSeconds = getNumber(
      this.configService,
      'JWT_EXPIRES_IN_SECONDS',
      8 * 60 * 60,
    );
  }

  sign(principal: StaffPrincipal): string {
    return jwt.sign(
      {
        sub: String(principal.id),
        username: principal.username,
        role: principal.role,
      },
      this.secret,
      { expiresIn: this.expiresInSeconds },
    );
  }

  verify(token: string): StaffPrincipal {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.secret);
    } catch (error: unknown) {
      throw new UnauthorizedException(
        error instanceof jwt.TokenExpiredError
          ? 'Token expired'
          : 'Invalid token',
      );
    }

    if (typeof payload === 'string') {
      throw new UnauthorizedException('Invalid token');
    }

    const id = Number(payload.sub);
    const { username, role } = payload;
    if (
      !Number.isInteger(id) ||
      typeof username !== 'string' ||
      !isStaffRole(role)
    ) {
      throw new UnauthorizedException('Invalid token');
    }

    return { id, username, role };
  }
}
