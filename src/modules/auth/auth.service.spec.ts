import { ForbiddenException, UnauthorizedException } from '@nestjs/common';
import { verifyPassword } from '../../core/auth/password.util';
import { TokenService } from '../../core/auth/token.service';
import { StaffService } from '../staff/staff.service';
import { AuthService } from './auth.service';

jest.mock('../../core/auth/password.util', () => ({
  hashPassword: jest.fn(),
  verifyPassword: jest.fn(),
}));

describe('AuthService', () => {
  const createdAt = new Date('2024-01-02T03:04:05Z');
  const user = {
    id: 2,
    username: 'cashier',
    email: 'cashier@gym.local',
    role: 'cashier',
    isActive: true,
    passwordHash: 'stored-hash',
    createdAt,
  };

  const staffService = {
    findWithPassword: jest.fn(),
    toView: jest.fn(({ passwordHash: _hash, ...view }: typeof user) => view),
  };
  const tokenService = { sign: jest.fn(() => 'signed-token') };
  const service = new AuthService(
    staffService as unknown as StaffService,
    tokenService as unknown as TokenService,
  );
  const mockedVerify = jest.mocked(verifyPassword);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('issues a token for valid credentials', async () => {
    staffService.findWithPassword.mockResolvedValue(user);
    mockedVerify.mockResolvedValue(true);

    const result = await service.login({
      username: 'cashier',
      password: 'cashier-password',
    });

    expect(mockedVerify).toHaveBeenCalledWith(
      'cashier-password',
      'stored-hash',
    );
    expect(tokenService.sign).toHaveBeenCalledWith({
      id: 2,
      username: 'cashier',
      role: 'cashier',
    });
    expect(result).toEqual({
      accessToken: 'signed-token',
      user: {
        id: 2,
        username: 'cashier',
        email: 'cashier@gym.local',
        role: 'cashier',
        isActive: true,
        createdAt,
      },
    });
  });

  it('rejects an unknown username', async () => {
    staffService.findWithPassword.mockResolvedValue(null);

    await expect(
      service.login({ username: 'nobody', password: 'whatever' }),
    ).rejects.toBeInstanceOf(UnauthorizedException);
    expect(mockedVerify).not.toHaveBeenCalled();
  });

  it('rejects a wrong password', async () => {
    staffService.findWithPassword.mockResolvedValue(user);
    mockedVerify.mockResolvedValue(false);

    await expect(
      service.login({ username: 'cashier', password: 'wrong-password' }),
    ).rejects.toBeInstanceOf(UnauthorizedException);
  });

  it('refuses a disabled account even with the right password', async () => {
    staffService.findWithPassword.mockResolvedValue({
      ...user,
      isActive: false,
    });
    mockedVerify.mockResolvedValue(true);

    await expect(
      service.login({ username: 'cashier', password: 'cashier-password' }),
    ).rejects.toBeInstanceOf(ForbiddenException);
    expect(tokenService.sign).not.toHaveBeenCalled();
  });
});
