import { ConflictException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, QueryFailedError, Repository } from 'typeorm';
import { MailerService } from '../../core/mail/mailer.service';
import { MembershipExtension } from '../../domain/gym/rules';
import { Member } from './entities/member.entity';
import { MembersService } from './members.service';

describe('MembersService', () => {
  const pkg = { id: 1, name: 'Monthly', durationMonths: 1, price: 30 };
  const dto = {
    fullName: 'Sam Doe',
    gender: 'female',
    dob: '1990-05-04',
    phone: '555-0100',
    email: 'sam@example.com',
    packageId: 1,
  };

  const memberRepository = {
    findOne: jest.fn(),
    find: jest.fn(),
    remove: jest.fn(),
  };
  const manager = {
    findOne: jest.fn(),
    create: jest.fn((_entity: unknown, data: object) => ({ ...data })),
    save: jest.fn(async (value: object) => ({ ...value, id: 12 })),
  };
  const dataSource = {
    transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    ),
  };
  const mailerService = { send: jest.fn() };
  const configService = {
    get: jest.fn((key: string, defaultValue?: string) =>
      key === 'GYM_NAME' ? 'Iron Gym' : defaultValue,
    ),
  };

  const service = new MembersService(
    memberRepository as unknown as Repository<Member>,
    dataSource as unknown as DataSource,
    new MembershipExtension(),
    mailerService as unknown as MailerService,
    configService as unknown as ConfigService,
  );

  beforeEach(() => {
    jest.clearAllMocks();
    jest.useFakeTimers({
      now: new Date('2024-01-31T09:00:00Z'),
      doNotFake: ['nextTick', 'queueMicrotask'],
    });
    memberRepository.findOne.mockResolvedValue(null);
    manager.findOne.mockResolvedValue(pkg);
    mailerService.send.mockResolvedValue(true);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('register', () => {
    it('creates the member with its first invoice and mails it', async () => {
      const result = await service.register(dto);

      expect(dataSource.transaction).toHaveBeenCalledTimes(1);
      expect(manager.save).toHaveBeenNthCalledWith(1, {
        fullName: 'Sam Doe',
        gender: 'female',
        dob: '1990-05-04',
        phone: '555-0100',
        email: 'sam@example.com',
        activeUntil: '2024-02-29',
      });
      expect(manager.save).toHaveBeenNthCalledWith(2, {
        memberId: 12,
        packageId: 1,
        amount: 30,
      });

      expect(result.member.activeUntil).toBe('2024-02-29');
      expect(result.member.isActive).toBe(true);
      expect(result.invoice).toEqual({
        memberId: 12,
        packageId: 1,
        amount: 30,
        id: 12,
      });
      expect(result.emailSent).toBe(true);

      const [mail] = mailerService.send.mock.calls[0];
      expect(mail.to).toBe('sam@example.com');
      expect(mail.subject).toBe('Registration confirmed - Iron Gym');
      expect(mail.text.split('\n')).toEqual([
        'Hello Sam Doe,',
        '',
        'You are now registered at Iron Gym.',
        '',
        '- Package: Monthly',
        '- Price: 30',
        '- Valid until: 2024-02-29',
        '',
        'Thank you for choosing Iron Gym!',
      ]);
    });

    it('keeps the registration when the mail cannot be sent', async () => {
      mailerService.send.mockResolvedValue(false);

      const result = await service.register(dto);

      expect(result.emailSent).toBe(false);
      expect(result.member.id).toBe(12);
    });

    it('refuses an e-mail that is already registered', async () => {
      memberRepository.findOne.mockResolvedValue({ id: 3, email: dto.email });

      await expect(service.register(dto)).rejects.toBeInstanceOf(
        ConflictException,
      );
      expect(dataSource.transaction).not.toHaveBeenCalled();
      expect(mailerService.send).not.toHaveBeenCalled();
    });

    it('answers a lost race on the unique e-mail with a conflict', async () => {
      manager.save.mockRejectedValueOnce(
        new QueryFailedError(
          'INSERT INTO members',
          [],
          Object.assign(new Error('Duplicate entry'), { code: 'ER_DUP_ENTRY' }),
        ),
      );

      await expect(service.register(dto)).rejects.toThrow(
        new ConflictException('This email is already registered'),
      );
      expect(mailerService.send).not.toHaveBeenCalled();
    });

    it('passes other storage failures through', async () => {
      const failure = new Error('connection lost');
      manager.save.mockRejectedValueOnce(failure);

      await expect(service.register(dto)).rejects.toBe(failure);
    });
  });

  describe('list', () => {
    it('marks members whose access ended before today inactive', async () => {
      memberRepository.find.mockResolvedValue([
        { id: 1, activeUntil: '2024-01-31' },
        { id: 2, activeUntil: '2024-01-30' },
        { id: 3, activeUntil: null },
      ]);

      const members = await service.list();

      expect(memberRepository.find).toHaveBeenCalledWith({
        order: { registrationDate: 'DESC' },
      });
      expect(members.map((member) => member.isActive)).toEqual([
        true,
        false,
        false,
      ]);
    });
  });
});
