import {
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { isDuplicateKeyError } from '../../core/database/duplicate-key.util';
import { logger } from '../../core/logger/logger.config';
import { MailerService } from '../../core/mail/mailer.service';
import { MembershipExtension } from '../../domain/gym/rules';
import { todayIsoDate } from '../../domain/gym/utils/calendar.util';
import { Invoice } from '../billing/entities/invoice.entity';
import { Package } from '../packages/entities/package.entity';
import {
  MemberView,
  RegisterMemberDto,
  RegistrationResultDto,
} from './dto/register-member.dto';
import { Member } from './entities/member.entity';
import { buildRegistrationMail } from './registration-mail';

const DUPLICATE_EMAIL_MESSAGE = 'This email is already registered';

@Injectable()
export class MembersService {
  private readonly logger = logger();

  constructor(
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly membershipExtension: MembershipExtension,
    private readonly mailerService: MailerService,
    private readonly configService: ConfigService,
  ) {}

  async list(): Promise<MemberView[]> {
    const today = todayIsoDate();
    const members = await this.memberRepository.find({
      order: { registrationDate: 'DESC' },
    });
    return members.map((member) => this.toView(member, today));
  }

  async findOne(id: number): Promise<Member> {
    const member = await this.memberRepository.findOne({ where: { id } });
    if (!member) {
      throw new NotFoundException(`Member ${id} not found`);
    }
    return member;
  }

  /**
   * Creates the member and the invoice for the first package together, then
   * sends the confirmation mail. A mail failure does not undo the registration.
   */
  async register(dto: RegisterMemberDto): Promise<RegistrationResultDto> {
    const existing = await this.memberRepository.findOne({
      where: { email: dto.email },
    });
    if (existing) {
      throw new ConflictException(DUPLICATE_EMAIL_MESSAGE);
    }

    const today = todayIsoDate();

    // A concurrent registration can still win the unique index
    const { member, invoice, pkg } = await this.createWithInvoice(
      dto,
      today,
    ).catch((error: unknown) => {
      if (isDuplicateKeyError(error)) {
        throw new ConflictException(DUPLICATE_EMAIL_MESSAGE);
      }
      throw error;
    });

    this.logger.info(
      {
        memberId: member.id,
        packageId: pkg.id,
        activeUntil: member.activeUntil,
      },
      'Member registered',
    );

    const gymName = this.configService.get<string>('GYM_NAME', 'Gym Manager');
    const emailSent = await this.mailerService.send(
      buildRegistrationMail(gymName, member, pkg),
    );

    return { member: this.toView(member, today), invoice, emailSent };
  }

  /**
   * Invoices and workout plans go with the member (ON DELETE CASCADE)
   */
  async remove(id: number): Promise<void> {
    const member = await this.findOne(id);
    await this.memberRepository.remove(member);
    this.logger.info({ memberId: id }, 'Member deleted');
  }

  toView(member: Member, today: string = todayIsoDate()): MemberView {
    return {
      id: member.id,
      fullName: member.fullName,
      gender: member.gender,
      dob: member.dob,
      phone: member.phone,
      email: member.email,
      registrationDate: member.registrationDate,
      activeUntil: member.activeUntil,
      isActive: this.membershipExtension.isActive(member.activeUntil, today),
    };
  }

  private createWithInvoice(dto: RegisterMemberDto, today: string) {
    return this.dataSource.transaction(async (manager) => {
      const pkg = await manager.findOne(Package, {
        where: { id: dto.packageId },
      });
      if (!pkg) {
        throw new NotFoundException(`Package ${dto.packageId} not found`);
      }

      const member = await manager.save(
        manager.create(Member, {
          fullName: dto.fullName,
          gender: dto.gender,
          dob: dto.dob,
          phone: dto.phone,
          email: dto.email,
          activeUntil: this.membershipExtension.extend(
            null,
            pkg.durationMonths,
            today,
          ),
        }),
      );

      const invoice = await manager.save(
        manager.create(Invoice, {
          memberId: member.id,
          packageId: pkg.id,
          amount: pkg.price,
        }),
      );

      return { member, invoice, pkg };
    });
  }
}
