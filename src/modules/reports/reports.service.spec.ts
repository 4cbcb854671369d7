import { MoreThanOrEqual, Repository } from 'typeorm';
import { BillingService } from '../billing/billing.service';
import { Invoice } from '../billing/entities/invoice.entity';
import { ExercisesService } from '../exercises/exercises.service';
import { Member } from '../members/entities/member.entity';
import { PackagesService } from '../packages/packages.service';
import { StaffService } from '../staff/staff.service';
import { ReportsService } from './reports.service';

describe('ReportsService', () => {
  const memberRepository = { count: jest.fn() };
  const invoiceRepository = { find: jest.fn() };
  const billingService = { getRevenue: jest.fn() };
  const staffService = { count: jest.fn() };
  const packagesService = { count: jest.fn() };
  const exercisesService = { count: jest.fn() };

  const service = new ReportsService(
    memberRepository as unknown as Repository<Member>,
    invoiceRepository as unknown as Repository<Invoice>,
    billingService as unknown as BillingService,
    staffService as unknown as StaffService,
    packagesService as unknown as PackagesService,
    exercisesService as unknown as ExercisesService,
  );

  beforeEach(() => {
    jest.clearAllMocks();
    jest.useFakeTimers({
      now: new Date('2024-05-10T12:00:00Z'),
      doNotFake: ['nextTick', 'queueMicrotask'],
    });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('counts staff, packages and exercises', async () => {
    staffService.count.mockResolvedValue(4);
    packagesService.count.mockResolvedValue(3);
    exercisesService.count.mockResolvedValue(12);

    await expect(service.getOverview()).resolves.toEqual({
      staffUsers: 4,
      packages: 3,
      exercises: 12,
    });
  });

  it('defaults revenue to the current year', async () => {
    billingService.getRevenue.mockResolvedValue({ year: 2024 });

    await service.getRevenue();
    await service.getRevenue(2022);

    expect(billingService.getRevenue).toHaveBeenNthCalledWith(1, 2024);
    expect(billingService.getRevenue).toHaveBeenNthCalledWith(2, 2022);
  });

  it('counts members active through today', async () => {
    memberRepository.count.mockResolvedValue(17);

    await expect(service.getActiveMembers()).resolves.toEqual({ count: 17 });
    expect(memberRepository.count).toHaveBeenCalledWith({
      where: { activeUntil: MoreThanOrEqual('2024-05-10') },
    });
  });

  it('groups active members by their latest invoice package', async () => {
    invoiceRepository.find.mockResolvedValue([
      { id: 9, memberId: 1, packageId: 3, package: { name: 'Half-Year' } },
      { id: 8, memberId: 2, packageId: 1, package: { name: 'Monthly' } },
      { id: 7, memberId: 1, packageId: 1, package: { name: 'Monthly' } },
      { id: 6, memberId: 3, packageId: 3, package: { name: 'Half-Year' } },
    ]);

    await expect(service.getMembersPerPackage()).resolves.toEqual({
      labels: ['Half-Year', 'Monthly'],
      data: [2, 1],
    });
    expect(invoiceRepository.find).toHaveBeenCalledWith({
      where: { member: { activeUntil: MoreThanOrEqual('2024-05-10') } },
      relations: { package: true },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  });
});
