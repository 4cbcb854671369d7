import {
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { logger } from '../../core/logger/logger.config';
import { Invoice } from '../billing/entities/invoice.entity';
import { PackageDto } from './dto/package.dto';
import { Package } from './entities/package.entity';

@Injectable()
export class PackagesService {
  private readonly logger = logger();

  constructor(
    @InjectRepository(Package)
    private readonly packageRepository: Repository<Package>,
    @InjectRepository(Invoice)
    private readonly invoiceRepository: Repository<Invoice>,
  ) {}

  list(): Promise<Package[]> {
    return this.packageRepository.find({
      order: { durationMonths: 'ASC', name: 'ASC' },
    });
  }

  async findOne(id: number): Promise<Package> {
    const pkg = await this.packageRepository.findOne({ where: { id } });
    if (!pkg) {
      throw new NotFoundException(`Package ${id} not found`);
    }
    return pkg;
  }

  async create(dto: PackageDto): Promise<Package> {
    const pkg = await this.packageRepository.save(
      this.packageRepository.create({
        name: dto.name,
        durationMonths: dto.durationMonths,
        price: dto.price,
        description: dto.description ?? null,
      }),
    );
    this.logger.info({ packageId: pkg.id, name: pkg.name }, 'Package created');
    return pkg;
  }

  async update(id: number, dto: PackageDto): Promise<Package> {
    const pkg = await this.findOne(id);
    pkg.name = dto.name;
    pkg.durationMonths = dto.durationMonths;
    pkg.price = dto.price;
    pkg.description = dto.description ?? null;

    const saved = await this.packageRepository.save(pkg);
    this.logger.info({ packageId: id }, 'Package updated');
    return saved;
  }

  /**
   * Packages that were already sold stay, so invoices keep their reference
   */
  async remove(id: number): Promise<void> {
    const pkg = await this.findOne(id);
    const invoiceCount = await this.invoiceRepository.count({
      where: { packageId: id },
    });
    if (invoiceCount > 0) {
      throw new ConflictException(
        'Cannot delete a package that already has invoices',
      );
    }

    await this.packageRepository.remove(pkg);
    this.logger.info({ packageId: id, name: pkg.name }, 'Package deleted');
  }

  count(): Promise<number> {
    return this.packageRepository.count();
  }
}
