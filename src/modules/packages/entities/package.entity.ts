import { Column, Entity, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { decimalTransformer } from '../../../core/database/decimal.transformer';
import { Invoice } from '../../billing/entities/invoice.entity';

@Entity('packages')
export class Package {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ name: 'duration_months', type: 'int' })
  durationMonths!: number;

  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    transformer: decimalTransformer,
  })
  price!: number;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @OneToMany(() => Invoice, (invoice) => invoice.package)
  invoices?: Invoice[];
}
