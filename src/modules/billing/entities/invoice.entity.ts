import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { decimalTransformer } from '../../../core/database/decimal.transformer';
import { Member } from '../../members/entities/member.entity';
import { Package } from '../../packages/entities/package.entity';

/**
 * One payment event. Written once, never updated; removed only with its member.
 */
@Entity('invoices')
export class Invoice {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'member_id', type: 'int' })
  memberId!: number;

  @ManyToOne(() => Member, (member) => member.invoices, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'member_id' })
  member?: Member;

  @Column({ name: 'package_id', type: 'int' })
  packageId!: number;

  @ManyToOne(() => Package, (pkg) => pkg.invoices, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'package_id' })
  package?: Package;

  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    transformer: decimalTransformer,
  })
  amount!: number;

  @Index()
  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
