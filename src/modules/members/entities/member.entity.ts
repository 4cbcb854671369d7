import {
  Column,
  CreateDateColumn,
  Entity,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Invoice } from '../../billing/entities/invoice.entity';
import { WorkoutPlan } from '../../workout-plans/entities/workout-plan.entity';

@Entity('members')
export class Member {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'full_name', type: 'varchar', length: 120 })
  fullName!: string;

  @Column({ type: 'varchar', length: 20 })
  gender!: string;

  /**
   * Date of birth, `YYYY-MM-DD`
   */
  @Column({ type: 'date' })
  dob!: string;

  @Column({ type: 'varchar', length: 20 })
  phone!: string;

  @Column({ type: 'varchar', length: 120, unique: true })
  email!: string;

  @CreateDateColumn({ name: 'registration_date' })
  registrationDate!: Date;

  /**
   * Last day of access, `YYYY-MM-DD`; null until a package is first paid
   */
  @Column({ name: 'active_until', type: 'date', nullable: true })
  activeUntil!: string | null;

  @OneToMany(() => Invoice, (invoice) => invoice.member)
  invoices?: Invoice[];

  @OneToMany(() => WorkoutPlan, (plan) => plan.member)
  workoutPlans?: WorkoutPlan[];
}
