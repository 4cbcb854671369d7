import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Member } from '../../members/entities/member.entity';
import { StaffUser } from '../../staff/entities/staff-user.entity';
import { WorkoutDetail } from './workout-detail.entity';

@Entity('workout_plans')
export class WorkoutPlan {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'member_id', type: 'int' })
  memberId!: number;

  @ManyToOne(() => Member, (member) => member.workoutPlans, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'member_id' })
  member?: Member;

  @Column({ name: 'trainer_id', type: 'int' })
  trainerId!: number;

  @ManyToOne(() => StaffUser, (user) => user.workoutPlans, {
    onDelete: 'RESTRICT',
  })
  @JoinColumn({ name: 'trainer_id' })
  trainer?: StaffUser;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @OneToMany(() => WorkoutDetail, (detail) => detail.plan)
  details?: WorkoutDetail[];
}
