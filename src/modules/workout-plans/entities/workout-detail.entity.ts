import {
  Column,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Exercise } from '../../exercises/entities/exercise.entity';
import { WorkoutPlan } from './workout-plan.entity';

@Entity('workout_details')
export class WorkoutDetail {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'plan_id', type: 'int' })
  planId!: number;

  @ManyToOne(() => WorkoutPlan, (plan) => plan.details, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'plan_id' })
  plan?: WorkoutPlan;

  @Column({ name: 'exercise_id', type: 'int' })
  exerciseId!: number;

  @ManyToOne(() => Exercise, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'exercise_id' })
  exercise?: Exercise;

  @Column({ type: 'int' })
  sets!: number;

  @Column({ type: 'varchar', length: 50 })
  reps!: string;

  /**
   * Day token(s) as entered, comma-separated
   */
  @Column({ name: 'schedule_day', type: 'varchar', length: 100 })
  scheduleDay!: string;
}
