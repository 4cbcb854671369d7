import { Invoice } from '../modules/billing/entities/invoice.entity';
import { Exercise } from '../modules/exercises/entities/exercise.entity';
import { Member } from '../modules/members/entities/member.entity';
import { Package } from '../modules/packages/entities/package.entity';
import {
  SystemSetting,
} from '../modules/settings/entities/system-setting.entity';
import { StaffUser } from '../modules/staff/entities/staff-user.entity';
import {
  WorkoutDetail,
} from '../modules/workout-plans/entities/workout-detail.entity';
import {
  WorkoutPlan,
} from '../modules/workout-plans/entities/workout-plan.entity';

/**
 * Every entity reachable through a relation of a seeded entity. With
 * `autoLoadEntities` only these are known to TypeORM, so the graph must be
 * closed.
 */
export const SEED_ENTITIES = [
  StaffUser,
  Package,
  Exercise,
  SystemSetting,
  Member,
  Invoice,
  WorkoutPlan,
  WorkoutDetail,
];
