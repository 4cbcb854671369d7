/**
 * Workout plan submission models
 *
 * A trainer submits one row per exercise. Values arrive from a form, so every
 * field may be missing or loosely typed until the plan validator has seen it.
 */

import {
  EmptyPlanError,
  RowValidationError,
  TooManyTrainingDaysError,
} from '../errors';

export const DEFAULT_MAX_TRAINING_DAYS = 6;

/**
 * Raw row as submitted
 */
export interface PlanRowInput {
  exerciseId?: number | string | null;
  sets?: number | string | null;
  reps?: string | null;
  /**
   * One day token or several separated by commas, e.g. "Mon, Wed"
   */
  scheduleDay?: string | null;
}

/**
 * Row that passed validation, ready to be persisted as a workout detail
 */
export interface ValidatedPlanRow {
  exerciseId: number;
  sets: number;
  reps: string;
  scheduleDay: string;
  /**
   * Normalized (trimmed, lowercased) day tokens of this row
   */
  days: string[];
}

export interface PlanValidationContext {
  knownExerciseIds: ReadonlySet<number>;
  maxTrainingDays: number;
}

export interface PlanValidationResult {
  accepted: boolean;
  rows: ValidatedPlanRow[];
  rowErrors: RowValidationError[];
  dayCountError: TooManyTrainingDaysError | null;
  emptyPlanError: EmptyPlanError | null;
  /**
   * Distinct training days across valid rows, in first-seen order
   */
  trainingDays: string[];
}
