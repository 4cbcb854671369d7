/**
 * Membership & scheduling rule violations.
 *
 * These are recoverable validation outcomes: callers surface them to staff and
 * leave prior state untouched.
 */

export type GymRuleErrorCode =
  | 'INVALID_DURATION'
  | 'ROW_VALIDATION'
  | 'EMPTY_PLAN'
  | 'TOO_MANY_TRAINING_DAYS';

export abstract class GymRuleError extends Error {
  abstract readonly code: GymRuleErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidDurationError extends GymRuleError {
  readonly code = 'INVALID_DURATION';

  constructor(readonly durationMonths: number) {
    super(`Package duration must be at least 1 month, got ${durationMonths}`);
  }
}

export type RowValidationReason =
  | 'missing_field'
  | 'unknown_exercise'
  | 'invalid_sets'
  | 'missing_day';

const ROW_REASON_MESSAGES: Record<RowValidationReason, string> = {
  missing_field:
    'every exercise needs an exercise, sets, reps and a schedule day',
  unknown_exercise: 'exercise not found',
  invalid_sets: 'sets must be a positive whole number',
  missing_day: 'at least one schedule day is required',
};

export class RowValidationError extends GymRuleError {
  readonly code = 'ROW_VALIDATION';

  /**
   * @param row - 1-based position of the row in the submission
   */
  constructor(
    readonly row: number,
    readonly reason: RowValidationReason,
  ) {
    super(`Row ${row}: ${ROW_REASON_MESSAGES[reason]}`);
  }
}

export class EmptyPlanError extends GymRuleError {
  readonly code = 'EMPTY_PLAN';

  constructor() {
    super('A workout plan needs at least one exercise');
  }
}

export class TooManyTrainingDaysError extends GymRuleError {
  readonly code = 'TOO_MANY_TRAINING_DAYS';

  constructor(
    readonly maxTrainingDays: number,
    readonly trainingDays: number,
  ) {
    super(
      `The schedule exceeds the maximum of ${maxTrainingDays} training days ` +
        `per week: ${trainingDays} days selected`,
    );
  }
}
