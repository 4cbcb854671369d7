import { Injectable } from '@nestjs/common';
import {
  EmptyPlanError,
  GymRuleError,
  RowValidationError,
  TooManyTrainingDaysError,
} from '../errors';
import {
  PlanRowInput,
  PlanValidationContext,
  PlanValidationResult,
  ValidatedPlanRow,
} from '../models';

type RowOutcome =
  | { valid: true; row: ValidatedPlanRow }
  | { valid: false; error: RowValidationError };

@Injectable()
export class PlanScheduleValidator {
  /**
   * Evaluates a whole submission. Row errors accumulate instead of stopping
   * the run; invalid rows contribute no training days. The plan is accepted
   * only when there is no violation of any kind.
   */
  validate(
    rows: readonly PlanRowInput[],
    context: PlanValidationContext,
  ): PlanValidationResult {
    const validRows: ValidatedPlanRow[] = [];
    const rowErrors: RowValidationError[] = [];
    const trainingDays = new Set<string>();

    rows.forEach((input, index) => {
      const outcome = this.validateRow(
        input,
        index + 1,
        context.knownExerciseIds,
      );
      if (!outcome.valid) {
        rowErrors.push(outcome.error);
        return;
      }

      outcome.row.days.forEach((day) => trainingDays.add(day));
      validRows.push(outcome.row);
    });

    const dayCountError =
      trainingDays.size > context.maxTrainingDays
        ? new TooManyTrainingDaysError(
            context.maxTrainingDays,
            trainingDays.size,
          )
        : null;
    const emptyPlanError = validRows.length === 0 ? new EmptyPlanError() : null;

    return {
      accepted: rowErrors.length === 0 && !dayCountError && !emptyPlanError,
      rows: validRows,
      rowErrors,
      dayCountError,
      emptyPlanError,
      trainingDays: [...trainingDays],
    };
  }

  /**
   * Every violation of a result, in report order
   */
  violations(result: PlanValidationResult): GymRuleError[] {
    const errors: GymRuleError[] = [...result.rowErrors];
    if (result.dayCountError) errors.push(result.dayCountError);
    if (result.emptyPlanError) errors.push(result.emptyPlanError);
    return errors;
  }

  /**
   * Splits a schedule field into normalized day tokens, dropping blanks
   */
  normalizeDays(scheduleDay: string): string[] {
    return scheduleDay
      .split(',')
      .map((token) => token.trim().toLowerCase())
      .filter((token) => token.length > 0);
  }

  private validateRow(
    input: PlanRowInput,
    row: number,
    knownExerciseIds: ReadonlySet<number>,
  ): RowOutcome {
    const reps = typeof input.reps === 'string' ? input.reps.trim() : '';
    const scheduleDay =
      typeof input.scheduleDay === 'string' ? input.scheduleDay.trim() : '';

    if (
      this.isBlank(input.exerciseId) ||
      this.isBlank(input.sets) ||
      !reps ||
      !scheduleDay
    ) {
      return {
        valid: false,
        error: new RowValidationError(row, 'missing_field'),
      };
    }

    const exerciseId = this.parsePositiveInteger(input.exerciseId);
    if (exerciseId === null || !knownExerciseIds.has(exerciseId)) {
      return {
        valid: false,
        error: new RowValidationError(row, 'unknown_exercise'),
      };
    }

    const sets = this.parsePositiveInteger(input.sets);
    if (sets === null) {
      return {
        valid: false,
        error: new RowValidationError(row, 'invalid_sets'),
      };
    }

    const days = [...new Set(this.normalizeDays(scheduleDay))];
    if (days.length === 0) {
      return {
        valid: false,
        error: new RowValidationError(row, 'missing_day'),
      };
    }

    return {
      valid: true,
      row: { exerciseId, sets, reps, scheduleDay, days },
    };
  }

  private isBlank(value: number | string | null | undefined): boolean {
    if (value === null || value === undefined) return true;
    return typeof value === 'string' && value.trim() === '';
  }

  private parsePositiveInteger(
    value: number | string | null | undefined,
  ): number | null {
    if (typeof value === 'number') {
      return Number.isInteger(value) && value > 0 ? value : null;
    }
    if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) {
      return null;
    }
    const parsed = Number.parseInt(value.trim(), 10);
    return parsed > 0 ? parsed : null;
  }
}
