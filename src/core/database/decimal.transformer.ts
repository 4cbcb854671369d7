import { ValueTransformer } from 'typeorm';
import { toAmount } from '../../domain/gym/utils/money.util';

/**
 * DECIMAL columns come back from mysql2 as strings; expose them as numbers.
 */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null ? null : toAmount(value),
};
