import { QueryFailedError } from 'typeorm';
import { isDuplicateKeyError } from './duplicate-key.util';

const driverError = (code: string) =>
  Object.assign(new Error(`${code}: rejected`), { code });

describe('isDuplicateKeyError', () => {
  it('recognizes a unique index violation', () => {
    const error = new QueryFailedError(
      'INSERT INTO members',
      [],
      driverError('ER_DUP_ENTRY'),
    );

    expect(isDuplicateKeyError(error)).toBe(true);
  });

  it('ignores other query failures', () => {
    const error = new QueryFailedError(
      'INSERT INTO workout_plans',
      [],
      driverError('ER_NO_REFERENCED_ROW_2'),
    );

    expect(isDuplicateKeyError(error)).toBe(false);
  });

  it('ignores errors that did not come from a query', () => {
    expect(isDuplicateKeyError(new Error('ER_DUP_ENTRY'))).toBe(false);
  });
});
