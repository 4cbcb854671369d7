import { QueryFailedError } from 'typeorm';

const DUPLICATE_KEY_CODES = ['ER_DUP_ENTRY'];

/**
 * True for an insert or update rejected by a unique index
 */
export const isDuplicateKeyError = (error: unknown): boolean => {
  if (!(error instanceof QueryFailedError)) return false;

  const { driverError } = error;
  return (
    'code' in driverError &&
    typeof driverError.code === 'string' &&
    DUPLICATE_KEY_CODES.includes(driverError.code)
  );
};
