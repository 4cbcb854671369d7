/**
 * Amounts are stored as DECIMAL(12,2). mysql2 hands decimals back as strings,
 * so every amount entering arithmetic passes through here.
 */

export type Amount = number | string;

export const MINOR_UNITS_PER_MAJOR = 100;

export const toMinorUnits = (amount: Amount): number => {
  const value = typeof amount === 'string' ? Number.parseFloat(amount) : amount;
  if (!Number.isFinite(value)) {
    throw new RangeError(`Invalid amount: ${amount}`);
  }
  return Math.round(value * MINOR_UNITS_PER_MAJOR);
};

export const fromMinorUnits = (minor: number): number =>
  minor / MINOR_UNITS_PER_MAJOR;

export const toAmount = (amount: Amount): number =>
  fromMinorUnits(toMinorUnits(amount));
