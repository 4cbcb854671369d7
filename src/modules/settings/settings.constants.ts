export const MAX_TRAINING_DAYS_KEY = 'max_training_days';
export const MAX_TRAINING_DAYS_DESCRIPTION =
  'Maximum training days per week for workout plans';
export const MIN_TRAINING_DAYS_LIMIT = 1;
export const MAX_TRAINING_DAYS_LIMIT = 7;
