/**
 * Barrel export for gym domain models
 */

export * from './revenue.model';
export * from './workout-plan.model';
