export * from './membership-extension';
export * from './plan-schedule-validator';
export * from './revenue-aggregator';
