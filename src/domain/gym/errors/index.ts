export * from './gym-rule.errors';
