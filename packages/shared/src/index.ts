export * from './types';
export * from './errors';
export * from './schemas';
export * from './catalog/groups';
export * from './algorithms/random';
export * from './algorithms/ordering';
export * from './algorithms/eligibility';
export * from './algorithms/groupSizes';
export * from './algorithms/balancedAssignment';
export * from './algorithms/validation';
export * from './algorithms/draw';
