// Types
export * from './types';

// Errors
export * from './errors';

// Policy records and filtering
export * from './policy';

// Enforcement engine
export * from './engine';

// Matchers
export * from './utils';
