// Domain layer exports - pure business logic, no external deps

// Shared
export * from './common/pagination.js';

// User domain
export * from './user/types.js';
export * from './user/repository.js';

// Book domain
export * from './book/types.js';
export * from './book/repository.js';

// Lending domain
export * from './lending/types.js';
export * from './lending/repository.js';
export * from './lending/state.js';
