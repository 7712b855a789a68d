// Types
export * from './types/transaction';
export * from './types/member';
export * from './types/report';
export * from './types/auth';

// Constants
export * from './constants';

// Utils
export * from './utils/date';
export * from './utils/money';
export * from './utils/logger';
