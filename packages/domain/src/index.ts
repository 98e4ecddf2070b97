// Domain types and schemas
export * from './types.js';

// Copy/loan state machine and due-date logic
export * from './circulation.js';
