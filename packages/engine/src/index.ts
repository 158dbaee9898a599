/**
 * Re-exports the step-graph engine components.
 */
export * from './graph';
export * from './artifacts';
export * from './merge';
export * from './execution/executor';
export * from './execution/context';
export * from './execution/gate';
export * from './execution/slots';
export * from './execution/logger';
