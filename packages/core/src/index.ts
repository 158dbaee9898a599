export * from './contracts';
export * from './ports';
export * from './errors';
export * from './config/types';
export * from './config/defaults';
export * from './utils/branch';
export * from './utils/issues';
