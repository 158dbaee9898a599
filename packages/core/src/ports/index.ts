export * from './dataset';
export * from './logger';
export * from './model';
export * from './registry';
export * from './tracker';
export * from './transformer';
