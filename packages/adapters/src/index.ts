export * from './logger';
export * from './tracker';
export * from './registry';
export * from './dataset';
export * from './transformer';
export * from './model';
export * from './invoker';
