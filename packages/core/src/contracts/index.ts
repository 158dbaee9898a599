export * from './artifacts';
export * from './context';
export * from './graph';
export * from './run';
export * from './step';
