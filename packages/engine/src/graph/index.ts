export * from './flow';
export * from './step';
export * from './validate';
