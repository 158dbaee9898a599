export * from './artifacts';
export * from './flow';
export * from './folds';
export * from './model-package';
export * from './params';
export * from './pipeline';
