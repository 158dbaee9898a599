export * from './fake';
export * from './mlflow';
