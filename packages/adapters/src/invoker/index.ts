export * from './retrying';
