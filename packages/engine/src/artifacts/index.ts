export * from './freeze';
export * from './map';
export * from './store';
