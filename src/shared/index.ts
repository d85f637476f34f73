export * from './logger';
export * from './limits';
