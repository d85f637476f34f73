export * from './value';
export * from './epoch';
export * from './path';
export * from './to-js';
