export * from './value';
export * from './bplist';
export * from './compare';
export * from './inspect';
export * from './shared';
