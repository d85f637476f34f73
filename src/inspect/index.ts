export * from './sniff';
export * from './flatten';
export * from './fingerprint';
export * from './plist';
export * from './detection';
