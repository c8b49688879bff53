export * from './types';
export * from './blocked-origins';
export * from './throttle';
export * from './identity';
export * from './cookie-jar';
export * from './fallback';
export * from './resilient-fetcher';
