export * from './logger';
export * from './retry';
export * from './circuit-breaker';
export * from './metrics';
export * from './web-fetch';
