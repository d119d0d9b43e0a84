import 'reflect-metadata';

export * from './github/errors';
export * from './github/logging';
export { default as configuration } from './config/configuration';
export type { ResilienceConfig, RetryConfig } from './config/configuration';
