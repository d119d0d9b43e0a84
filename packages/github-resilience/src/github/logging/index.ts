export * from './github-logger.service';
export * from './sensitive-data.filter';
