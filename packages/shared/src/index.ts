export * from './envConfig';
export * from './logger';
