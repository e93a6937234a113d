export * from './db';
export * from './ai';
export * from './logger';
export * from './config';
