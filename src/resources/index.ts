export * from './types';
export * from './resource';
export * from './naming';
export * from './app-service';
export * from './storage-account';
export * from './cache-db';
export * from './registry';
