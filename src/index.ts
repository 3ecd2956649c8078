// Main entry point for the resource console
export * from './types';
export * from './errors';
export * from './logger';
export * from './config';
export * from './resources';
export * from './manager';
export * from './audit';
export * from './console';

export { createConsoleRuntime, ConsoleRuntime } from './bootstrap';
