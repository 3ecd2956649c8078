export * from './types';
export * from './format';
export * from './file-audit-sink';
export * from './memory-audit-sink';
