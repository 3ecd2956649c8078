export * from './types';
export * from './inquirer-prompter';
export * from './interactive-console';
