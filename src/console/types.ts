// Console-specific types

export interface Choice {
  name: string;
  value: string;
}

/**
 * Source of user answers. The interactive console only talks to this, so a
 * scripted implementation can drive it in tests.
 */
export interface Prompter {
  select(message: string, choices: Choice[]): Promise<string>;
  input(message: string): Promise<string>;
  secret(message: string): Promise<string>;
  confirm(message: string): Promise<boolean>;
}

export type MenuAction = 'create' | 'start' | 'stop' | 'delete' | 'logs' | 'list' | 'details' | 'exit';
