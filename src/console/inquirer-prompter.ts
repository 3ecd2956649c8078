import inquirer from 'inquirer';
import { Choice, Prompter } from './types';

interface Answer<T> {
  answer: T;
}

export class InquirerPrompter implements Prompter {
  async select(message: string, choices: Choice[]): Promise<string> {
    const { answer } = await inquirer.prompt<Answer<string>>([
      { type: 'list', name: 'answer', message, choices }
    ]);
    return answer;
  }

  async input(message: string): Promise<string> {
    const { answer } = await inquirer.prompt<Answer<string>>([
      { type: 'input', name: 'answer', message }
    ]);
    return answer.trim();
  }

  async secret(message: string): Promise<string> {
    const { answer } = await inquirer.prompt<Answer<string>>([
      { type: 'password', name: 'answer', message, mask: '*' }
    ]);
    return answer;
  }

  async confirm(message: string): Promise<boolean> {
    const { answer } = await inquirer.prompt<Answer<boolean>>([
      { type: 'confirm', name: 'answer', message, default: true }
    ]);
    return answer;
  }
}
