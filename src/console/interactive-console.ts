import chalk from 'chalk';
import { formatAuditLine } from '../audit/format';
import { DuplicateNameError } from '../errors';
import { ResourceManager } from '../manager/resource-manager';
import { FieldPrompt } from '../resources/types';
import { FieldBag, OperationError, OperationResult, ResourceSummary } from '../types';
import { Choice, MenuAction, Prompter } from './types';

export const MENU_CHOICES: Choice[] = [
  { name: 'Create Resource', value: 'create' },
  { name: 'Start Resource', value: 'start' },
  { name: 'Stop Resource', value: 'stop' },
  { name: 'Delete Resource', value: 'delete' },
  { name: 'View Logs', value: 'logs' },
  { name: 'List Resources', value: 'list' },
  { name: 'Show Details', value: 'details' },
  { name: 'Exit', value: 'exit' }
];

export interface InteractiveConsoleOptions {
  manager: ResourceManager;
  prompter: Prompter;
  output?: (line: string) => void;
  colors?: chalk.Chalk;
  /** Where audit lines for a resource are persisted, if anywhere */
  logPathFor?: (resourceName: string) => string | undefined;
}

type TransitionAction = 'start' | 'stop' | 'delete';

const PAST_TENSE: Record<TransitionAction, string> = {
  start: 'started',
  stop: 'stopped',
  delete: 'marked as deleted'
};

/**
 * Menu-driven front-end over a ResourceManager. Every failure is printed and
 * the loop carries on; only Exit ends it.
 */
export class InteractiveConsole {
  private readonly manager: ResourceManager;
  private readonly prompter: Prompter;
  private readonly output: (line: string) => void;
  private readonly colors: chalk.Chalk;
  private readonly logPathFor: (resourceName: string) => string | undefined;

  constructor(options: InteractiveConsoleOptions) {
    this.manager = options.manager;
    this.prompter = options.prompter;
    this.output = options.output ?? (line => console.log(line));
    this.colors = options.colors ?? chalk;
    this.logPathFor = options.logPathFor ?? (() => undefined);
  }

  async run(): Promise<void> {
    for (;;) {
      const action = await this.prompter.select('What would you like to do?', MENU_CHOICES);
      if (action === 'exit') {
        this.output('Goodbye!');
        return;
      }
      await this.handle(action);
    }
  }

  async handle(action: string): Promise<void> {
    if (!isMenuAction(action)) {
      this.output(this.colors.red('Invalid choice. Please try again.'));
      return;
    }

    switch (action) {
      case 'create':
        return this.createResource();
      case 'start':
      case 'stop':
      case 'delete':
        return this.transitionResource(action);
      case 'logs':
        return this.viewLogs();
      case 'list':
        return this.listResources();
      case 'details':
        return this.showDetails();
      case 'exit':
        return;
    }
  }

  private async createResource(): Promise<void> {
    const definitions = this.manager.typeDefinitions();
    const typeName = await this.prompter.select(
      'Select resource type:',
      definitions.map(definition => ({
        name: `${definition.typeName} - ${definition.description}`,
        value: definition.typeName
      }))
    );
    const definition = definitions.find(candidate => candidate.typeName === typeName);
    if (!definition) {
      this.output(this.colors.red('Invalid selection. Please try again.'));
      return;
    }

    const name = await this.prompter.input('Enter resource name:');
    if (this.manager.get(name).success) {
      this.output(this.colors.red(`Error: ${new DuplicateNameError(name).message}`));
      return;
    }

    const fields: FieldBag = {};
    for (const field of definition.fields) {
      fields[field.key] = await this.ask(field);
    }

    const result = this.manager.create(typeName, name, fields);
    if (!result.success) {
      this.printError(result.error);
      return;
    }
    this.output(this.colors.green(`${result.value.type} '${result.value.name}' created successfully!`));
    this.output(this.colors.gray(result.value.details));
  }

  private async ask(field: FieldPrompt): Promise<unknown> {
    switch (field.kind) {
      case 'choice':
        return this.prompter.select(
          `${field.message}:`,
          (field.choices ?? []).map(choice => ({ name: choice, value: choice }))
        );
      case 'boolean':
        return this.prompter.confirm(field.message);
      case 'secret':
        return this.prompter.secret(`${field.message}:`);
      case 'integer':
      case 'text':
        return this.prompter.input(`${field.message}:`);
    }
  }

  private async transitionResource(action: TransitionAction): Promise<void> {
    const name = await this.prompter.input('Enter resource name:');
    const result = this.apply(action, name);
    if (!result.success) {
      this.printError(result.error);
      return;
    }

    this.output(this.colors.green(`${result.value.type} ${PAST_TENSE[action]} successfully.`));
    const logs = this.manager.viewLogs(name);
    if (logs.success && logs.value.length > 0) {
      this.output(formatAuditLine(logs.value[logs.value.length - 1]));
    }
    const logPath = this.logPathFor(name);
    if (logPath) {
      this.output(this.colors.gray(`(Log written to ${logPath})`));
    }
  }

  private apply(action: TransitionAction, name: string): OperationResult<ResourceSummary> {
    switch (action) {
      case 'start':
        return this.manager.start(name);
      case 'stop':
        return this.manager.stop(name);
      case 'delete':
        return this.manager.delete(name);
    }
  }

  private async viewLogs(): Promise<void> {
    const name = await this.prompter.input('Enter resource name:');
    const result = this.manager.viewLogs(name);
    if (!result.success) {
      this.printError(result.error);
      return;
    }

    if (result.value.length === 0) {
      this.output('No logs found for this resource.');
      return;
    }
    this.output('Displaying latest log entries...');
    for (const entry of result.value) {
      this.output(formatAuditLine(entry));
    }
  }

  private listResources(): void {
    const resources = this.manager.list();
    if (resources.length === 0) {
      this.output('No resources yet.');
      return;
    }
    for (const resource of resources) {
      this.output(`- ${resource.name} (${resource.type}) ${this.colorState(resource)}`);
    }
  }

  private async showDetails(): Promise<void> {
    const name = await this.prompter.input('Enter resource name:');
    const result = this.manager.get(name);
    if (!result.success) {
      this.printError(result.error);
      return;
    }

    const resource = result.value;
    this.output(`Name:    ${resource.name}`);
    this.output(`Type:    ${resource.type}`);
    this.output(`State:   ${this.colorState(resource)}`);
    this.output(`Config:  ${resource.details}`);
    this.output(`Id:      ${resource.id}`);
    this.output(`Created: ${resource.createdAt.toISOString()}`);
  }

  private colorState(resource: ResourceSummary): string {
    switch (resource.state) {
      case 'Running':
        return this.colors.green(resource.state);
      case 'Stopped':
        return this.colors.yellow(resource.state);
      case 'Deleted':
        return this.colors.gray(resource.state);
    }
  }

  private printError(error: OperationError): void {
    this.output(this.colors.red(`Error: ${error.message}`));
    if (error.remediation) {
      this.output(this.colors.yellow(`💡 ${error.remediation}`));
    }
  }
}

function isMenuAction(value: string): value is MenuAction {
  return MENU_CHOICES.some(choice => choice.value === value);
}
