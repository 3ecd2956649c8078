#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { stringify as stringifyYaml } from 'yaml';
import { createConsoleRuntime } from './bootstrap';
import { loadConsoleConfig } from './config/loader';
import { createDefaultConfig } from './config/validator';
import { ConsoleConfig } from './config/types';
import { InquirerPrompter } from './console/inquirer-prompter';
import { InteractiveConsole } from './console/interactive-console';
import { createDefaultRegistry } from './resources/registry';
import { initializeLogger } from './logger';

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8'));
  if (manifest && typeof manifest === 'object' && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

async function prepare(options: GlobalOptions): Promise<ConsoleConfig> {
  const spinner = ora('Loading configuration...').start();
  try {
    const config = await loadConsoleConfig(options.config);
    initializeLogger(options.verbose ? 'debug' : config.logging.level);
    spinner.succeed('Configuration loaded');
    return config;
  } catch (error) {
    spinner.fail('Configuration could not be loaded');
    throw error;
  }
}

function fail(error: unknown, verbose?: boolean): never {
  console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
  if (verbose) {
    console.error(error);
  }
  process.exit(1);
}

const program = new Command();

program
  .name('resource-console')
  .description('Create, start, stop and delete cloud-like resources from an interactive console')
  .version(readVersion())
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-v, --verbose', 'Enable verbose logging');

program
  .command('interactive', { isDefault: true })
  .description('Open the interactive resource console')
  .action(async () => {
    const options = program.opts<GlobalOptions>();
    try {
      const config = await prepare(options);
      const runtime = createConsoleRuntime(config);
      const menu = new InteractiveConsole({
        manager: runtime.manager,
        prompter: new InquirerPrompter(),
        logPathFor: runtime.logPathFor
      });
      await menu.run();
    } catch (error) {
      fail(error, options.verbose);
    }
  });

program
  .command('types')
  .description('List registered resource types and their fields')
  .action(async () => {
    const options = program.opts<GlobalOptions>();
    try {
      const config = await prepare(options);
      const registry = createDefaultRegistry({
        evictionPolicies: config.resources.cache_db.eviction_policies
      });
      for (const definition of registry.getAllDefinitions()) {
        console.log(chalk.blue(`\n${definition.typeName}`), chalk.gray(definition.description));
        for (const field of definition.fields) {
          const choices = field.choices ? ` (${field.choices.join(' / ')})` : '';
          console.log(`  ${field.key}: ${field.kind}${choices}`);
        }
      }
    } catch (error) {
      fail(error, options.verbose);
    }
  });

program
  .command('init')
  .description('Write a default configuration file')
  .option('-o, --output <path>', 'Output configuration file path', 'resource-console.yml')
  .option('-f, --force', 'Overwrite an existing file')
  .action((commandOptions: { output: string; force?: boolean }) => {
    const spinner = ora('Writing configuration...').start();
    try {
      if (existsSync(commandOptions.output) && !commandOptions.force) {
        throw new Error(`${commandOptions.output} already exists (use --force to overwrite)`);
      }

      const header = `# Resource console configuration\n# Generated on ${new Date().toISOString()}\n\n`;
      writeFileSync(commandOptions.output, header + stringifyYaml(createDefaultConfig()));

      spinner.succeed(`Configuration file created: ${commandOptions.output}`);
      console.log(`Run: ${chalk.cyan('resource-console interactive')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      fail(error, program.opts<GlobalOptions>().verbose);
    }
  });

program.parseAsync().catch((error: unknown) => fail(error));
