import { Command } from 'commander';
import { ConfigError, TaskDefinitionError, UsageError } from '@patchproof/shared';
import { version } from '../package.json';
import { registerReportCommand } from './commands/report';
import { registerRunCommand } from './commands/run';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('patchproof')
    .description('Scores code-change solutions by deploying and exercising them in disposable environments')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerRunCommand(program);
  registerReportCommand(program);
  return program;
}

/**
 * 2 for problems the user can fix in their input, 1 for everything else.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError || error instanceof TaskDefinitionError) {
    return 2;
  }
  return 1;
}
