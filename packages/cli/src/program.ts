import { Command } from 'commander';
import pkg from '../package.json';
import { registerBuildCommand } from './commands/build';
import { registerGenerateCommand } from './commands/generate';
import { registerValidateCommand } from './commands/validate';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('exval')
    .description('Validate candidate solutions of a programming exercise against a reference')
    .version(pkg.version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerValidateCommand(program);
  registerGenerateCommand(program);
  registerBuildCommand(program);
  return program;
}
