import { Command } from 'commander';
import { generateSessionCases, globalOptions, openSession, parseIntegerFlag } from '../session';

export function registerGenerateCommand(program: Command) {
  program
    .command('generate')
    .argument('<exercise>', 'Path to the exercise file (YAML or JSON)')
    .option('--seed <n>', 'Seed for random and adversarial cases', parseIntegerFlag)
    .description('Print the cases that validation would run')
    .action(async (exerciseFile: string, options: { seed?: number }) => {
      const session = openSession(exerciseFile, globalOptions(program), {
        generation: { seed: options.seed },
      });
      const cases = await generateSessionCases(session);
      session.renderer.renderCases(session.exercise.schema.name, cases);
    });
}
