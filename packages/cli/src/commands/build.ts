import path from 'path';
import { Command } from 'commander';
import { DifferentialValidator, writeTestSuite } from '@exval/eval';
import {
  createExecutor,
  generateSessionCases,
  globalOptions,
  openSession,
  parseIntegerFlag,
  withInterrupt,
} from '../session';

interface BuildOptions {
  out: string;
  seed?: number;
  format?: string;
  zip?: string;
}

export function registerBuildCommand(program: Command) {
  program
    .command('build')
    .argument('<exercise>', 'Path to the exercise file (YAML or JSON)')
    .requiredOption('--out <dir>', 'Directory for the reference solution and its test file')
    .option('--seed <n>', 'Seed for random and adversarial cases', parseIntegerFlag)
    .option('--format <format>', 'Test artifact format: vitest or node-test')
    .option('--zip <file>', 'Also bundle the written artifacts into a zip archive')
    .description('Run the reference on generated cases and write a standalone test file')
    .action(async (exerciseFile: string, options: BuildOptions) => {
      const session = openSession(exerciseFile, globalOptions(program), {
        generation: { seed: options.seed },
        artifact: { format: options.format },
      });
      const { exercise, config, logger, renderer } = session;

      const cases = await generateSessionCases(session);
      const executor = await createExecutor(session);
      renderer.log(`Running reference "${exercise.reference.id}" on ${cases.length} cases`);

      // no candidates: the run only records reference behaviour
      const validator = new DifferentialValidator(exercise.schema, {
        executor,
        logger,
        runId: session.runId,
      });
      const report = await withInterrupt((signal) =>
        validator.validate(exercise.reference, [], cases, { signal }),
      );
      if (!report.complete) {
        renderer.error('Run was cancelled; no test artifacts were written.');
        process.exitCode = 1;
        return;
      }

      const written = await writeTestSuite(
        path.resolve(options.out),
        exercise.schema,
        cases,
        report.referenceOutcomes,
        [exercise.reference],
        {
          ...config.artifact,
          logger,
          runId: session.runId,
          archive: options.zip === undefined ? undefined : path.resolve(options.zip),
        },
      );
      if (renderer.json) {
        renderer.document({ runId: session.runId, caseCount: cases.length, artifacts: written });
      } else {
        renderer.renderArtifacts(written);
        if (options.zip !== undefined) renderer.log(`Bundled into ${path.resolve(options.zip)}`);
      }
    });
}
