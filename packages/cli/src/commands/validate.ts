import path from 'path';
import { Command } from 'commander';
import { DifferentialValidator, ReportRenderer, writeTestSuite } from '@exval/eval';
import {
  createExecutor,
  generateSessionCases,
  globalOptions,
  openSession,
  parseIntegerFlag,
  withInterrupt,
} from '../session';

interface ValidateOptions {
  out?: string;
  seed?: number;
  format?: string;
  zip?: string;
}

export function registerValidateCommand(program: Command) {
  program
    .command('validate')
    .argument('<exercise>', 'Path to the exercise file (YAML or JSON)')
    .option('--out <dir>', 'Also write a test artifact per solution to this directory')
    .option('--seed <n>', 'Seed for random and adversarial cases', parseIntegerFlag)
    .option('--format <format>', 'Test artifact format: vitest or node-test')
    .option('--zip <file>', 'Also bundle the written artifacts into a zip archive')
    .description('Validate every candidate against the reference on generated cases')
    .action(async (exerciseFile: string, options: ValidateOptions) => {
      const session = openSession(exerciseFile, globalOptions(program), {
        generation: { seed: options.seed },
        artifact: { format: options.format },
      });
      const { exercise, config, logger, renderer } = session;

      const cases = await generateSessionCases(session);
      const executor = await createExecutor(session);
      const validator = new DifferentialValidator(exercise.schema, {
        executor,
        logger,
        runId: session.runId,
      });

      const reportRenderer = new ReportRenderer({ verbose: session.verbose });
      if (!renderer.json) {
        reportRenderer.logValidationStarted(exercise.schema.name, cases.length, exercise.candidates.length);
      }
      const report = await withInterrupt((signal) =>
        validator.validate(exercise.reference, exercise.candidates, cases, { signal }),
      );

      if (renderer.json) {
        renderer.document(report);
      } else {
        reportRenderer.logReport(report);
      }

      if (options.out && report.complete) {
        const written = await writeTestSuite(
          path.resolve(options.out),
          exercise.schema,
          cases,
          report.referenceOutcomes,
          [exercise.reference, ...exercise.candidates],
          {
            ...config.artifact,
            logger,
            runId: session.runId,
            archive: options.zip === undefined ? undefined : path.resolve(options.zip),
          },
        );
        renderer.renderArtifacts(written);
        if (options.zip !== undefined) renderer.log(`Bundled into ${path.resolve(options.zip)}`);
      } else if (options.out) {
        renderer.error('Run was cancelled; no test artifacts were written.');
      }

      const allPassed = Object.values(report.summaries).every((s) => s.status === 'pass');
      process.exitCode = allPassed ? 0 : 1;
    });
}
