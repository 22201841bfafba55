import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ensureDir } from 'fs-extra';
import type { ExerciseSchema, TestCase } from '@exval/core';
import {
  NoopLogger,
  atomicWrite,
  encodeValue,
  eventMeta,
  slugify,
  type ArtifactConfig,
  type ArtifactWritten,
  type Candidate,
  type ExecutionOutcome,
  type Logger,
} from '@exval/shared';
import { judgeReference } from '../verdict';
import { writeBundle } from './bundle';

export type ArtifactFormat = ArtifactConfig['format'];

/** Reference outcome per case id, as recorded by a validation run */
export type ReferenceBehaviour = Readonly<Record<string, ExecutionOutcome>>;

export const DEFAULT_SOLUTION_PATH = './solution.cjs';
export const DEFAULT_SOLUTION_ENV = 'EXVAL_SOLUTION';

const RUNTIME_SOURCE = readFileSync(
  fileURLToPath(new URL('./templates/runtime.js', import.meta.url)),
  'utf8',
);

export interface ArtifactOptions {
  format?: ArtifactFormat;
  /** Environment variable that overrides the solution path at run time */
  solutionEnv?: string;
  /** Solution module, relative to the test file */
  solutionPath?: string;
  /** Base name of the test file; defaults to the exercise name */
  name?: string;
}

/**
 * A generated, self-contained test module.
 */
export interface TestArtifact {
  fileName: string;
  format: ArtifactFormat;
  content: string;
  caseCount: number;
  skippedCount: number;
}

interface EmbeddedCase {
  id: string;
  label: string;
  args: unknown[];
  expected?: unknown;
  skip?: string;
}

function embedCase(
  schema: ExerciseSchema,
  testCase: TestCase,
  outcome: ExecutionOutcome | undefined,
): EmbeddedCase {
  const base = { id: testCase.id, label: testCase.label, args: schema.argsFor(testCase.input) };
  if (!outcome) {
    return { ...base, skip: 'no reference output was recorded' };
  }
  const judgement = judgeReference(schema, testCase, outcome);
  if (!judgement.trusted) {
    return { ...base, skip: `reference ${judgement.reason}: ${judgement.detail}` };
  }
  return { ...base, expected: judgement.value };
}

const json = (value: unknown): string => JSON.stringify(value);

function header(format: ArtifactFormat): string[] {
  const imports = [
    "import fs from 'node:fs';",
    "import path from 'node:path';",
    "import vm from 'node:vm';",
    "import { createRequire } from 'node:module';",
    "import { fileURLToPath } from 'node:url';",
  ];
  if (format === 'vitest') {
    imports.push("import { describe, it, expect } from 'vitest';");
  } else {
    imports.push("import { describe, it } from 'node:test';", "import assert from 'node:assert/strict';");
  }
  return imports;
}

function suite(format: ArtifactFormat, title: string): string[] {
  const assertion =
    format === 'vitest'
      ? '    expect(result.equivalent, `${result.path}: ${result.reason}`).toBe(true);'
      : '    assert.ok(result.equivalent, `${result.path}: ${result.reason}`);';
  const skipped =
    format === 'vitest'
      ? '    it.skip(`${title} (${testCase.skip})`, () => {});'
      : '    it(title, { skip: testCase.skip }, () => {});';

  return [
    'let solution;',
    'function entry() {',
    '  solution ??= loadSolution(SOLUTION, ENTRY);',
    '  return solution;',
    '}',
    '',
    `describe(${json(title)}, () => {`,
    '  for (const testCase of CASES) {',
    '    const title = `${testCase.id}: ${testCase.label}`;',
    '    if (testCase.skip) {',
    `  ${skipped}`,
    '      continue;',
    '    }',
    '    it(title, async () => {',
    '      const actual = await entry()(...testCase.args);',
    '      const result = compareOutputs(testCase.expected, actual, OUTPUT, EQUIVALENCE, DEFINITIONS);',
    `  ${assertion}`,
    '    });',
    '  }',
    '});',
  ];
}

/**
 * Serializes cases and the reference outputs into a standalone test module.
 * Each case becomes one test that runs the solution and compares its output
 * with the recorded reference output under the schema's equivalence relation.
 * Cases without a trustworthy reference output are emitted as skipped tests.
 *
 * Pure: nothing is executed or written.
 */
export function buildTestArtifact(
  schema: ExerciseSchema,
  cases: readonly TestCase[],
  referenceBehaviour: ReferenceBehaviour,
  options: ArtifactOptions = {},
): TestArtifact {
  const format = options.format ?? 'vitest';
  const solutionEnv = options.solutionEnv ?? DEFAULT_SOLUTION_ENV;
  const solutionPath = options.solutionPath ?? DEFAULT_SOLUTION_PATH;
  const embedded = cases.map((testCase) => embedCase(schema, testCase, referenceBehaviour[testCase.id]));
  const skippedCount = embedded.filter((c) => c.skip !== undefined).length;
  const runner = format === 'vitest' ? 'vitest run' : 'node --test';

  const lines = [
    `// Generated by exval for exercise ${json(schema.name)}: ${embedded.length} cases.`,
    `// Run with \`${runner}\`; set ${solutionEnv} to test another solution module.`,
    '',
    ...header(format),
    '',
    'const HERE = path.dirname(fileURLToPath(import.meta.url));',
    `const SOLUTION = process.env[${json(solutionEnv)}]`,
    `  ? path.resolve(process.env[${json(solutionEnv)}])`,
    `  : path.resolve(HERE, ${json(solutionPath)});`,
    `const ENTRY = ${json(schema.entry)};`,
    '',
    `const OUTPUT = ${json(schema.output)};`,
    `const DEFINITIONS = ${json(schema.definitions)};`,
    `const EQUIVALENCE = ${json(schema.equivalence)};`,
    `const CASES = decodeValue(${JSON.stringify(encodeValue(embedded), null, 2)});`,
    '',
    RUNTIME_SOURCE.trimEnd(),
    '',
    ...suite(format, schema.name),
    '',
  ];

  const baseName = slugify(options.name ?? schema.name) || 'exercise';
  return {
    fileName: `${baseName}.test.mjs`,
    format,
    content: lines.join('\n'),
    caseCount: embedded.length,
    skippedCount,
  };
}

export interface WriteSuiteOptions extends ArtifactOptions {
  logger?: Logger;
  runId?: string;
  /** Also pack every written file into a zip archive at this path */
  archive?: string;
}

export interface WrittenArtifact {
  candidateId: string;
  testFile: string;
  solutionFile: string;
  /** Cases emitted as skipped tests */
  skippedCount: number;
}

/**
 * Writes, for every code unit, its module as `<slug>.cjs` and a test artifact
 * `<slug>.test.mjs` that targets it. With `options.archive` the files are
 * also bundled into one zip, flat, under their own names.
 */
export async function writeTestSuite(
  dir: string,
  schema: ExerciseSchema,
  cases: readonly TestCase[],
  referenceBehaviour: ReferenceBehaviour,
  units: readonly Candidate[],
  options: WriteSuiteOptions = {},
): Promise<WrittenArtifact[]> {
  const logger = options.logger ?? new NoopLogger();
  const used = new Set<string>();
  const written: WrittenArtifact[] = [];
  await ensureDir(dir);

  for (const unit of units) {
    const base = slugify(unit.id) || 'solution';
    let slug = base;
    for (let n = 2; used.has(slug); n++) slug = `${base}_${n}`;
    used.add(slug);

    const artifact = buildTestArtifact(schema, cases, referenceBehaviour, {
      ...options,
      name: slug,
      solutionPath: `./${slug}.cjs`,
    });
    const solutionFile = path.join(dir, `${slug}.cjs`);
    const testFile = path.join(dir, artifact.fileName);
    await atomicWrite(solutionFile, unit.code);
    await atomicWrite(testFile, artifact.content);

    const event: ArtifactWritten = {
      ...eventMeta(options.runId ?? 'artifact'),
      type: 'ArtifactWritten',
      payload: { path: testFile, format: artifact.format, caseCount: artifact.caseCount },
    };
    await logger.log(event);
    written.push({ candidateId: unit.id, testFile, solutionFile, skippedCount: artifact.skippedCount });
  }

  if (options.archive !== undefined) {
    await writeBundle(
      options.archive,
      written.flatMap(({ solutionFile, testFile }) => [
        { file: solutionFile, name: path.basename(solutionFile) },
        { file: testFile, name: path.basename(testFile) },
      ]),
    );
  }

  return written;
}
