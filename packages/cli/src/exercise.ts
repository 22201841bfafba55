import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  loadSchemaFile,
  parseSchema,
  readStructuredFile,
  type ExerciseSchema,
  type ManualCase,
} from '@exval/core';
import { UsageError, type Candidate } from '@exval/shared';

const CodeSourceSchema = z.union([
  z.object({ path: z.string().min(1) }),
  z.object({ code: z.string() }),
]);

const UnitSchema = z.intersection(
  z.object({ id: z.string().min(1), label: z.string().optional() }),
  CodeSourceSchema,
);

/**
 * Exercise file: the schema (inline or a path to a schema file), the reference
 * solution, the candidates to judge, hand-written cases and generation
 * settings that override the configured ones.
 */
export const ExerciseFileSchema = z.object({
  schema: z.union([z.string().min(1), z.record(z.unknown())]),
  reference: z.intersection(
    z.object({ id: z.string().min(1).default('reference') }),
    CodeSourceSchema,
  ),
  candidates: z.array(UnitSchema).default([]),
  cases: z
    .array(
      z.object({
        input: z.record(z.unknown()),
        expected: z.unknown().optional(),
        label: z.string().optional(),
      }),
    )
    .default([]),
  generation: z.record(z.unknown()).optional(),
});

export type ExerciseFile = z.infer<typeof ExerciseFileSchema>;

export interface Exercise {
  file: string;
  schema: ExerciseSchema;
  reference: Candidate;
  candidates: Candidate[];
  manualCases: ManualCase[];
  /** Generation settings from the exercise file, shaped like the config section */
  generation: Record<string, unknown>;
}

function readCode(source: z.infer<typeof CodeSourceSchema>, baseDir: string, owner: string): string {
  if ('code' in source) return source.code;
  const file = path.resolve(baseDir, source.path);
  try {
    return fs.readFileSync(file, 'utf8');
  } catch (error: unknown) {
    throw new UsageError(`Cannot read code of "${owner}": ${source.path}`, {
      cause: error,
      details: { file },
    });
  }
}

/**
 * Reads an exercise file (YAML or JSON). Relative paths inside it resolve
 * against the file's directory.
 *
 * @throws {UsageError} when the file is missing, does not have the exercise shape or a code file is missing
 * @throws {SchemaError} when the schema is unreadable or invalid
 */
export function loadExercise(filePath: string): Exercise {
  const file = path.resolve(filePath);
  const baseDir = path.dirname(file);
  if (!fs.existsSync(file)) {
    throw new UsageError(`Exercise file not found: ${filePath}`);
  }
  const parsed = ExerciseFileSchema.safeParse(readStructuredFile(file));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
    throw new UsageError(
      `Invalid exercise file ${filePath}:\n${issues.map((i) => `- ${i.path}: ${i.message}`).join('\n')}`,
      { details: { issues } },
    );
  }
  const exercise = parsed.data;

  const schema =
    typeof exercise.schema === 'string'
      ? loadSchemaFile(path.resolve(baseDir, exercise.schema))
      : parseSchema(exercise.schema);

  const reference: Candidate = {
    id: exercise.reference.id,
    code: readCode(exercise.reference, baseDir, exercise.reference.id),
  };
  const candidates = exercise.candidates.map((unit): Candidate => ({
    id: unit.id,
    code: readCode(unit, baseDir, unit.id),
    ...(unit.label !== undefined ? { label: unit.label } : {}),
  }));

  return {
    file,
    schema,
    reference,
    candidates,
    manualCases: exercise.cases,
    generation: exercise.generation ?? {},
  };
}
