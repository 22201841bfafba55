import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { SchemaError } from '@exval/shared';
import { parseSchema } from './parser';
import type { ExerciseSchema } from './schema';

/**
 * Reads a YAML or JSON document. JSON is a subset of YAML, so `.json` files
 * go through the same parser.
 */
export function readStructuredFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error: unknown) {
    throw new SchemaError(`Cannot read ${filePath}`, { cause: error });
  }
  try {
    return yaml.load(content, { filename: path.basename(filePath) });
  } catch (error: unknown) {
    if (error instanceof yaml.YAMLException) {
      throw new SchemaError(`Error parsing ${filePath}\n${error.message}`, { cause: error });
    }
    throw error;
  }
}

export function loadSchemaFile(filePath: string): ExerciseSchema {
  return parseSchema(readStructuredFile(filePath));
}
