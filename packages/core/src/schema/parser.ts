import { SchemaError, type SchemaIssue } from '@exval/shared';
import {
  RawSchemaDescriptionSchema,
  type RawField,
  type RawTypeSpec,
} from './raw';
import {
  DEFAULT_EQUIVALENCE,
  type Parameter,
  type RecordField,
  type SchemaDescription,
  type TypeSpec,
} from './types';
import { DEFAULT_KEY_ALPHABET, DEFAULT_KEY_MAX_LENGTH } from './domain';
import { ExerciseSchema } from './schema';

const DEFAULT_ENTRY = 'solve';

/**
 * Number of distinct keys a mapping can draw from, capped at `cap`.
 */
export function keySpaceSize(alphabetSize: number, maxLength: number, cap: number): number {
  let total = 0;
  let layer = 1;
  for (let length = 1; length <= maxLength; length++) {
    layer *= alphabetSize;
    total += layer;
    if (total >= cap) return cap;
  }
  return total;
}

class SchemaNormalizer {
  readonly issues: SchemaIssue[] = [];

  constructor(private readonly definitionNames: ReadonlySet<string>) {}

  normalize(raw: RawTypeSpec, path: string): TypeSpec {
    const nullable = raw.nullable ?? false;
    const description = raw.description;
    switch (raw.type) {
      case 'integer': {
        this.checkInteger(raw.min, `${path}.min`);
        this.checkInteger(raw.max, `${path}.max`);
        this.checkBounds(raw.min, raw.max, path, 'min', 'max');
        if (raw.enum) {
          this.checkEnum(raw.enum, path, (value, at) => {
            if (!Number.isSafeInteger(value)) return `${at}: ${value} is not a safe integer`;
            return this.rangeViolation(value, raw.min, raw.max, at);
          });
        }
        return { type: 'integer', nullable, description, min: raw.min, max: raw.max, enum: raw.enum };
      }
      case 'float': {
        const allowNonFinite = raw.allowNonFinite ?? false;
        this.checkFinite(raw.min, `${path}.min`);
        this.checkFinite(raw.max, `${path}.max`);
        this.checkBounds(raw.min, raw.max, path, 'min', 'max');
        if (raw.enum) {
          this.checkEnum(raw.enum, path, (value, at) => {
            if (!Number.isFinite(value)) {
              return allowNonFinite ? undefined : `${at}: ${value} is not finite`;
            }
            return this.rangeViolation(value, raw.min, raw.max, at);
          });
        }
        return {
          type: 'float',
          nullable,
          description,
          min: raw.min,
          max: raw.max,
          enum: raw.enum,
          allowNonFinite,
        };
      }
      case 'boolean':
        return { type: 'boolean', nullable, description };
      case 'string': {
        const minLength = raw.minLength ?? 0;
        this.checkLength(minLength, `${path}.minLength`);
        this.checkLength(raw.maxLength, `${path}.maxLength`);
        this.checkBounds(minLength, raw.maxLength, path, 'minLength', 'maxLength');
        if (raw.alphabet !== undefined && raw.alphabet.length === 0) {
          this.issue(`${path}.alphabet`, 'alphabet must not be empty');
        }
        if (raw.enum) {
          this.checkEnum(raw.enum, path, (value, at) => {
            const length = [...value].length;
            if (length < minLength || (raw.maxLength !== undefined && length > raw.maxLength)) {
              return `${at}: "${value}" violates the length bounds`;
            }
            if (raw.alphabet && [...value].some((ch) => !raw.alphabet?.includes(ch))) {
              return `${at}: "${value}" uses characters outside the alphabet`;
            }
            return undefined;
          });
        }
        return {
          type: 'string',
          nullable,
          description,
          minLength,
          maxLength: raw.maxLength,
          alphabet: raw.alphabet,
          enum: raw.enum,
        };
      }
      case 'sequence': {
        const minLength = raw.minLength ?? 0;
        this.checkLength(minLength, `${path}.minLength`);
        this.checkLength(raw.maxLength, `${path}.maxLength`);
        this.checkBounds(minLength, raw.maxLength, path, 'minLength', 'maxLength');
        return {
          type: 'sequence',
          nullable,
          description,
          items: this.normalize(raw.items, `${path}.items`),
          minLength,
          maxLength: raw.maxLength,
          unordered: raw.unordered ?? false,
        };
      }
      case 'mapping': {
        const minSize = raw.minSize ?? 0;
        this.checkLength(minSize, `${path}.minSize`);
        this.checkLength(raw.maxSize, `${path}.maxSize`);
        this.checkBounds(minSize, raw.maxSize, path, 'minSize', 'maxSize');
        if (raw.keyAlphabet !== undefined && raw.keyAlphabet.length === 0) {
          this.issue(`${path}.keyAlphabet`, 'keyAlphabet must not be empty');
        }
        const keyMaxLength = raw.keyMaxLength ?? DEFAULT_KEY_MAX_LENGTH;
        if (!Number.isInteger(keyMaxLength) || keyMaxLength < 1) {
          this.issue(`${path}.keyMaxLength`, 'keyMaxLength must be a positive integer');
        } else {
          const alphabetSize = new Set(raw.keyAlphabet ?? DEFAULT_KEY_ALPHABET).size;
          const available = keySpaceSize(alphabetSize, keyMaxLength, minSize);
          if (alphabetSize > 0 && available < minSize) {
            this.issue(`${path}.minSize`, `only ${available} distinct keys exist`);
          }
        }
        return {
          type: 'mapping',
          nullable,
          description,
          values: this.normalize(raw.values, `${path}.values`),
          minSize,
          maxSize: raw.maxSize,
          keyAlphabet: raw.keyAlphabet,
          keyMaxLength: raw.keyMaxLength,
        };
      }
      case 'record': {
        const fields = this.normalizeFields(raw.fields, `${path}.fields`, true);
        return {
          type: 'record',
          nullable,
          description,
          fields: fields.map(({ name, type, optional }) => ({ name, type, optional })),
          match: raw.match ?? 'exact',
        };
      }
      case 'ref':
        if (!this.definitionNames.has(raw.ref)) {
          this.issue(`${path}.ref`, `unknown definition "${raw.ref}"`);
        }
        return { type: 'ref', nullable, description, ref: raw.ref };
    }
  }

  normalizeFields(raw: readonly RawField[], path: string, allowOptional: boolean): RecordField[] {
    const seen = new Set<string>();
    return raw.map((field, index) => {
      const at = `${path}.${index}`;
      if (seen.has(field.name)) {
        this.issue(`${at}.name`, `duplicate name "${field.name}"`);
      }
      seen.add(field.name);
      if (field.optional && !allowOptional) {
        this.issue(`${at}.optional`, 'parameters cannot be optional');
      }
      return {
        name: field.name,
        type: this.normalize(field, at),
        optional: allowOptional ? (field.optional ?? false) : false,
      };
    });
  }

  issue(path: string, message: string): void {
    this.issues.push({ path, message });
  }

  private checkInteger(value: number | undefined, path: string): void {
    if (value !== undefined && !Number.isSafeInteger(value)) {
      this.issue(path, `${value} is not a safe integer`);
    }
  }

  private checkFinite(value: number | undefined, path: string): void {
    if (value !== undefined && !Number.isFinite(value)) {
      this.issue(path, `${value} is not finite`);
    }
  }

  private checkLength(value: number | undefined, path: string): void {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      this.issue(path, 'must be a non-negative integer');
    }
  }

  private checkBounds(
    lower: number | undefined,
    upper: number | undefined,
    path: string,
    lowerName: string,
    upperName: string,
  ): void {
    if (lower !== undefined && upper !== undefined && lower > upper) {
      this.issue(`${path}.${lowerName}`, `${lowerName} (${lower}) must be <= ${upperName} (${upper})`);
    }
  }

  private checkEnum<T>(
    members: readonly T[],
    path: string,
    violation: (value: T, at: string) => string | undefined,
  ): void {
    if (members.length === 0) {
      this.issue(`${path}.enum`, 'enumeration must not be empty');
      return;
    }
    members.forEach((value, index) => {
      const message = violation(value, `${path}.enum.${index}`);
      if (message) {
        const [at, ...rest] = message.split(': ');
        this.issue(at, rest.join(': '));
      }
    });
  }

  private rangeViolation(
    value: number,
    min: number | undefined,
    max: number | undefined,
    at: string,
  ): string | undefined {
    if ((min !== undefined && value < min) || (max !== undefined && value > max)) {
      return `${at}: ${value} lies outside [${min ?? '-inf'}, ${max ?? 'inf'}]`;
    }
    return undefined;
  }
}

function formatZodPath(path: readonly (string | number)[]): string {
  return path.length > 0 ? path.join('.') : '(root)';
}

/**
 * Parses and checks a raw schema description.
 *
 * @throws {SchemaError} listing every structural or consistency issue found
 */
export function parseSchema(raw: unknown): ExerciseSchema {
  const parsed = RawSchemaDescriptionSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: formatZodPath(issue.path),
      message: issue.message,
    }));
    throw new SchemaError(
      `Invalid schema description:\n${issues.map((i) => `- ${i.path}: ${i.message}`).join('\n')}`,
      { issues },
    );
  }

  const description = parsed.data;
  const rawDefinitions = description.definitions ?? {};
  const normalizer = new SchemaNormalizer(new Set(Object.keys(rawDefinitions)));

  const definitions: Record<string, TypeSpec> = {};
  for (const [name, spec] of Object.entries(rawDefinitions)) {
    definitions[name] = normalizer.normalize(spec, `definitions.${name}`);
  }

  const parameters: Parameter[] = normalizer
    .normalizeFields(description.parameters, 'parameters', false)
    .map((field, index) => {
      const rawDescription = description.parameters[index]?.description;
      return rawDescription === undefined
        ? { name: field.name, type: field.type }
        : { name: field.name, type: field.type, description: rawDescription };
    });
  const output = normalizer.normalize(description.output, 'output');

  for (const name of Object.keys(definitions)) {
    const chain = [name];
    let current = definitions[name];
    while (current?.type === 'ref' && !chain.includes(current.ref)) {
      chain.push(current.ref);
      current = definitions[current.ref];
    }
    if (current?.type === 'ref') {
      normalizer.issue(`definitions.${name}`, `definition only refers to itself (${[...chain, current.ref].join(' -> ')})`);
    }
  }

  if (normalizer.issues.length > 0) {
    const issues = normalizer.issues;
    throw new SchemaError(
      `Inconsistent schema "${description.name}":\n${issues.map((i) => `- ${i.path}: ${i.message}`).join('\n')}`,
      { issues },
    );
  }

  const normalized: SchemaDescription = {
    name: description.name,
    entry: description.entry ?? DEFAULT_ENTRY,
    description: description.description,
    parameters,
    output,
    definitions,
    equivalence: {
      absoluteEpsilon:
        description.equivalence?.absoluteEpsilon ?? DEFAULT_EQUIVALENCE.absoluteEpsilon,
      relativeEpsilon:
        description.equivalence?.relativeEpsilon ?? DEFAULT_EQUIVALENCE.relativeEpsilon,
    },
  };
  return new ExerciseSchema(normalized);
}
