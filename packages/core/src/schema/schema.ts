import { SchemaError, deepFreeze, type SchemaIssue } from '@exval/shared';
import { checkValue, isPlainObject } from './conformance';
import {
  DEFAULT_MAX_DEPTH,
  DomainContext,
  assertProducible,
  sampleValues,
} from './domain';
import type {
  Definitions,
  EquivalenceOptions,
  Parameter,
  SchemaDescription,
  TypeSpec,
} from './types';

/**
 * A parsed, immutable exercise schema. Build one with `parseSchema`.
 */
export class ExerciseSchema {
  readonly name: string;
  /** Name of the function every code unit must export */
  readonly entry: string;
  readonly description?: string;
  readonly parameters: readonly Parameter[];
  readonly output: TypeSpec;
  readonly definitions: Definitions;
  readonly equivalence: EquivalenceOptions;

  constructor(description: SchemaDescription) {
    const frozen = deepFreeze(structuredClone(description));
    this.name = frozen.name;
    this.entry = frozen.entry;
    this.description = frozen.description;
    this.parameters = frozen.parameters;
    this.output = frozen.output;
    this.definitions = frozen.definitions;
    this.equivalence = frozen.equivalence;
    Object.freeze(this);
  }

  /** Does `value` conform to the output shape? */
  validate(value: unknown): boolean {
    return this.check(value).length === 0;
  }

  /** Conformance issues of `value` against `spec` (the output shape by default) */
  check(value: unknown, spec: TypeSpec = this.output): SchemaIssue[] {
    return checkValue(spec, value, this.definitions);
  }

  validateInput(input: unknown): boolean {
    return this.checkInput(input).length === 0;
  }

  /**
   * Issues of an input record: exactly the declared parameters, each conforming.
   */
  checkInput(input: unknown): SchemaIssue[] {
    if (!isPlainObject(input)) {
      return [{ path: '$', message: 'input must be a record keyed by parameter name' }];
    }
    const issues: SchemaIssue[] = [];
    const declared = new Set(this.parameters.map((p) => p.name));
    for (const param of this.parameters) {
      if (!Object.prototype.hasOwnProperty.call(input, param.name)) {
        issues.push({ path: `$.${param.name}`, message: 'missing parameter' });
        continue;
      }
      issues.push(...checkValue(param.type, input[param.name], this.definitions, `$.${param.name}`));
    }
    for (const key of Object.keys(input)) {
      if (!declared.has(key)) issues.push({ path: `$.${key}`, message: 'unknown parameter' });
    }
    return issues;
  }

  parameter(name: string): Parameter {
    const param = this.parameters.find((p) => p.name === name);
    if (!param) {
      throw new SchemaError(`Schema "${this.name}" has no parameter "${name}"`, {
        details: { parameter: name, known: this.parameters.map((p) => p.name) },
      });
    }
    return param;
  }

  /** Positional arguments for the entry function, in parameter order */
  argsFor(input: Readonly<Record<string, unknown>>): unknown[] {
    return this.parameters.map((p) => input[p.name]);
  }

  domainContext(maxDepth: number = DEFAULT_MAX_DEPTH): DomainContext {
    return new DomainContext(this.definitions, maxDepth);
  }

  /**
   * Lazy sequence of valid values for one parameter. Finite for enumerations
   * and booleans; otherwise endless and restartable from `seed`.
   *
   * @throws {SchemaError} when the parameter is unknown
   * @throws {GenerationError} when its domain is empty
   */
  sampleDomain(name: string, seed = 0, maxDepth: number = DEFAULT_MAX_DEPTH): Iterable<unknown> {
    const param = this.parameter(name);
    const ctx = this.domainContext(maxDepth);
    assertProducible(param.type, ctx, maxDepth, `parameter "${name}"`);
    return {
      [Symbol.iterator]: () => sampleValues(param.type, seed, ctx),
    };
  }

  toJSON(): SchemaDescription {
    return {
      name: this.name,
      entry: this.entry,
      description: this.description,
      parameters: this.parameters,
      output: this.output,
      definitions: this.definitions,
      equivalence: this.equivalence,
    };
  }
}
