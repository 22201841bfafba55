/**
 * Normalized type specs of an exercise schema. These are plain, JSON-serializable
 * objects so they can be embedded verbatim in generated test artifacts.
 */

interface BaseSpec {
  /** `null` is a member of the domain */
  nullable: boolean;
  description?: string;
}

export interface IntegerSpec extends BaseSpec {
  type: 'integer';
  min?: number;
  max?: number;
  enum?: readonly number[];
}

export interface FloatSpec extends BaseSpec {
  type: 'float';
  min?: number;
  max?: number;
  enum?: readonly number[];
  /** NaN and +/-Infinity are members of the domain */
  allowNonFinite: boolean;
}

export interface BooleanSpec extends BaseSpec {
  type: 'boolean';
}

export interface StringSpec extends BaseSpec {
  type: 'string';
  minLength: number;
  maxLength?: number;
  /** Every character must come from this set */
  alphabet?: string;
  enum?: readonly string[];
}

export interface SequenceSpec extends BaseSpec {
  type: 'sequence';
  items: TypeSpec;
  minLength: number;
  maxLength?: number;
  /** Outputs are compared as multisets */
  unordered: boolean;
}

export interface MappingSpec extends BaseSpec {
  type: 'mapping';
  values: TypeSpec;
  minSize: number;
  maxSize?: number;
  keyAlphabet?: string;
  keyMaxLength?: number;
}

export interface RecordField {
  name: string;
  type: TypeSpec;
  optional: boolean;
}

/**
 * `exact`: outputs must carry exactly the expected fields.
 * `subset`: outputs may carry extra fields; only the expected ones are compared.
 */
export type RecordMatch = 'exact' | 'subset';

export interface RecordSpec extends BaseSpec {
  type: 'record';
  fields: readonly RecordField[];
  match: RecordMatch;
}

export interface RefSpec extends BaseSpec {
  type: 'ref';
  ref: string;
}

export type TypeSpec =
  | IntegerSpec
  | FloatSpec
  | BooleanSpec
  | StringSpec
  | SequenceSpec
  | MappingSpec
  | RecordSpec
  | RefSpec;

export type TypeName = TypeSpec['type'];

export type Definitions = Readonly<Record<string, TypeSpec>>;

export interface Parameter {
  name: string;
  type: TypeSpec;
  description?: string;
}

export interface EquivalenceOptions {
  absoluteEpsilon: number;
  relativeEpsilon: number;
}

export const DEFAULT_EQUIVALENCE: EquivalenceOptions = Object.freeze({
  absoluteEpsilon: 1e-9,
  relativeEpsilon: 1e-9,
});

/**
 * The normalized, serializable form of a parsed schema.
 */
export interface SchemaDescription {
  name: string;
  entry: string;
  description?: string;
  parameters: readonly Parameter[];
  output: TypeSpec;
  definitions: Definitions;
  equivalence: EquivalenceOptions;
}
