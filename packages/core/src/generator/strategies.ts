import { formatValue, type GenerationConfig } from '@exval/shared';
import { Prng } from '../random';
import {
  DEFAULT_ALPHABET,
  DomainContext,
  baselineValue,
  boundaryValues,
  deepValue,
  drawValue,
  numericRange,
  usesDefinitions,
} from '../schema/domain';
import type { ExerciseSchema } from '../schema/schema';
import type { TypeSpec } from '../schema/types';
import type { CaseProposal } from './types';

const UNBOUNDED_EXTRA = 8;
const NON_ASCII = 'äñß日本語🙂';
const WHITESPACE = ' \t\n ';
const TINY = 1e-12;

export interface StrategyContext {
  schema: ExerciseSchema;
  domain: DomainContext;
  config: GenerationConfig;
}

function baselineInput(ctx: StrategyContext): Record<string, unknown> {
  const input: Record<string, unknown> = {};
  for (const param of ctx.schema.parameters) {
    input[param.name] = baselineValue(param.type, ctx.domain);
  }
  return input;
}

/**
 * One case per boundary value of each parameter, every other parameter held
 * at its baseline.
 */
export function boundaryCases(ctx: StrategyContext): CaseProposal[] {
  const base = baselineInput(ctx);
  const cases: CaseProposal[] = [];
  for (const param of ctx.schema.parameters) {
    const values = boundaryValues(param.type, ctx.domain, {
      includeOutOfDomain: ctx.config.includeOutOfDomain,
    });
    for (const { value, classification } of values) {
      cases.push({
        input: { ...base, [param.name]: value },
        provenance: 'boundary',
        classification,
        label: `${param.name}=${formatValue(value, 40)}${classification === 'out-of-domain' ? ' (out of domain)' : ''}`,
      });
    }
  }
  return cases;
}

/**
 * Seeded draws. Each parameter has its own stream so the draws for one
 * parameter do not depend on the others.
 */
export function randomCases(ctx: StrategyContext): CaseProposal[] {
  const streams = new Map(
    ctx.schema.parameters.map((p) => [p.name, Prng.forStream(ctx.config.seed, p.name)]),
  );
  const cases: CaseProposal[] = [];
  for (let i = 0; i < ctx.config.randomCount; i++) {
    const input: Record<string, unknown> = {};
    for (const param of ctx.schema.parameters) {
      const rng = streams.get(param.name) ?? new Prng(ctx.config.seed);
      input[param.name] = drawValue(param.type, rng, ctx.domain);
    }
    cases.push({
      input,
      provenance: 'random',
      classification: 'valid',
      label: `random #${i + 1} (seed ${ctx.config.seed})`,
    });
  }
  return cases;
}

type Extreme = 'min' | 'max';

/**
 * Scalar extremes and collection lengths at their bound. Collection elements
 * stay at their baseline so the size of the value is bounded by the schema.
 */
function extremeValue(spec: TypeSpec, domain: DomainContext, extreme: Extreme): unknown {
  const resolved = domain.resolve(spec);
  if (domain.minDepthNonNull(resolved) > domain.maxDepth) return null;
  const budget = domain.maxDepth;
  switch (resolved.type) {
    case 'integer':
    case 'float': {
      if (resolved.enum) {
        const finite = resolved.enum.filter((n) => Number.isFinite(n));
        if (finite.length === 0) return resolved.enum[0];
        return extreme === 'min' ? Math.min(...finite) : Math.max(...finite);
      }
      const [lo, hi] = numericRange(resolved);
      return extreme === 'min' ? lo : hi;
    }
    case 'boolean':
      return extreme === 'max';
    case 'string': {
      if (resolved.enum) return extreme === 'min' ? resolved.enum[0] : resolved.enum[resolved.enum.length - 1];
      const chars = [...(resolved.alphabet ?? DEFAULT_ALPHABET)];
      const length =
        extreme === 'min' ? resolved.minLength : (resolved.maxLength ?? resolved.minLength + UNBOUNDED_EXTRA);
      const ch = (extreme === 'min' ? chars[0] : chars[chars.length - 1]) ?? 'a';
      return ch.repeat(length);
    }
    case 'sequence': {
      const length =
        extreme === 'min' || !domain.fits(resolved.items, budget - 1)
          ? resolved.minLength
          : (resolved.maxLength ?? resolved.minLength + UNBOUNDED_EXTRA);
      return Array.from({ length }, () => baselineValue(resolved.items, domain, budget - 1));
    }
    default:
      return baselineValue(resolved, domain);
  }
}

function repeatedString(spec: TypeSpec, domain: DomainContext, source: string): string | undefined {
  const resolved = domain.resolve(spec);
  if (resolved.type !== 'string' || resolved.enum || resolved.alphabet) return undefined;
  const pool = [...source];
  const length = Math.max(resolved.minLength, Math.min(resolved.maxLength ?? pool.length, pool.length));
  if (length === 0) return undefined;
  return Array.from({ length }, (_, i) => pool[i % pool.length]).join('');
}

/**
 * Structural perturbations that commonly break solutions.
 */
export function adversarialCases(ctx: StrategyContext): CaseProposal[] {
  const { schema, domain } = ctx;
  const base = baselineInput(ctx);
  const cases: CaseProposal[] = [];
  const propose = (label: string, overrides: Record<string, unknown>): void => {
    if (Object.keys(overrides).length === 0) return;
    const input = { ...base, ...overrides };
    // perturbations must stay inside the domain
    if (!schema.validateInput(input)) return;
    cases.push({ input, provenance: 'adversarial', classification: 'valid', label });
  };

  const allAt = (extreme: Extreme): Record<string, unknown> =>
    Object.fromEntries(schema.parameters.map((p) => [p.name, extremeValue(p.type, domain, extreme)]));
  propose('all parameters at minimum', allAt('min'));
  propose('all parameters at maximum', allAt('max'));

  const empties: Record<string, unknown> = {};
  for (const param of schema.parameters) {
    const resolved = domain.resolve(param.type);
    if (resolved.type === 'sequence' && resolved.minLength === 0) empties[param.name] = [];
    if (resolved.type === 'mapping' && resolved.minSize === 0) empties[param.name] = {};
    if (resolved.type === 'string' && !resolved.enum && resolved.minLength === 0) empties[param.name] = '';
  }
  propose('empty collections', empties);

  for (const param of schema.parameters) {
    const resolved = domain.resolve(param.type);
    const rng = Prng.forStream(ctx.config.seed, `adversarial:${param.name}`);
    const budget = domain.maxDepth;

    if (resolved.type === 'sequence' && domain.fits(resolved.items, budget - 1)) {
      const length = Math.min(Math.max(2, resolved.minLength), resolved.maxLength ?? UNBOUNDED_EXTRA);
      if (length >= 2) {
        const item = drawValue(resolved.items, rng, domain, budget - 1);
        propose(`${param.name}: duplicated elements`, { [param.name]: Array.from({ length }, () => item) });
      }
      const items = domain.resolve(resolved.items);
      if ((items.type === 'integer' || items.type === 'float') && !items.enum) {
        const [lo, hi] = numericRange(items);
        const count = Math.min(resolved.maxLength ?? UNBOUNDED_EXTRA, Math.max(resolved.minLength, 5));
        const step = count > 1 ? (hi - lo) / (count - 1) : 0;
        const descending = Array.from({ length: count }, (_, i) =>
          items.type === 'integer' ? Math.round(hi - i * step) : hi - i * step,
        );
        propose(`${param.name}: descending order`, { [param.name]: descending });
      }
    }

    if (resolved.type === 'mapping' && domain.fits(resolved.values, budget - 1)) {
      const value = drawValue(resolved.values, rng, domain, budget - 1);
      const alphabet = resolved.keyAlphabet ?? 'abcdefghijklmnopqrstuvwxyz';
      const size = Math.min(Math.max(2, resolved.minSize), resolved.maxSize ?? UNBOUNDED_EXTRA);
      const keys = [...alphabet].slice(0, size);
      if (keys.length >= 2) {
        propose(`${param.name}: duplicated values`, {
          [param.name]: Object.fromEntries(keys.map((key) => [key, value])),
        });
      }
      // keys that only differ by case collide in case-insensitive lookups
      const colliding = [...alphabet].find(
        (ch) => ch !== ch.toUpperCase() && alphabet.includes(ch.toUpperCase()),
      );
      if (colliding) {
        propose(`${param.name}: case-colliding keys`, {
          [param.name]: { [colliding]: value, [colliding.toUpperCase()]: value },
        });
      }
    }

    if (resolved.type === 'string') {
      const nonAscii = repeatedString(resolved, domain, NON_ASCII);
      if (nonAscii !== undefined) propose(`${param.name}: non-ASCII text`, { [param.name]: nonAscii });
      const whitespace = repeatedString(resolved, domain, WHITESPACE);
      if (whitespace !== undefined) propose(`${param.name}: whitespace only`, { [param.name]: whitespace });
      if (!resolved.enum) {
        const chars = [...(resolved.alphabet ?? DEFAULT_ALPHABET)];
        const length = resolved.maxLength ?? resolved.minLength + UNBOUNDED_EXTRA * 4;
        const ch = chars[chars.length - 1] ?? 'z';
        propose(`${param.name}: repeated character`, { [param.name]: ch.repeat(length) });
      }
    }

    if (resolved.type === 'float' && !resolved.enum) {
      propose(`${param.name}: negative zero`, { [param.name]: -0 });
      propose(`${param.name}: tiny magnitude`, { [param.name]: TINY });
      if (resolved.allowNonFinite) {
        for (const special of [NaN, Infinity, -Infinity]) {
          propose(`${param.name}: ${special}`, { [param.name]: special });
        }
      }
    }

    if (usesDefinitions(param.type)) {
      propose(`${param.name}: maximal nesting depth`, { [param.name]: deepValue(param.type, domain) });
    }
  }
  return cases;
}
