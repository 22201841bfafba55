import { z } from 'zod';

/**
 * Raw (user-authored) schema description, before normalization.
 * Parameters and record fields are flat: `{ name, type: 'integer', min: 0 }`.
 */

interface RawBase {
  nullable?: boolean;
  description?: string;
}

export type RawTypeSpec =
  | (RawBase & { type: 'integer'; min?: number; max?: number; enum?: number[] })
  | (RawBase & {
      type: 'float';
      min?: number;
      max?: number;
      enum?: number[];
      allowNonFinite?: boolean;
    })
  | (RawBase & { type: 'boolean' })
  | (RawBase & {
      type: 'string';
      minLength?: number;
      maxLength?: number;
      alphabet?: string;
      enum?: string[];
    })
  | (RawBase & {
      type: 'sequence';
      items: RawTypeSpec;
      minLength?: number;
      maxLength?: number;
      unordered?: boolean;
    })
  | (RawBase & {
      type: 'mapping';
      values: RawTypeSpec;
      minSize?: number;
      maxSize?: number;
      keyAlphabet?: string;
      keyMaxLength?: number;
    })
  | (RawBase & { type: 'record'; fields: RawField[]; match?: 'exact' | 'subset' })
  | (RawBase & { type: 'ref'; ref: string });

export type RawField = { name: string; optional?: boolean } & RawTypeSpec;

const base = {
  nullable: z.boolean().optional(),
  description: z.string().optional(),
};

export const RawTypeSpecSchema: z.ZodType<RawTypeSpec> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({
      type: z.literal('integer'),
      min: z.number().optional(),
      max: z.number().optional(),
      enum: z.array(z.number()).optional(),
      ...base,
    }),
    z.object({
      type: z.literal('float'),
      min: z.number().optional(),
      max: z.number().optional(),
      enum: z.array(z.number()).optional(),
      allowNonFinite: z.boolean().optional(),
      ...base,
    }),
    z.object({ type: z.literal('boolean'), ...base }),
    z.object({
      type: z.literal('string'),
      minLength: z.number().optional(),
      maxLength: z.number().optional(),
      alphabet: z.string().optional(),
      enum: z.array(z.string()).optional(),
      ...base,
    }),
    z.object({
      type: z.literal('sequence'),
      items: RawTypeSpecSchema,
      minLength: z.number().optional(),
      maxLength: z.number().optional(),
      unordered: z.boolean().optional(),
      ...base,
    }),
    z.object({
      type: z.literal('mapping'),
      values: RawTypeSpecSchema,
      minSize: z.number().optional(),
      maxSize: z.number().optional(),
      keyAlphabet: z.string().optional(),
      keyMaxLength: z.number().optional(),
      ...base,
    }),
    z.object({
      type: z.literal('record'),
      fields: z.array(RawFieldSchema),
      match: z.enum(['exact', 'subset']).optional(),
      ...base,
    }),
    z.object({ type: z.literal('ref'), ref: z.string().min(1), ...base }),
  ]),
);

export const RawFieldSchema: z.ZodType<RawField> = z.lazy(() =>
  z.intersection(
    z.object({ name: z.string().min(1), optional: z.boolean().optional() }),
    RawTypeSpecSchema,
  ),
);

export const RawSchemaDescriptionSchema = z.object({
  name: z.string().min(1),
  entry: z
    .string()
    .regex(/^[A-Za-z_$][\w$]*$/, 'entry must be a JavaScript identifier')
    .optional(),
  description: z.string().optional(),
  parameters: z.array(RawFieldSchema),
  output: RawTypeSpecSchema,
  definitions: z.record(RawTypeSpecSchema).optional(),
  equivalence: z
    .object({
      absoluteEpsilon: z.number().min(0).optional(),
      relativeEpsilon: z.number().min(0).optional(),
    })
    .optional(),
});

export type RawSchemaDescription = z.infer<typeof RawSchemaDescriptionSchema>;
