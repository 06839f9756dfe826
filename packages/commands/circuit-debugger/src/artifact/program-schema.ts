import { z } from 'zod';

import { parseField } from '../field/field-element.js';

// Field values are written as decimal, negative decimal or 0x-prefixed hex.
export const FieldSchema = z.union([z.string(), z.number().int()]).transform((value, ctx) => {
  const parsed = parseField(String(value));
  if (parsed === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid field element: ${String(value)}`,
    });
    return z.NEVER;
  }
  return parsed;
});

const IndexSchema = z.number().int().nonnegative();

export const ExpressionSchema = z.object({
  mulTerms: z
    .array(z.object({ coefficient: FieldSchema, lhs: IndexSchema, rhs: IndexSchema }))
    .default([]),
  linearTerms: z
    .array(z.object({ coefficient: FieldSchema, witness: IndexSchema }))
    .default([]),
  constant: FieldSchema.default('0'),
});

const AssertZeroSchema = z.object({
  type: z.literal('assert-zero'),
  expression: ExpressionSchema,
});

const BlockCallSchema = z.object({
  type: z.literal('block-call'),
  blockId: IndexSchema,
  inputs: z.array(ExpressionSchema),
  outputs: z.array(IndexSchema),
});

export const OuterOpcodeSchema = z.discriminatedUnion('type', [AssertZeroSchema, BlockCallSchema]);

const BinaryOperationSchema = z.enum([
  'add',
  'sub',
  'mul',
  'div',
  'equals',
  'less-than',
  'less-than-equals',
]);

export const BlockInstructionSchema = z.discriminatedUnion('op', [
  z.object({
    op: z.literal('calldata-copy'),
    destination: IndexSchema,
    size: IndexSchema,
    offset: IndexSchema,
  }),
  z.object({ op: z.literal('const'), destination: IndexSchema, value: FieldSchema }),
  z.object({ op: z.literal('mov'), destination: IndexSchema, source: IndexSchema }),
  z.object({
    op: z.literal('binary'),
    operation: BinaryOperationSchema,
    lhs: IndexSchema,
    rhs: IndexSchema,
    destination: IndexSchema,
  }),
  z.object({ op: z.literal('load'), destination: IndexSchema, pointer: IndexSchema }),
  z.object({ op: z.literal('store'), pointer: IndexSchema, source: IndexSchema }),
  z.object({ op: z.literal('jump'), location: IndexSchema }),
  z.object({ op: z.literal('jump-if'), condition: IndexSchema, location: IndexSchema }),
  z.object({ op: z.literal('jump-if-not'), condition: IndexSchema, location: IndexSchema }),
  z.object({ op: z.literal('call'), location: IndexSchema }),
  z.object({ op: z.literal('return') }),
  z.object({ op: z.literal('stop'), returnOffset: IndexSchema, returnSize: IndexSchema }),
  z.object({ op: z.literal('trap'), message: z.string().optional() }),
]);

export const UnconstrainedBlockSchema = z.object({
  name: z.string().optional(),
  registerCount: IndexSchema,
  memorySize: IndexSchema,
  instructions: z.array(BlockInstructionSchema),
});

const SourceLocationSchema = z.object({
  file: z.string(),
  line: z.number().int().positive(),
  column: z.number().int().nonnegative(),
});

const RangeSchema = z.object({ start: IndexSchema, end: IndexSchema });

const VariableSourceSchema = z.object({
  kind: z.enum(['witness', 'register', 'memory']),
  index: IndexSchema,
});

export const DebugSymbolsSchema = z.object({
  files: z
    .record(z.string(), z.object({ path: z.string(), source: z.string().optional() }))
    .optional(),
  locations: z.record(z.string(), z.array(SourceLocationSchema)).default({}),
  scopes: z
    .array(
      z.object({
        functionName: z.string(),
        params: z.array(z.string()).optional(),
        outerRange: RangeSchema.optional(),
        blockId: IndexSchema.optional(),
        innerRange: RangeSchema.optional(),
        variables: z.array(
          z.object({
            name: z.string(),
            type: z.string().optional(),
            source: VariableSourceSchema,
          }),
        ),
      }),
    )
    .optional(),
});

export const WitnessAssignmentSchema = z
  .record(z.string().regex(/^\d+$/, 'Witness indices must be non-negative integers'), FieldSchema)
  .transform(
    (record) =>
      new Map(Object.entries(record).map(([index, value]) => [Number(index), value] as const)),
  );

export const ProgramArtifactSchema = z.object({
  opcodes: z.array(OuterOpcodeSchema),
  blocks: z.array(UnconstrainedBlockSchema).default([]),
  debugSymbols: DebugSymbolsSchema.optional(),
  initialWitness: WitnessAssignmentSchema.optional(),
});

export type ProgramArtifact = z.infer<typeof ProgramArtifactSchema>;
