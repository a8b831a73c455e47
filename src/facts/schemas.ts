import { z } from 'zod';
import { FACT_KINDS, FactKind, FactScope, FactValue, isFactValue } from './types';

export const factScopeSchema = z.enum(['iteration', 'session', 'persistent']) satisfies z.ZodType<FactScope>;

export const factKindSchema = z.custom<FactKind>(
  (value) => typeof value === 'string' && FACT_KINDS.some((kind) => kind === value),
  { message: `Fact kind must be one of ${FACT_KINDS.join(', ')}` }
);

export const factValueSchema = z.custom<FactValue>((value) => isFactValue(value), {
  message: 'Fact value must be a string, finite number, boolean, record or single-kind list',
});

/**
 * Stored fact. `kind` may be absent in records written without it and
 * then reads back as `knowledge`.
 */
export const serializedFactSchema = z
  .object({
    key: z.string().min(1),
    value: factValueSchema,
    scope: factScopeSchema,
    kind: factKindSchema.default('knowledge'),
  })
  .strict();

export const serializedFactsSchema = z.record(z.string().min(1), serializedFactSchema);

export type SerializedFactsInput = z.input<typeof serializedFactsSchema>;
