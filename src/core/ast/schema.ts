/**
 * Zod schemas for entity YAML files.
 *
 * These describe the file format (snake_case keys, shorthand step syntax).
 * The loader converts parsed documents into the AST in types.ts.
 */
import { z } from 'zod';

/** Impact operations accepted in `impact` blocks. */
export const ImpactOperationSchema = z.enum(['CREATE', 'UPDATE', 'DELETE']);

export const InvalidationStrategySchema = z.enum(['REFETCH', 'REMOVE', 'UPDATE']);

/**
 * A value expression. Scalars are accepted for convenience and rendered as SQL.
 */
export const ExpressionSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((value): string => {
    if (value === null) return 'NULL';
    if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
    return String(value);
  });

const FieldMapSchema = z.record(z.string(), ExpressionSchema);

/** Field declarations: `title: text` or `title: { type: text, nullable: false }`. */
export const FieldSpecSchema = z.union([
  z.string(),
  z.object({
    type: z.string(),
    nullable: z.boolean().default(true),
  }),
]);

export const InsertStepSchema = z
  .object({
    insert: z.string(),
    fields: FieldMapSchema.default({}),
  })
  .strict();

export const UpdateStepSchema = z
  .object({
    update: z.string(),
    fields: FieldMapSchema.default({}),
    where: z.string(),
  })
  .strict();

export const DeleteStepSchema = z
  .object({
    delete: z.string(),
    where: z.string(),
    hard: z.boolean().default(false),
  })
  .strict();

export const ValidateStepSchema = z
  .object({
    validate: z.string(),
    error: z.string().optional(),
    message: z.string().optional(),
  })
  .strict();

export const CallStepSchema = z
  .object({
    call: z.string(),
    args: FieldMapSchema.default({}),
    captures: z.string().optional(),
  })
  .strict();

export const StepSchema = z.union([
  InsertStepSchema,
  UpdateStepSchema,
  DeleteStepSchema,
  ValidateStepSchema,
  CallStepSchema,
]);

export const EntityImpactSchema = z.object({
  entity: z.string(),
  operation: ImpactOperationSchema,
  fields: z.array(z.string()).default([]),
  collection: z.string().optional(),
});

export const CacheInvalidationSchema = z.object({
  query: z.string(),
  strategy: InvalidationStrategySchema.default('REFETCH'),
  filter: z.record(z.string(), z.unknown()).optional(),
  reason: z.string().optional(),
});

export const ActionImpactSchema = z.object({
  primary: EntityImpactSchema,
  side_effects: z.array(EntityImpactSchema).default([]),
  cache_invalidations: z.array(CacheInvalidationSchema).default([]),
});

/** Cascade settings; every key optional so levels can be merged. */
export const CascadeSettingsSchema = z.object({
  enabled: z.boolean().optional(),
  include_entities: z.array(z.string()).optional(),
  exclude_entities: z.array(z.string()).optional(),
  include_full_data: z.boolean().optional(),
  include_deleted: z.boolean().optional(),
  max_entities: z.number().int().min(0).optional(),
});

/** CDC settings; every key optional so levels can be merged. */
export const CdcSettingsSchema = z.object({
  enabled: z.boolean().optional(),
  event_type: z.string().optional(),
  include_cascade: z.boolean().optional(),
  include_payload: z.boolean().optional(),
});

export const ActionParameterSchema = z.object({
  name: z.string(),
  type: z.string().default('UUID'),
  entity: z.string().optional(),
});

export const ActionSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  params: z.array(ActionParameterSchema).default([]),
  steps: z.array(StepSchema).default([]),
  impact: ActionImpactSchema.optional(),
  cascade: z.union([z.boolean(), CascadeSettingsSchema]).optional(),
  cdc: z.union([z.boolean(), CdcSettingsSchema]).optional(),
});

export const EntityFileSchema = z.object({
  entity: z.string(),
  schema: z.string().default('public'),
  description: z.string().optional(),
  fields: z.record(z.string(), FieldSpecSchema).default({}),
  actions: z.array(ActionSchema).default([]),
});

export type StepDocument = z.infer<typeof StepSchema>;
export type ActionDocument = z.infer<typeof ActionSchema>;
export type EntityDocument = z.infer<typeof EntityFileSchema>;
export type EntityImpactDocument = z.infer<typeof EntityImpactSchema>;
export type CascadeSettings = z.infer<typeof CascadeSettingsSchema>;
export type CdcSettings = z.infer<typeof CdcSettingsSchema>;
export type FieldSpec = z.infer<typeof FieldSpecSchema>;
