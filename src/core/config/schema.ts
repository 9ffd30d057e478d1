/**
 * Configuration file schema (`.pgmutate/config.yaml`).
 */
import { z } from 'zod';
import { CascadeSettingsSchema, CdcSettingsSchema } from '../ast/schema.js';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

const SqlName = z
  .string()
  .regex(/^[a-z_][a-z0-9_]*$/, 'must be a lower-case SQL identifier (letters, digits, underscores)')
  .max(63);

const NamePrefix = z
  .string()
  .regex(/^[a-z_][a-z0-9_]*$|^$/, 'must be lower-case letters, digits and underscores');

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
});

/** Schemas that hold the shared foundation objects. */
export const SchemaNamesSchema = z.object({
  app: SqlName.default('app'),
  metadata: SqlName.default('mutation_metadata'),
});

export const NamingSettingsSchema = z.object({
  /** Column stamped with auth_tenant_id on insert; null disables tenant scoping */
  tenant_column: SqlName.nullable().default('tenant_id'),
  /** Prefix of denormalized GraphQL views (`tv_post`) */
  view_prefix: NamePrefix.default('tv_'),
  /** Prefix of base tables (`tb_post`) */
  table_prefix: NamePrefix.default('tb_'),
});

export const AuditSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  /** Expose cascade data to row-level audit triggers through session settings */
  row_triggers: z.boolean().default(true),
  /** Return through app.log_and_return_mutation */
  log_mutations: z.boolean().default(false),
});

export const OutputSettingsSchema = z.object({
  dir: z.string().default('db/schema/30_functions'),
  foundation_file: z.string().default('000_app_foundation.sql'),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  logging: withDefaults(LoggingSettingsSchema),
  schemas: withDefaults(SchemaNamesSchema),
  naming: withDefaults(NamingSettingsSchema),
  cascade: withDefaults(CascadeSettingsSchema),
  cdc: withDefaults(CdcSettingsSchema),
  audit: withDefaults(AuditSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
});

export type LogLevelSetting = z.infer<typeof LogLevelSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type SchemaNames = z.infer<typeof SchemaNamesSchema>;
export type NamingSettings = z.infer<typeof NamingSettingsSchema>;
export type AuditSettings = z.infer<typeof AuditSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
