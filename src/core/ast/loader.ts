/**
 * Entity file loader - turns YAML documents into the entity/action AST.
 *
 * A file may hold several entities separated by `---`.
 */
import {
  EntityFileSchema,
  type ActionDocument,
  type CascadeSettings,
  type CdcSettings,
  type EntityDocument,
  type EntityImpactDocument,
  type FieldSpec,
  type StepDocument,
} from './schema.js';
import type {
  Action,
  ActionImpact,
  ActionStep,
  CDCOverride,
  CascadeOverride,
  EntityImpact,
  Entity,
  FieldDefinition,
} from './types.js';
import { parseYamlMultiDoc, formatZodError } from '../../utils/yaml.js';
import { readFile } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';

const REF_TYPE = /^ref\(\s*([A-Za-z_][A-Za-z0-9_]*)\s*\)$/;

/**
 * Parse entity YAML content (one or more documents).
 */
export function parseEntities(content: string, source: string = '<inline>'): Entity[] {
  const docs = parseYamlMultiDoc(content).filter((doc) => doc !== null && doc !== undefined);

  return docs.map((doc, index) => {
    const result = EntityFileSchema.safeParse(doc);
    if (!result.success) {
      throw new SystemError(
        ErrorCodes.INVALID_ENTITY_FILE,
        `Invalid entity definition in ${source} (document ${index + 1}): ${formatZodError(result.error)}`,
        { source, document: index + 1, errors: result.error.issues }
      );
    }
    return toEntity(result.data);
  });
}

/**
 * Load every entity defined in a YAML file.
 */
export async function loadEntityFile(filePath: string): Promise<Entity[]> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to read entity file: ${filePath}`,
      { filePath, error: error instanceof Error ? error.message : String(error) }
    );
  }
  return parseEntities(content, filePath);
}

/**
 * Load entities from several files, preserving file order.
 */
export async function loadEntityFiles(filePaths: string[]): Promise<Entity[]> {
  const loaded = await Promise.all(filePaths.map((filePath) => loadEntityFile(filePath)));
  return loaded.flat();
}

/**
 * Convert a validated entity document into the AST.
 */
export function toEntity(doc: EntityDocument): Entity {
  const fields: Record<string, FieldDefinition> = {};
  for (const [name, spec] of Object.entries(doc.fields)) {
    fields[name] = toField(name, spec);
  }

  return {
    name: doc.entity,
    schema: doc.schema,
    description: doc.description,
    fields,
    actions: doc.actions.map(toAction),
  };
}

function toField(name: string, spec: FieldSpec): FieldDefinition {
  const typeName = typeof spec === 'string' ? spec : spec.type;
  const nullable = typeof spec === 'string' ? true : spec.nullable;
  const ref = REF_TYPE.exec(typeName.trim());

  return {
    name,
    typeName: ref ? 'ref' : typeName.trim(),
    referenceEntity: ref ? ref[1] : undefined,
    nullable,
  };
}

/**
 * Convert an action document into the AST.
 */
export function toAction(doc: ActionDocument): Action {
  const action: Action = {
    name: doc.name,
    description: doc.description,
    parameters: doc.params.map((p) => ({ name: p.name, type: p.type, entity: p.entity })),
    steps: doc.steps.map(toStep),
  };

  if (doc.impact) {
    action.impact = {
      primary: toEntityImpact(doc.impact.primary),
      sideEffects: doc.impact.side_effects.map(toEntityImpact),
      cacheInvalidations: doc.impact.cache_invalidations.map((ci) => ({
        query: ci.query,
        strategy: ci.strategy,
        filter: ci.filter,
        reason: ci.reason,
      })),
    } satisfies ActionImpact;
  }

  if (doc.cascade !== undefined) {
    action.cascade = typeof doc.cascade === 'boolean'
      ? { enabled: doc.cascade }
      : toCascadeOverride(doc.cascade);
  }

  if (doc.cdc !== undefined) {
    action.cdc = typeof doc.cdc === 'boolean'
      ? { enabled: doc.cdc }
      : toCdcOverride(doc.cdc);
  }

  return action;
}

function toEntityImpact(doc: EntityImpactDocument): EntityImpact {
  return {
    entity: doc.entity,
    operation: doc.operation,
    fields: doc.fields,
    collection: doc.collection,
  };
}

/**
 * Convert a step document (shorthand keyed by kind) into a tagged step.
 */
export function toStep(doc: StepDocument): ActionStep {
  if ('insert' in doc) {
    return { kind: 'insert', entity: doc.insert, fields: doc.fields };
  }
  if ('update' in doc) {
    return { kind: 'update', entity: doc.update, fields: doc.fields, where: doc.where };
  }
  if ('delete' in doc) {
    return { kind: 'delete', entity: doc.delete, where: doc.where, hard: doc.hard };
  }
  if ('validate' in doc) {
    return { kind: 'validate', condition: doc.validate, error: doc.error, message: doc.message };
  }
  return { kind: 'call', function: doc.call, args: doc.args, captures: doc.captures };
}

/**
 * Convert snake_case cascade settings into an override. Absent keys stay absent.
 */
export function toCascadeOverride(settings: CascadeSettings): CascadeOverride {
  const override: CascadeOverride = {};
  if (settings.enabled !== undefined) override.enabled = settings.enabled;
  if (settings.include_entities !== undefined) override.includeEntities = settings.include_entities;
  if (settings.exclude_entities !== undefined) override.excludeEntities = settings.exclude_entities;
  if (settings.include_full_data !== undefined) override.includeFullData = settings.include_full_data;
  if (settings.include_deleted !== undefined) override.includeDeleted = settings.include_deleted;
  if (settings.max_entities !== undefined) override.maxEntities = settings.max_entities;
  return override;
}

/**
 * Convert snake_case CDC settings into an override. Absent keys stay absent.
 */
export function toCdcOverride(settings: CdcSettings): CDCOverride {
  const override: CDCOverride = {};
  if (settings.enabled !== undefined) override.enabled = settings.enabled;
  if (settings.event_type !== undefined) override.eventType = settings.event_type;
  if (settings.include_cascade !== undefined) override.includeCascade = settings.include_cascade;
  if (settings.include_payload !== undefined) override.includePayload = settings.include_payload;
  return override;
}
