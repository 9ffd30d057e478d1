/**
 * AST types for entities and actions.
 *
 * The compiler core consumes these as immutable values; the YAML front end
 * (see loader.ts) is the only producer.
 */

/** Declared impact operation on an entity. */
export type ImpactOperation = 'CREATE' | 'UPDATE' | 'DELETE';

/** Operation label carried by cascade entries. */
export type CascadeOperation = 'CREATED' | 'UPDATED' | 'DELETED';

export type InvalidationStrategy = 'REFETCH' | 'REMOVE' | 'UPDATE';

export interface FieldDefinition {
  name: string;
  /** Declared type name (`text`, `integer`, `ref(User)`, `email`, ...) */
  typeName: string;
  /** Target entity when the field is a `ref(...)` */
  referenceEntity?: string;
  nullable: boolean;
}

export interface Entity {
  name: string;
  schema: string;
  description?: string;
  fields: Record<string, FieldDefinition>;
  actions: Action[];
}

/** Inserts one row and captures its generated id. */
export interface InsertStep {
  kind: 'insert';
  entity: string;
  /** Column name -> value expression */
  fields: Record<string, string>;
}

/** Updates rows selected by a predicate. */
export interface UpdateStep {
  kind: 'update';
  entity: string;
  fields: Record<string, string>;
  where: string;
}

/** Deletes (soft by default) rows selected by a predicate. */
export interface DeleteStep {
  kind: 'delete';
  entity: string;
  where: string;
  hard: boolean;
}

/** Guards the rest of the action with a condition. */
export interface ValidateStep {
  kind: 'validate';
  condition: string;
  /** Machine-readable failure code */
  error?: string;
  /** Human-readable failure message */
  message?: string;
}

/** Calls an external procedure, optionally capturing an entity id. */
export interface CallStep {
  kind: 'call';
  function: string;
  args: Record<string, string>;
  /** Entity whose id the function returns */
  captures?: string;
}

export type ActionStep = InsertStep | UpdateStep | DeleteStep | ValidateStep | CallStep;

export type StepKind = ActionStep['kind'];

export interface EntityImpact {
  entity: string;
  operation: ImpactOperation;
  fields: string[];
  /** Name used to group created rows in the result (e.g. `createdNotifications`) */
  collection?: string;
}

export interface CacheInvalidation {
  query: string;
  strategy: InvalidationStrategy;
  filter?: Record<string, unknown>;
  reason?: string;
}

export interface ActionImpact {
  primary: EntityImpact;
  sideEffects: EntityImpact[];
  cacheInvalidations: CacheInvalidation[];
}

/** Fully resolved cascade behavior for one action. */
export interface CascadeConfig {
  enabled: boolean;
  includeEntities?: string[];
  excludeEntities?: string[];
  includeFullData: boolean;
  includeDeleted: boolean;
  maxEntities?: number;
}

/** Partial cascade settings given at action or application level. */
export type CascadeOverride = Partial<CascadeConfig>;

export interface CDCConfig {
  enabled: boolean;
  eventType?: string;
  includeCascade: boolean;
  includePayload: boolean;
}

export type CDCOverride = Partial<CDCConfig>;

/** Resolved audit bridge behavior for one action. */
export interface AuditConfig {
  /** Expose context to row-level triggers via session settings */
  rowTriggers: boolean;
  /** Return through the mutation-log helper */
  logMutations: boolean;
}

/** An externally supplied function parameter. */
export interface ActionParameter {
  name: string;
  /** PostgreSQL type of the parameter */
  type: string;
  /** Entity whose id this parameter carries */
  entity?: string;
}

export interface Action {
  name: string;
  description?: string;
  parameters: ActionParameter[];
  steps: ActionStep[];
  impact?: ActionImpact;
  /** YAML `cascade: false` arrives here as `{ enabled: false }` */
  cascade?: CascadeOverride;
  cdc?: CDCOverride;
}

/** Serialized cascade unit for CREATED/UPDATED entities. */
export interface CascadeEntity {
  __typename: string;
  id: string;
  operation: 'CREATED' | 'UPDATED';
  entity?: Record<string, unknown>;
}

/** Serialized cascade unit for DELETED entities. Never carries entity data. */
export interface DeletedEntity {
  __typename: string;
  id: string;
  operation: 'DELETED';
}
