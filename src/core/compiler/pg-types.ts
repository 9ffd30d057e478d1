/**
 * Declared field types to PostgreSQL casts.
 */
import type { FieldDefinition } from '../ast/types.js';
import { CompileError, ErrorCodes, type CompileLocation } from '../../utils/errors.js';

const PASS_THROUGH_TYPE = /^[A-Za-z][A-Za-z0-9_ ]*(\(\d+(,\s*\d+)?\))?(\[\])?$/;

const PG_TYPES: Record<string, string> = {
  text: 'TEXT',
  string: 'TEXT',
  email: 'TEXT',
  url: 'TEXT',
  phone: 'TEXT',
  slug: 'TEXT',
  enum: 'TEXT',
  integer: 'INTEGER',
  int: 'INTEGER',
  bigint: 'BIGINT',
  decimal: 'NUMERIC',
  numeric: 'NUMERIC',
  money: 'NUMERIC',
  boolean: 'BOOLEAN',
  bool: 'BOOLEAN',
  date: 'DATE',
  timestamp: 'TIMESTAMPTZ',
  datetime: 'TIMESTAMPTZ',
  uuid: 'UUID',
  ref: 'UUID',
  json: 'JSONB',
  jsonb: 'JSONB',
};

/**
 * PostgreSQL type for a field. Unknown type names are passed through
 * upper-cased when they look like a type (`inet`, `varchar(40)`, `text[]`).
 */
export function toPgType(field: FieldDefinition, location: CompileLocation = {}): string {
  const known = PG_TYPES[field.typeName.toLowerCase()];
  if (known) {
    return known;
  }
  if (!PASS_THROUGH_TYPE.test(field.typeName)) {
    throw new CompileError(
      ErrorCodes.INVALID_IDENTIFIER,
      `Invalid type "${field.typeName}" for field ${field.name}`,
      location
    );
  }
  return field.typeName.toUpperCase();
}

/**
 * Cast suffix for a value extracted as text from JSONB (empty for text types).
 */
export function castSuffix(pgType: string): string {
  return pgType === 'TEXT' ? '' : `::${pgType}`;
}
