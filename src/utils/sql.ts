/**
 * SQL text helpers shared by the compilers and the foundation generator.
 */

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;
const ENTITY_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Quote a string as a SQL literal, doubling embedded quotes.
 */
export function sqlLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Quote a value as a JSONB literal (`'...'::jsonb`).
 */
export function jsonbLiteral(value: unknown): string {
  return `${sqlLiteral(JSON.stringify(value))}::jsonb`;
}

/**
 * Render a TEXT[] array literal. Empty arrays keep their type.
 */
export function textArray(values: readonly string[]): string {
  if (values.length === 0) {
    return 'ARRAY[]::TEXT[]';
  }
  return `ARRAY[${values.map(sqlLiteral).join(', ')}]`;
}

/**
 * True for lower-case, unquoted PostgreSQL identifiers.
 */
export function isSafeIdentifier(name: string): boolean {
  return IDENTIFIER.test(name) && name.length <= 63;
}

/**
 * True for entity names (`Post`, `OrderLine`): letters, digits and underscores.
 */
export function isEntityName(name: string): boolean {
  return ENTITY_NAME.test(name) && name.length <= 55;
}

/**
 * Qualify an object name with its schema.
 */
export function qualify(schema: string, name: string): string {
  return `${schema}.${name}`;
}

/**
 * Indent every non-empty line of a block by the given number of spaces.
 */
export function indent(block: string, spaces: number): string {
  const pad = ' '.repeat(spaces);
  return block
    .split('\n')
    .map((line) => (line.length > 0 ? pad + line : line))
    .join('\n');
}

/**
 * Convert a snake_case action name to camelCase (`create_post` -> `createPost`).
 */
export function toCamelCase(name: string): string {
  return name.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Convert a snake_case action name to PascalCase (`create_post` -> `CreatePost`).
 */
export function toPascalCase(name: string): string {
  const camel = toCamelCase(name);
  return camel.charAt(0).toUpperCase() + camel.slice(1);
}
