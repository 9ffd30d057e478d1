/**
 * COMMENT ON FUNCTION with the GraphQL mutation annotation.
 */
import type { Action, Entity } from '../ast/types.js';
import { sqlLiteral, toCamelCase, toPascalCase } from '../../utils/sql.js';

export interface CommentInput {
  signature: string;
  entity: Entity;
  action: Action;
  cascadeEnabled: boolean;
  eventType: string | null;
}

export function functionComment(input: CommentInput): string {
  const { action, entity } = input;
  const lines = [
    action.description ?? `${action.name} mutation for ${entity.name}.`,
    '',
    '@fraiseql:mutation',
    `name: ${toCamelCase(action.name)}`,
    `success_type: ${toPascalCase(action.name)}Success`,
    `failure_type: ${toPascalCase(action.name)}Error`,
  ];

  if (action.impact) {
    const { primary, sideEffects } = action.impact;
    lines.push(`primary_entity: ${primary.entity} (${primary.operation})`);
    if (sideEffects.length > 0) {
      lines.push(`side_effects: ${sideEffects.map((s) => `${s.entity} (${s.operation})`).join(', ')}`);
    }
    lines.push(`cascade: ${input.cascadeEnabled ? 'enabled' : 'disabled'}`);
    if (input.eventType) {
      lines.push(`event_type: ${input.eventType}`);
    }
  }

  return `COMMENT ON FUNCTION ${input.signature} IS\n${sqlLiteral(lines.join('\n'))};`;
}
