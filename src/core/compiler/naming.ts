/**
 * Naming conventions for generated objects.
 */
import type { NamingSettings } from '../config/schema.js';

export function entityLower(entity: string): string {
  return entity.toLowerCase();
}

/** Denormalized read view (`tv_post`). */
export function viewName(entity: string, naming: NamingSettings): string {
  return `${naming.view_prefix}${entityLower(entity)}`;
}

/** Base table (`tb_post`). */
export function tableName(entity: string, naming: NamingSettings): string {
  return `${naming.table_prefix}${entityLower(entity)}`;
}

/** Parameter carrying the owning entity's id (`p_post_id`). */
export function entityIdParameter(entity: string): string {
  return `p_${entityLower(entity)}_id`;
}

/** Variable for the nth captured id of an entity (`v_post_id`, `v_post_id_2`). */
export function bindingVariable(entity: string, ordinal: number): string {
  const base = `v_${entityLower(entity)}_id`;
  return ordinal <= 1 ? base : `${base}_${ordinal}`;
}
