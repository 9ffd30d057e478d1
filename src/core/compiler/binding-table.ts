/**
 * Per-action symbol table of entity ID bindings.
 *
 * Step compilers register bindings here; the impact, audit and outbox
 * compilers look them up by entity name. One table per action compilation.
 */
import type { StepKind } from '../ast/types.js';
import type { Binding } from './types.js';
import { bindingVariable, entityLower } from './naming.js';
import { BindingError, ErrorCodes, type CompileLocation } from '../../utils/errors.js';

export class BindingTable {
  private readonly byEntity = new Map<string, Binding[]>();
  private readonly ordered: Binding[] = [];
  private readonly captureCounts = new Map<string, number>();

  /**
   * Bind a caller-supplied parameter to an entity.
   * Re-binding the entity to the parameter it already points at is a no-op.
   */
  bindParameter(entity: string, parameter: string): Binding {
    const latest = this.lookup(entity);
    if (latest && latest.kind === 'parameter' && latest.variable === parameter) {
      return latest;
    }
    return this.add({ entity, variable: parameter, kind: 'parameter' });
  }

  /**
   * Allocate a fresh variable for an id produced by a step.
   */
  capture(entity: string, source: StepKind, stepIndex: number): Binding {
    // Counted per variable stem: `Post` and `POST` share `v_post_id`.
    const stem = entityLower(entity);
    const ordinal = (this.captureCounts.get(stem) ?? 0) + 1;
    this.captureCounts.set(stem, ordinal);
    return this.add({
      entity,
      variable: bindingVariable(entity, ordinal),
      kind: 'captured',
      source,
      stepIndex,
    });
  }

  /** Most recent binding for an entity. */
  lookup(entity: string): Binding | undefined {
    const list = this.byEntity.get(entity);
    return list ? list[list.length - 1] : undefined;
  }

  /**
   * Most recent binding, or a BindingError naming the location.
   */
  require(entity: string, location: CompileLocation = {}): Binding {
    const binding = this.lookup(entity);
    if (!binding) {
      throw new BindingError(
        ErrorCodes.UNDEFINED_BINDING,
        `No ID binding for entity ${entity}: no earlier step targets it and no parameter carries its id`,
        location
      );
    }
    return binding;
  }

  /** Every binding of an entity, oldest first. */
  allFor(entity: string): Binding[] {
    return [...(this.byEntity.get(entity) ?? [])];
  }

  has(entity: string): boolean {
    return this.byEntity.has(entity);
  }

  /** Every binding in registration order. */
  entries(): Binding[] {
    return [...this.ordered];
  }

  /** Variables that need a DECLARE entry. */
  capturedVariables(): string[] {
    return this.ordered.filter((b) => b.kind === 'captured').map((b) => b.variable);
  }

  private add(binding: Binding): Binding {
    const list = this.byEntity.get(binding.entity) ?? [];
    list.push(binding);
    this.byEntity.set(binding.entity, list);
    this.ordered.push(binding);
    return binding;
  }
}
