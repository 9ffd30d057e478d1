/**
 * Tests for the impact metadata compiler.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  cascadeAssemblyStatement,
  cascadeEntryStatement,
  collectionEntries,
  extraMetadataStatement,
  impactDeclarations,
  metadataStatements,
  operationLabel,
  planCascade,
  resolveImpactBindings,
} from '../../../../src/core/compiler/impact.js';
import { BindingTable } from '../../../../src/core/compiler/binding-table.js';
import { EntityRegistry } from '../../../../src/core/registry/entity-registry.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import type { ActionImpact, CascadeConfig } from '../../../../src/core/ast/types.js';
import type { CascadePlanEntry } from '../../../../src/core/compiler/types.js';
import { BindingError, CompileError } from '../../../../src/utils/errors.js';

const config = getDefaultConfig();

const fullCascade: CascadeConfig = { enabled: true, includeFullData: true, includeDeleted: true };

function impact(overrides: Partial<ActionImpact> = {}): ActionImpact {
  return {
    primary: { entity: 'Post', operation: 'CREATE', fields: ['title'] },
    sideEffects: [{ entity: 'User', operation: 'UPDATE', fields: ['post_count'] }],
    cacheInvalidations: [],
    ...overrides,
  };
}

function postAndAuthor(): BindingTable {
  const bindings = new BindingTable();
  bindings.bindParameter('User', 'p_author_id');
  bindings.capture('Post', 'insert', 1);
  return bindings;
}

describe('operationLabel', () => {
  it('should map every impact operation', () => {
    expect(operationLabel('CREATE')).toBe('CREATED');
    expect(operationLabel('UPDATE')).toBe('UPDATED');
    expect(operationLabel('DELETE')).toBe('DELETED');
  });

  it('should throw C004 for anything else', () => {
    fc.assert(
      fc.property(
        fc.string().filter((s) => !['CREATE', 'UPDATE', 'DELETE'].includes(s)),
        (operation) => {
          expect(() => operationLabel(operation)).toThrow(CompileError);
        }
      )
    );
  });
});

describe('resolveImpactBindings', () => {
  it('should pair every entry with its binding in impact order', () => {
    const resolved = resolveImpactBindings(impact(), postAndAuthor());

    expect(resolved.map((r) => [r.impact.entity, r.role, r.label, r.binding.variable])).toEqual([
      ['Post', 'primary', 'CREATED', 'v_post_id'],
      ['User', 'side_effect', 'UPDATED', 'p_author_id'],
    ]);
  });

  it('should throw B001 for an entity nothing binds', () => {
    const bindings = new BindingTable();
    bindings.capture('Post', 'insert', 1);

    expect(() => resolveImpactBindings(impact(), bindings, { action: 'create_post' })).toThrow(BindingError);
  });

  it('should throw C002 when only incompatible steps bind the entity', () => {
    const bindings = new BindingTable();
    bindings.capture('Post', 'insert', 1);
    bindings.capture('User', 'insert', 2);

    try {
      resolveImpactBindings(impact(), bindings);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CompileError);
      expect(error).toMatchObject({ code: 'C002' });
    }
  });

  it('should use the latest compatible binding', () => {
    const bindings = new BindingTable();
    bindings.capture('Post', 'insert', 1);
    bindings.capture('Post', 'insert', 2);

    const [primary] = resolveImpactBindings(impact({ sideEffects: [] }), bindings);

    expect(primary.binding.variable).toBe('v_post_id_2');
  });

  it('should resolve every bound entity without error', () => {
    const entity = fc.constantFrom('Post', 'User', 'Tag');
    fc.assert(
      fc.property(fc.array(entity, { minLength: 1, maxLength: 6 }), (entities) => {
        const bindings = new BindingTable();
        entities.forEach((name, index) => bindings.capture(name, 'insert', index + 1));
        const declared: ActionImpact = {
          primary: { entity: entities[0], operation: 'CREATE', fields: [] },
          sideEffects: entities.slice(1).map((name) => ({ entity: name, operation: 'CREATE' as const, fields: [] })),
          cacheInvalidations: [],
        };

        const resolved = resolveImpactBindings(declared, bindings);

        expect(resolved).toHaveLength(entities.length);
        resolved.forEach((r) => expect(bindings.allFor(r.impact.entity)).toContain(r.binding));
      })
    );
  });
});

describe('planCascade', () => {
  const registry = new EntityRegistry();

  it('should plan entries in impact order', () => {
    const resolved = resolveImpactBindings(impact(), postAndAuthor());

    const plan = planCascade(resolved, fullCascade, registry, config, 'blog');

    expect(plan).toEqual([
      { entity: 'Post', label: 'CREATED', bucket: 'updated', variable: 'v_post_id', schema: 'blog', view: 'tv_post' },
      { entity: 'User', label: 'UPDATED', bucket: 'updated', variable: 'p_author_id', schema: 'blog', view: 'tv_user' },
    ]);
  });

  it('should apply the entity filter', () => {
    const resolved = resolveImpactBindings(impact(), postAndAuthor());

    const plan = planCascade(resolved, { ...fullCascade, excludeEntities: ['User'] }, registry, config, 'blog');

    expect(plan.map((e) => e.entity)).toEqual(['Post']);
  });

  it('should truncate to maxEntities', () => {
    const resolved = resolveImpactBindings(impact(), postAndAuthor());

    const plan = planCascade(resolved, { ...fullCascade, maxEntities: 1 }, registry, config, 'blog');

    expect(plan.map((e) => e.entity)).toEqual(['Post']);
  });

  it('should drop deleted entries when includeDeleted is false', () => {
    const bindings = new BindingTable();
    bindings.bindParameter('Comment', 'p_comment_id');
    const resolved = resolveImpactBindings(
      impact({ primary: { entity: 'Comment', operation: 'DELETE', fields: [] }, sideEffects: [] }),
      bindings
    );

    expect(planCascade(resolved, fullCascade, registry, config, 'blog')[0].bucket).toBe('deleted');
    expect(planCascade(resolved, { ...fullCascade, includeDeleted: false }, registry, config, 'blog')).toEqual([]);
  });

  it('should plan nothing when cascade is disabled', () => {
    const resolved = resolveImpactBindings(impact(), postAndAuthor());

    expect(planCascade(resolved, { ...fullCascade, enabled: false }, registry, config, 'blog')).toEqual([]);
  });
});

describe('cascade statements', () => {
  const updated: CascadePlanEntry = {
    entity: 'Post',
    label: 'CREATED',
    bucket: 'updated',
    variable: 'v_post_id',
    schema: 'blog',
    view: 'tv_post',
  };

  it('should fetch full data through cascade_entity', () => {
    expect(cascadeEntryStatement(updated, fullCascade, 'app')).toBe(
      "v_cascade_updated := v_cascade_updated || jsonb_build_array(app.cascade_entity('Post', v_post_id, 'CREATED', 'blog', 'tv_post'));"
    );
  });

  it('should build an id-only object without full data', () => {
    expect(cascadeEntryStatement(updated, { ...fullCascade, includeFullData: false }, 'app')).toBe(
      "v_cascade_updated := v_cascade_updated || jsonb_build_array(jsonb_build_object('__typename', 'Post', 'id', v_post_id, 'operation', 'CREATED'));"
    );
  });

  it('should never attach entity data to deleted entries', () => {
    fc.assert(
      fc.property(fc.boolean(), (includeFullData) => {
        const statement = cascadeEntryStatement(
          { ...updated, label: 'DELETED', bucket: 'deleted' },
          { ...fullCascade, includeFullData },
          'app'
        );
        expect(statement).toBe(
          "v_cascade_deleted := v_cascade_deleted || jsonb_build_array(app.cascade_deleted('Post', v_post_id));"
        );
      })
    );
  });

  it('should assemble the cascade with invalidations as a JSON literal', () => {
    const statement = cascadeAssemblyStatement(
      impact({ cacheInvalidations: [{ query: 'posts', strategy: 'REFETCH', filter: { authorId: 1 } }] })
    );

    expect(statement.split('\n')).toEqual([
      'v_cascade := jsonb_build_object(',
      "    'updated', v_cascade_updated,",
      "    'deleted', v_cascade_deleted,",
      `    'invalidations', '[{"queryName":"posts","strategy":"REFETCH","filter":{"authorId":1}}]'::jsonb,`,
      "    'metadata', jsonb_build_object(",
      "        'timestamp', now(),",
      "        'affectedCount', jsonb_array_length(v_cascade_updated) + jsonb_array_length(v_cascade_deleted)",
      '    )',
      ');',
    ]);
  });
});

describe('metadataStatements', () => {
  it('should assign primary, side effects and invalidations', () => {
    const statements = metadataStatements(
      impact({ cacheInvalidations: [{ query: 'posts', strategy: 'REMOVE', reason: "author's post" }] }),
      config
    );

    expect(statements).toEqual([
      "v_meta.primary_entity := ROW('Post', 'CREATE', ARRAY['title'])::mutation_metadata.entity_impact;",
      "v_meta.actual_side_effects := ARRAY[\n    ROW('User', 'UPDATE', ARRAY['post_count'])::mutation_metadata.entity_impact\n];",
      "v_meta.cache_invalidations := ARRAY[\n    ROW('posts', NULL, 'REMOVE', 'author''s post')::mutation_metadata.cache_invalidation\n];",
    ]);
  });

  it('should leave empty arrays unassigned', () => {
    expect(metadataStatements(impact({ sideEffects: [] }), config)).toHaveLength(1);
  });
});

describe('declarations and extra metadata', () => {
  it('should declare cascade accumulators only when cascade is enabled', () => {
    expect(impactDeclarations(config, false)).toEqual(['v_meta mutation_metadata.mutation_impact_metadata;']);
    expect(impactDeclarations(config, true)).toHaveLength(4);
  });

  it('should build collections from every compatible binding', () => {
    const bindings = new BindingTable();
    bindings.capture('Post', 'insert', 1);
    bindings.capture('Notification', 'insert', 2);
    bindings.capture('Notification', 'insert', 3);
    const declared = impact({
      sideEffects: [{ entity: 'Notification', operation: 'CREATE', fields: [], collection: 'createdNotifications' }],
    });

    expect(collectionEntries(declared, bindings)).toEqual([
      { name: 'createdNotifications', expression: 'jsonb_build_array(v_notification_id, v_notification_id_2)' },
    ]);
  });

  it('should order extra metadata keys', () => {
    const statement = extraMetadataStatement({
      impact: impact(),
      cascadeEnabled: true,
      collections: [{ name: 'createdTags', expression: 'jsonb_build_array(v_tag_id)' }],
      eventIdVariable: 'v_event_id',
    });

    expect(statement).toBe(
      [
        'v_result.extra_metadata := jsonb_build_object(',
        "    'cascade', v_cascade,",
        "    'meta', to_jsonb(v_meta),",
        "    'createdTags', jsonb_build_array(v_tag_id),",
        "    'eventId', v_event_id",
        ');',
      ].join('\n')
    );
  });

  it('should return an empty object without impact', () => {
    expect(
      extraMetadataStatement({ impact: undefined, cascadeEnabled: false, collections: [], eventIdVariable: null })
    ).toBe("v_result.extra_metadata := '{}'::jsonb;");
  });
});
