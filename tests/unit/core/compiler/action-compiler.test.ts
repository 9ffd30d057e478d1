/**
 * Tests for the action compiler.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ActionCompiler,
  compileAction,
  needsValidationRollback,
  renderEntityFile,
} from '../../../../src/core/compiler/action-compiler.js';
import { parseEntities } from '../../../../src/core/ast/loader.js';
import { EntityRegistry } from '../../../../src/core/registry/entity-registry.js';
import { getDefaultConfig, mergeConfig } from '../../../../src/core/config/loader.js';
import type { Action, ActionStep, Entity } from '../../../../src/core/ast/types.js';
import type { Config } from '../../../../src/core/config/schema.js';
import { CompileError } from '../../../../src/utils/errors.js';

const fixture = readFileSync(
  fileURLToPath(new URL('../../../fixtures/entities/blog.yaml', import.meta.url)),
  'utf-8'
);
const entities = parseEntities(fixture, 'blog.yaml');
const registry = new EntityRegistry(entities);

function entity(name: string): Entity {
  const found = registry.get(name);
  if (!found) throw new Error(`fixture has no ${name}`);
  return found;
}

function action(owner: Entity, name: string): Action {
  const found = owner.actions.find((a) => a.name === name);
  if (!found) throw new Error(`fixture has no ${name}`);
  return found;
}

function compile(entityName: string, actionName: string, config: Config = getDefaultConfig()) {
  const owner = entity(entityName);
  return new ActionCompiler({ config, registry }).compileAction(owner, action(owner, actionName));
}

/** Compile the single action of an inline Post document. */
function compileInline(yaml: string, config: Config = getDefaultConfig()) {
  const [owner] = parseEntities(`entity: Post\nschema: blog\nfields:\n  title: text\n  views: integer\n${yaml}`);
  return new ActionCompiler({ config, registry }).compileAction(owner, owner.actions[0]);
}

function declarations(sql: string): string[] {
  const start = sql.indexOf('DECLARE\n') + 'DECLARE\n'.length;
  const end = sql.indexOf('\nBEGIN\n');
  return sql.slice(start, end).split('\n').map((line) => line.trim());
}

function positions(sql: string, markers: string[]): number[] {
  return markers.map((marker) => {
    const at = sql.indexOf(marker);
    expect(at, marker).toBeGreaterThanOrEqual(0);
    return at;
  });
}

function isAscending(values: number[]): boolean {
  return values.every((value, index) => index === 0 || values[index - 1] < value);
}

describe('needsValidationRollback', () => {
  const validate: ActionStep = { kind: 'validate', condition: 'true' };
  const insert: ActionStep = { kind: 'insert', entity: 'Post', fields: {} };

  it('should be false when every validate step comes first', () => {
    expect(needsValidationRollback([validate, validate, insert])).toBe(false);
  });

  it('should be true when a validate step follows a write', () => {
    expect(needsValidationRollback([insert, validate])).toBe(true);
  });

  it('should treat calls as writes', () => {
    expect(needsValidationRollback([{ kind: 'call', function: 'app.touch', args: {} }, validate])).toBe(true);
  });
});

describe('ActionCompiler', () => {
  describe('create_post', () => {
    const compiled = compile('Post', 'create_post');
    const { sql } = compiled;

    it('should emit the signature with auth context first and payload last', () => {
      expect(sql.split('\n').slice(0, 7)).toEqual([
        'CREATE OR REPLACE FUNCTION blog.create_post(',
        '    auth_tenant_id UUID,',
        '    auth_user_id UUID,',
        '    p_author_id UUID,',
        "    input_payload JSONB DEFAULT '{}'::jsonb",
        ') RETURNS app.mutation_result',
        'LANGUAGE plpgsql',
      ]);
    });

    it('should declare every variable the body uses', () => {
      expect(declarations(sql)).toEqual([
        'v_result app.mutation_result;',
        'v_post_id UUID;',
        'v_meta mutation_metadata.mutation_impact_metadata;',
        'v_cascade JSONB;',
        "v_cascade_updated JSONB := '[]'::jsonb;",
        "v_cascade_deleted JSONB := '[]'::jsonb;",
        "v_audit_context JSONB := '[]'::jsonb;",
      ]);
    });

    it('should run the phases in order', () => {
      const order = positions(sql, [
        '    -- Audit context\n',
        '    -- Step 1: validate missing_title',
        '    -- Step 2: insert Post',
        '    -- Step 3: update User',
        '    -- Cascade\n',
        '    -- Audit context: full cascade\n',
        '    -- Result\n',
        '    -- Clear audit context\n',
        '    RETURN v_result;',
      ]);

      expect(isAscending(order)).toBe(true);
      expect(sql).not.toContain('-- Outbox event');
    });

    it('should return a structured failure from the validate step', () => {
      expect(sql).toContain(
        [
          "    IF NOT ((input_payload->>'title') IS NOT NULL) THEN",
          "        PERFORM set_config('app.cascade_data', '', true);",
          "        PERFORM set_config('app.cascade_entities', '', true);",
          "        PERFORM set_config('app.cascade_source', '', true);",
          '        RETURN ROW(',
          "            '00000000-0000-0000-0000-000000000000'::UUID,",
          '            ARRAY[]::TEXT[],',
          "            'failed:validation',",
          "            'Title is required',",
          '            NULL::JSONB,',
          "            jsonb_build_object('code', 'missing_title', 'step', 1)",
          '        )::app.mutation_result;',
          '    END IF;',
        ].join('\n')
      );
    });

    it('should compile the insert and the counter update', () => {
      expect(sql).toContain(
        [
          '    INSERT INTO blog.tb_post (tenant_id, title, body, author_id, created_at, created_by)',
          "    VALUES (auth_tenant_id, (input_payload->>'title'), (input_payload->>'body'), p_author_id, now(), auth_user_id)",
          '    RETURNING id INTO v_post_id;',
        ].join('\n')
      );
      expect(sql).toContain(
        [
          '    UPDATE blog.tb_user',
          '    SET post_count = post_count + 1, updated_at = now(), updated_by = auth_user_id',
          '    WHERE (id = p_author_id) AND tenant_id = auth_tenant_id;',
        ].join('\n')
      );
    });

    it('should build the cascade in impact order', () => {
      const post = sql.indexOf("app.cascade_entity('Post', v_post_id, 'CREATED', 'blog', 'tv_post')");
      const user = sql.indexOf("app.cascade_entity('User', p_author_id, 'UPDATED', 'blog', 'tv_user')");

      expect(post).toBeGreaterThan(0);
      expect(user).toBeGreaterThan(post);
      expect(sql).toContain(`'invalidations', '[{"queryName":"posts","strategy":"REFETCH","reason":"New post"}]'::jsonb,`);
    });

    it('should fill the result from the primary impact', () => {
      expect(sql).toContain(
        "    v_meta.primary_entity := ROW('Post', 'CREATE', ARRAY['id', 'title', 'body', 'author_id'])::mutation_metadata.entity_impact;"
      );
      expect(sql).toContain('    v_result.id := v_post_id;');
      expect(sql).toContain("    v_result.message := 'create_post completed';");
    });

    it('should comment the function for the GraphQL layer', () => {
      expect(sql).toContain('COMMENT ON FUNCTION blog.create_post(UUID, UUID, UUID, JSONB) IS');
      expect(sql).toContain('name: createPost\nsuccess_type: CreatePostSuccess\nfailure_type: CreatePostError');
    });

    it('should record the plan', () => {
      expect(compiled.plan.functionName).toBe('blog.create_post');
      expect(compiled.plan.rollbackOnValidation).toBe(false);
      expect(compiled.plan.eventType).toBeNull();
      expect(compiled.plan.cascadePlan.map((e) => e.variable)).toEqual(['v_post_id', 'p_author_id']);
      expect(compiled.diagnostics).toEqual([]);
    });
  });

  describe('publish_post', () => {
    const compiled = compile('Post', 'publish_post');
    const { sql } = compiled;

    it('should add the owner id parameter', () => {
      expect(compiled.plan.parameters).toEqual([{ name: 'p_post_id', type: 'UUID' }]);
      expect(sql).toContain('    WHERE (id = p_post_id) AND tenant_id = auth_tenant_id;');
    });

    it('should write the outbox event after the cascade and before the result', () => {
      const order = positions(sql, ['    -- Cascade\n', '    -- Outbox event\n', '    -- Result\n']);

      expect(isAscending(order)).toBe(true);
      expect(sql).toContain("    'PostUpdated',");
      expect(sql).toContain(
        "    jsonb_build_object('action', 'publish_post', 'affectedTypes', jsonb_build_array('Post'), 'cascade', v_cascade),"
      );
      expect(declarations(sql)).toContain('v_event_id UUID;');
      expect(sql).toContain("    'eventId', v_event_id");
    });
  });

  describe('delete_comment', () => {
    const { sql } = compile('Comment', 'delete_comment');

    it('should soft delete by the owner id parameter', () => {
      expect(sql).toContain(
        [
          '    UPDATE blog.tb_comment',
          '    SET deleted_at = now(), deleted_by = auth_user_id',
          '    WHERE (id = p_comment_id) AND tenant_id = auth_tenant_id;',
        ].join('\n')
      );
    });

    it('should report the deletion without entity data', () => {
      expect(sql).toContain(
        "    v_cascade_deleted := v_cascade_deleted || jsonb_build_array(app.cascade_deleted('Comment', p_comment_id));"
      );
      expect(sql).toContain('    v_result.object_data := NULL;');
      expect(sql).not.toContain("app.cascade_entity('Comment'");
    });
  });

  describe('validation rollback', () => {
    const yaml = [
      'actions:',
      '  - name: import_post',
      '    steps:',
      '      - insert: Post',
      '        fields:',
      '          title: input.title',
      '      - validate: input.views >= 0',
      '    impact:',
      '      primary: { entity: Post, operation: CREATE }',
      '    cdc: true',
    ].join('\n');

    it('should raise instead of returning', () => {
      const { sql, plan } = compileInline(yaml);

      expect(plan.rollbackOnValidation).toBe(true);
      expect(sql).toContain(
        "RAISE EXCEPTION USING ERRCODE = 'PM001', MESSAGE = 'Validation failed: input.views >= 0', DETAIL = 'validation_failed', HINT = '2';"
      );
      expect(declarations(sql)).toEqual(expect.arrayContaining(['v_error_message TEXT;', 'v_error_code TEXT;', 'v_error_step TEXT;']));
    });

    it('should keep steps, cascade and outbox inside the guarded block', () => {
      const { sql } = compileInline(yaml);
      const order = positions(sql, [
        '    BEGIN\n        -- Step 1: insert Post',
        '        -- Cascade\n',
        '        -- Outbox event\n',
        "    EXCEPTION\n        WHEN SQLSTATE 'PM001' THEN\n            GET STACKED DIAGNOSTICS",
        '    END;\n',
        '    -- Result\n',
      ]);

      expect(isAscending(order)).toBe(true);
    });
  });

  describe('actions without impact', () => {
    const yaml = [
      'actions:',
      '  - name: touch_post',
      '    steps:',
      '      - insert: Post',
      '        fields:',
      '          title: input.title',
    ].join('\n');

    it('should compile identically whatever the cascade, CDC and audit settings', () => {
      const baseline = compileInline(yaml).sql;
      const variants = [
        mergeConfig({ cascade: { enabled: false } }),
        mergeConfig({ cdc: { enabled: true, include_cascade: true } }),
        mergeConfig({ audit: { log_mutations: true, row_triggers: false } }),
        mergeConfig({ cascade: { include_full_data: false, max_entities: 1 } }),
      ];

      for (const config of variants) {
        expect(compileInline(yaml, config).sql).toBe(baseline);
      }
      expect(baseline).not.toContain('v_cascade');
      expect(baseline).not.toContain('set_config');
      expect(baseline).toContain("    v_result.extra_metadata := '{}'::jsonb;");
      expect(baseline).toContain("    v_result.object_data := jsonb_build_object('id', v_post_id);");
    });

    it('should reject CDC requested on the action', () => {
      expect(() => compileInline(`${yaml}\n    cdc: true`)).toThrow(CompileError);
    });

    it('should warn when cascade is requested on the action', () => {
      const { diagnostics } = compileInline(`${yaml}\n    cascade: true`);

      expect(diagnostics.map((d) => d.code)).toEqual(['W002']);
    });
  });

  describe('configuration warnings', () => {
    const impactYaml = [
      'actions:',
      '  - name: add_post',
      '    steps:',
      '      - insert: Post',
      '        fields:',
      '          title: input.title',
      '    impact:',
      '      primary: { entity: Post, operation: CREATE }',
    ].join('\n');

    it('should warn about filters naming unknown entities', () => {
      const { diagnostics } = compileInline(`${impactYaml}\n    cascade:\n      include_entities: [Ghost]`);

      expect(diagnostics).toEqual([
        {
          code: 'W001',
          message: 'Cascade filter names unknown entity Ghost',
          entity: 'Post',
          action: 'add_post',
          stepIndex: undefined,
        },
      ]);
    });

    it('should warn when events ask for a cascade that is disabled', () => {
      const { diagnostics, sql } = compileInline(
        `${impactYaml}\n    cascade: false\n    cdc:\n      enabled: true\n      include_cascade: true`
      );

      expect(diagnostics.map((d) => d.code)).toEqual(['W003']);
      expect(sql).toContain("jsonb_build_object('action', 'add_post', 'affectedTypes', jsonb_build_array('Post')),");
    });
  });

  describe('mutation log', () => {
    it('should return through the log helper when log_mutations is on', () => {
      const { sql } = compile('Post', 'create_post', mergeConfig({ audit: { log_mutations: true } }));

      expect(sql).toContain(
        [
          '    RETURN app.log_and_return_mutation(',
          '        auth_tenant_id,',
          '        auth_user_id,',
          "        'Post',",
          '        v_result.id,',
          "        'CREATE',",
        ].join('\n')
      );
      expect(sql).not.toContain('RETURN v_result;');
    });
  });

  describe('errors', () => {
    it('should reject empty actions', () => {
      expect(() => compileInline('actions:\n  - name: noop\n    steps: []')).toThrow(CompileError);
    });

    it('should reject unsafe action names', () => {
      const owner = entity('Post');
      const bad: Action = { ...action(owner, 'publish_post'), name: 'Publish-Post' };

      expect(() => compileAction(owner, bad, { registry })).toThrow(/Invalid action name/);
    });

    it('should reject duplicate action names', () => {
      const owner = entity('Post');
      const publish = action(owner, 'publish_post');

      expect(() => new ActionCompiler({ registry }).compileEntity({ ...owner, actions: [publish, publish] })).toThrow(
        CompileError
      );
    });

    it('should reject impact entities nothing binds', () => {
      const yaml = [
        'actions:',
        '  - name: add_post',
        '    steps:',
        '      - insert: Post',
        '        fields:',
        '          title: input.title',
        '    impact:',
        '      primary: { entity: Post, operation: CREATE }',
        '      side_effects:',
        '        - { entity: User, operation: UPDATE }',
      ].join('\n');

      expect(() => compileInline(yaml)).toThrow(/User \(UPDATE\) has no ID binding/);
    });

    it('should reject step entities that are not identifiers', () => {
      const yaml = [
        'actions:',
        '  - name: add_post',
        '    steps:',
        '      - insert: "Post (x) SELECT 1; DROP TABLE blog.tb_user"',
        '        fields:',
        '          title: input.title',
      ].join('\n');

      try {
        compileInline(yaml);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CompileError);
        expect(error).toMatchObject({ code: 'C007', details: { action: 'add_post', stepIndex: 1 } });
      }
    });

    it('should reject impact entities that are not identifiers', () => {
      const yaml = [
        'actions:',
        '  - name: add_post',
        '    steps:',
        '      - insert: Post',
        '        fields:',
        '          title: input.title',
        '    impact:',
        '      primary: { entity: "Post\'); DROP TABLE x; --", operation: CREATE }',
      ].join('\n');

      expect(() => compileInline(yaml)).toThrow(/Invalid entity name/);
    });
  });

  describe('case-colliding entity names', () => {
    it('should declare one variable per capture', () => {
      const yaml = [
        'actions:',
        '  - name: add_posts',
        '    steps:',
        '      - insert: Post',
        '        fields:',
        '          title: input.title',
        '      - insert: POST',
        '        fields:',
        '          title: input.title',
      ].join('\n');

      const { sql } = compileInline(yaml);
      const declared = declarations(sql);

      expect(declared.filter((line) => line === 'v_post_id UUID;')).toHaveLength(1);
      expect(declared.filter((line) => line === 'v_post_id_2 UUID;')).toHaveLength(1);
      expect(sql).toContain('RETURNING id INTO v_post_id_2;');
    });
  });

  describe('binding completeness', () => {
    it('should declare every captured id it references', () => {
      const entityName = fc.constantFrom('Post', 'User', 'Comment');
      fc.assert(
        fc.property(fc.array(entityName, { minLength: 1, maxLength: 5 }), (targets) => {
          const owner = entity('Post');
          const generated: Action = {
            name: 'bulk_create',
            parameters: [],
            steps: targets.map((target) => ({ kind: 'insert' as const, entity: target, fields: { note: "'x'" } })),
            impact: {
              primary: { entity: targets[0], operation: 'CREATE', fields: [] },
              sideEffects: targets.slice(1).map((target) => ({ entity: target, operation: 'CREATE' as const, fields: [] })),
              cacheInvalidations: [],
            },
          };

          const { sql } = new ActionCompiler({ registry }).compileAction(owner, generated);
          const declared = declarations(sql);
          const referenced = new Set(sql.match(/\bv_[a-z]+_id(?:_\d+)?\b/g) ?? []);

          expect(referenced.size).toBeGreaterThan(0);
          for (const variable of referenced) {
            expect(declared).toContain(`${variable} UUID;`);
          }
        })
      );
    });
  });
});

describe('renderEntityFile', () => {
  it('should put a header above the actions', () => {
    const owner = entity('Comment');
    const compiled = new ActionCompiler({ registry }).compileEntity(owner);
    const rule = `-- ${'='.repeat(76)}`;

    expect(compiled.sql.startsWith(`${rule}\n-- Entity: Comment (schema blog)\n-- Actions: delete_comment\n${rule}\n\n`)).toBe(true);
    expect(compiled.sql.endsWith(';\n')).toBe(true);
    expect(renderEntityFile(owner, [])).toBe(`${rule}\n-- Entity: Comment (schema blog)\n-- Actions: (none)\n${rule}\n`);
  });
});
