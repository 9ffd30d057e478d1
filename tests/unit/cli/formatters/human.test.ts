/**
 * Tests for the human formatter.
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import type { CheckReport } from '../../../../src/cli/formatters/types.js';
import type { ActionPlan } from '../../../../src/core/compiler/types.js';

const plan: ActionPlan = {
  entity: 'Post',
  action: 'create_post',
  functionName: 'blog.create_post',
  parameters: [{ name: 'p_author_id', type: 'UUID' }],
  bindings: [
    { entity: 'User', variable: 'p_author_id', kind: 'parameter' },
    { entity: 'Post', variable: 'v_post_id', kind: 'captured', source: 'insert', stepIndex: 2 },
  ],
  cascade: { enabled: true, includeFullData: false, includeDeleted: true },
  cascadePlan: [
    { entity: 'Post', label: 'CREATED', bucket: 'updated', variable: 'v_post_id', schema: 'blog', view: 'tv_post' },
  ],
  cdc: { enabled: true, includeCascade: true, includePayload: true },
  eventType: 'PostCreated',
  audit: { rowTriggers: true, logMutations: true },
  rollbackOnValidation: false,
};

describe('HumanFormatter', () => {
  const formatter = new HumanFormatter({ colors: false });

  describe('formatPlan', () => {
    it('should describe bindings, cascade, CDC and audit', () => {
      expect(formatter.formatPlan(plan).split('\n')).toEqual([
        'blog.create_post',
        '   Entity: Post',
        '   Parameters: p_author_id UUID',
        '',
        '   Bindings:',
        '     User -> p_author_id [parameter]',
        '     Post -> v_post_id [step 2 (insert)]',
        '',
        '   Cascade: enabled (ids only)',
        '     1. Post CREATED via v_post_id',
        '   CDC: event PostCreated',
        '   Audit: row triggers + mutation log',
        '   Validation rollback: no',
      ]);
    });

    it('should mark a missing cascade as absent', () => {
      const output = formatter.formatPlan({ ...plan, cascade: null, cascadePlan: [], eventType: null, audit: null });

      expect(output).toContain('   Cascade: absent (no impact)');
      expect(output).toContain('   CDC: off');
      expect(output).toContain('   Audit: off');
    });
  });

  describe('formatCheck', () => {
    const report: CheckReport = {
      files: ['entities/blog.yaml'],
      entities: [{ entity: 'Post', actions: ['create_post', 'publish_post'] }],
      errors: [{ entity: 'Comment', code: 'C005', message: 'Action has no steps' }],
      warnings: [{ code: 'W001', message: 'Cascade filter names unknown entity Ghost', entity: 'Post', action: 'create_post' }],
    };

    it('should list entities, errors, warnings and a summary', () => {
      expect(formatter.formatCheck(report).split('\n')).toEqual([
        '✓ Post: 2 action(s)',
        '✗ Comment: C005 Action has no steps',
        '',
        '⚠ W001 Post.create_post: Cascade filter names unknown entity Ghost',
        '',
        '1 file(s), 1 entity compiled, 1 error(s), 1 warning(s)',
      ]);
    });

    it('should list actions when verbose', () => {
      const verbose = new HumanFormatter({ colors: false, verbose: true });

      expect(verbose.formatCheck({ ...report, errors: [], warnings: [] }).split('\n').slice(0, 3)).toEqual([
        '✓ Post: 2 action(s)',
        '   - create_post',
        '   - publish_post',
      ]);
    });
  });
});
