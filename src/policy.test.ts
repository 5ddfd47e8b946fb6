import { describe, expect, it } from 'vitest';
import { PolicyDenied, readOnlyMessage } from './errors.js';
import { ReadOnlyPolicy, WRITE_TOOLS } from './policy.js';

describe('ReadOnlyPolicy', () => {
  it('classifies write tools', () => {
    const policy = new ReadOnlyPolicy(true);
    expect(policy.isWriteTool('jira_delete_issue')).toBe(true);
    expect(policy.isWriteTool('jira_batch_create_versions')).toBe(true);
    expect(policy.isWriteTool('jira_search')).toBe(false);
  });

  it('blocks every write tool in read-only mode', () => {
    const policy = new ReadOnlyPolicy(true);
    for (const tool of WRITE_TOOLS) {
      expect(policy.blocks(tool)).toBe(true);
    }
    expect(policy.blocks('jira_get_issue')).toBe(false);
  });

  it('lets everything through when writes are allowed', () => {
    const policy = new ReadOnlyPolicy(false);
    expect(policy.check('jira_create_issue', 'create a new Jira issue')).toBeUndefined();
  });

  it('returns a denial naming the attempted action', () => {
    const denied = new ReadOnlyPolicy(true).check('jira_delete_issue', 'delete issue PROJ-9');

    expect(denied).toBeInstanceOf(PolicyDenied);
    expect(denied?.toPayload()).toBe(readOnlyMessage('delete issue PROJ-9'));
    expect(denied?.toPayload()).toContain('I cannot delete issue PROJ-9 because');
  });

  it('accepts a custom write-tool set', () => {
    const policy = new ReadOnlyPolicy(true, new Set(['jira_custom_write']));
    expect(policy.blocks('jira_custom_write')).toBe(true);
    expect(policy.blocks('jira_delete_issue')).toBe(false);
  });
});
