import { PolicyDenied } from './errors.js';

// Tools that mutate Jira; blocked while read-only mode is on
export const WRITE_TOOLS: ReadonlySet<string> = new Set([
  'jira_create_issue',
  'jira_update_issue',
  'jira_delete_issue',
  'jira_batch_create_issues',
  'jira_add_comment',
  'jira_transition_issue',
  'jira_add_worklog',
  'jira_link_to_epic',
  'jira_create_sprint',
  'jira_update_sprint',
  'jira_create_issue_link',
  'jira_remove_issue_link',
  'jira_create_version',
  'jira_batch_create_versions',
  'jira_create_remote_issue_link',
]);

export class ReadOnlyPolicy {
  constructor(
    public readonly readOnly: boolean,
    private readonly writeTools: ReadonlySet<string> = WRITE_TOOLS
  ) {}

  isWriteTool(toolName: string): boolean {
    return this.writeTools.has(toolName);
  }

  /** True when the tool may not run under the current mode. */
  blocks(toolName: string): boolean {
    return this.readOnly && this.isWriteTool(toolName);
  }

  /**
   * Returns the denial for `toolName`, or undefined when the call may go
   * ahead. `operation` is the human wording of what was attempted.
   */
  check(toolName: string, operation: string): PolicyDenied | undefined {
    if (!this.blocks(toolName)) {
      return undefined;
    }
    console.log(`[POLICY] Blocked ${toolName} in read-only mode`);
    return new PolicyDenied(operation);
  }
}
