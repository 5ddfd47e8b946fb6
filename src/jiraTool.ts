import { z } from 'zod';
import { resolveCredentials } from './credentials.js';
import { ArgumentError, errorMessage } from './errors.js';
import { McpToolClient } from './mcp/toolClient.js';
import type { FetchFn } from './mcp/transport.js';
import { ReadOnlyPolicy } from './policy.js';
import type { AppSettings, CallerContext, ResolvedCredentials, ToolArguments } from './types.js';

// Tool definitions: MCP tool name, description for the model, and the zod
// shape of the parameters. The same shapes validate MCP calls in server.ts.

function defineTool<Shape extends z.ZodRawShape>(name: string, description: string, shape: Shape) {
  return { name, description, shape };
}

export type ToolParams<T extends { shape: z.ZodRawShape }> = z.infer<z.ZodObject<T['shape']>>;

const issueKey = z.string().describe('The issue key (e.g., "PROJ-123")');
const projectKey = z.string().describe('The project key (e.g., "PROJ")');
const maxResults = (fallback: number) =>
  z.number().int().positive().optional().describe(`Maximum number of results to return (default: ${fallback})`);

export const discoverJiraToolsTool = defineTool(
  'discover_jira_tools',
  'Discover all Jira tools available on the MCP server. Call this first to see which operations exist and what arguments they take.',
  {}
);

export const jiraSearchTool = defineTool(
  'jira_search',
  'Search for Jira issues using JQL (Jira Query Language).',
  {
    jql: z.string().describe('JQL query (e.g., "project = PROJ AND status = Open", "assignee = currentUser()")'),
    maxResults: maxResults(20),
    fields: z.string().optional().describe('Comma-separated list of fields to return (empty for defaults)'),
  }
);

export const jiraGetIssueTool = defineTool(
  'jira_get_issue',
  'Get detailed information about a Jira issue: summary, description, status, assignee and so on.',
  {
    issueKey,
    expand: z.string().optional().describe('Comma-separated list of fields to expand (e.g., "changelog,transitions")'),
  }
);

export const jiraGetAllProjectsTool = defineTool(
  'jira_get_all_projects',
  'List all Jira projects the user has access to.',
  {}
);

export const jiraGetProjectIssuesTool = defineTool(
  'jira_get_project_issues',
  'Get the issues of a project.',
  { projectKey, maxResults: maxResults(50) }
);

export const jiraGetTransitionsTool = defineTool(
  'jira_get_transitions',
  'Get the status transitions currently available for an issue.',
  { issueKey }
);

export const jiraGetAgileBoardsTool = defineTool(
  'jira_get_agile_boards',
  'List agile boards, optionally only those of one project.',
  { projectKey: projectKey.optional() }
);

export const jiraGetSprintsFromBoardTool = defineTool(
  'jira_get_sprints_from_board',
  'List the sprints of an agile board.',
  {
    boardId: z.string().describe('The board ID (see jira_get_agile_boards)'),
    state: z.string().optional().describe('Optional state filter: "active", "closed" or "future"'),
  }
);

export const jiraGetSprintIssuesTool = defineTool(
  'jira_get_sprint_issues',
  'List the issues in a sprint.',
  { sprintId: z.string().describe('The sprint ID (see jira_get_sprints_from_board)') }
);

export const jiraGetWorklogTool = defineTool(
  'jira_get_worklog',
  'Get the worklog entries of an issue.',
  { issueKey }
);

export const jiraGetUserProfileTool = defineTool(
  'jira_get_user_profile',
  'Get profile information for a Jira user.',
  { userIdentifier: z.string().describe('User email, username or account ID') }
);

export const jiraSearchFieldsTool = defineTool(
  'jira_search_fields',
  'Search Jira fields by keyword. Useful for finding custom field IDs.',
  {
    keyword: z.string().optional().describe('Search keyword (empty lists all fields)'),
    limit: z.number().int().positive().optional().describe('Maximum number of results (default: 10)'),
  }
);

export const jiraGetProjectVersionsTool = defineTool(
  'jira_get_project_versions',
  'List the versions (releases) of a project.',
  { projectKey }
);

export const jiraGetBoardIssuesTool = defineTool(
  'jira_get_board_issues',
  'Get the issues on an agile board, optionally filtered by JQL.',
  {
    boardId: z.string().describe('The board ID'),
    jql: z.string().optional().describe('Optional JQL filter (default: "order by rank")'),
    maxResults: maxResults(50),
  }
);

export const jiraGetLinkTypesTool = defineTool(
  'jira_get_link_types',
  'List the available issue link types (e.g., "blocks", "relates to").',
  {}
);

export const jiraCreateIssueTool = defineTool(
  'jira_create_issue',
  'Create a new Jira issue.',
  {
    projectKey,
    summary: z.string().describe('Issue title'),
    issueType: z.string().optional().describe('Issue type, e.g. "Task", "Bug", "Story", "Epic" (default: "Task")'),
    description: z.string().optional().describe('Description (Jira wiki markup)'),
    assignee: z.string().optional().describe('Username or email of the assignee'),
    priority: z.string().optional().describe('Priority, e.g. "High", "Medium", "Low"'),
    labels: z.string().optional().describe('Comma-separated labels'),
  }
);

export const jiraUpdateIssueTool = defineTool(
  'jira_update_issue',
  'Update an existing Jira issue. Only pass the fields that should change.',
  {
    issueKey,
    summary: z.string().optional().describe('New title'),
    description: z.string().optional().describe('New description'),
    assignee: z.string().optional().describe('New assignee username or email'),
    priority: z.string().optional().describe('New priority'),
    labels: z.string().optional().describe('New comma-separated labels; replaces the existing ones'),
  }
);

export const jiraTransitionIssueTool = defineTool(
  'jira_transition_issue',
  'Move an issue to a new status. Use jira_get_transitions first to find the transition ID.',
  {
    issueKey,
    transitionId: z.string().describe('The transition ID'),
    comment: z.string().optional().describe('Optional comment added with the transition'),
  }
);

export const jiraAddCommentTool = defineTool(
  'jira_add_comment',
  'Add a comment to a Jira issue.',
  {
    issueKey,
    comment: z.string().describe('Comment text (Jira wiki markup)'),
  }
);

export const jiraAddWorklogTool = defineTool(
  'jira_add_worklog',
  'Log time spent on an issue.',
  {
    issueKey,
    timeSpent: z.string().describe('Time spent in Jira format (e.g., "2h", "30m", "1d 4h")'),
    comment: z.string().optional().describe('Optional worklog description'),
    started: z.string().optional().describe('Optional start time, ISO 8601'),
  }
);

export const jiraLinkToEpicTool = defineTool(
  'jira_link_to_epic',
  'Link an issue to an epic.',
  {
    issueKey,
    epicKey: z.string().describe('The epic key (e.g., "PROJ-100")'),
  }
);

export const jiraCreateIssueLinkTool = defineTool(
  'jira_create_issue_link',
  'Create a link between two issues. Use jira_get_link_types to see the available link types.',
  {
    linkType: z.string().describe('Link type name (e.g., "Blocks", "Relates", "Duplicate")'),
    inwardIssueKey: z.string().describe('The source issue key'),
    outwardIssueKey: z.string().describe('The target issue key'),
    comment: z.string().optional().describe('Optional comment for the link'),
  }
);

export const jiraDeleteIssueTool = defineTool(
  'jira_delete_issue',
  'Delete a Jira issue. This cannot be undone.',
  { issueKey }
);

export const callMcpToolTool = defineTool(
  'call_mcp_tool',
  'Call any tool on the MCP server by name. Use discover_jira_tools first to see the tools and their schemas.',
  {
    toolName: z.string().describe('Exact tool name (e.g., "jira_batch_get_changelogs")'),
    arguments: z.string().describe("JSON object with the arguments, matching the tool's input schema"),
  }
);

/** Copies the entries whose value is set and not an empty string. */
function presentOnly(values: Record<string, unknown>): ToolArguments {
  const present: ToolArguments = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== '') {
      present[key] = value;
    }
  }
  return present;
}

const toolArgumentsSchema = z.record(z.unknown());

/**
 * Decodes the raw argument payload of the generic pass-through. Throws
 * ArgumentError for anything but a JSON object.
 */
export function parseToolArguments(raw: string | Record<string, unknown>): ToolArguments {
  if (typeof raw !== 'string') {
    return raw;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new ArgumentError(`Invalid JSON arguments: ${errorMessage(error)}`);
  }

  const parsed = toolArgumentsSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ArgumentError('Invalid JSON arguments: expected a JSON object');
  }
  return parsed.data;
}

/**
 * The operations offered to the LLM host. Each one resolves the caller's
 * credentials, checks the read-only policy when it writes, and hands off to
 * the tool client. Every method resolves to text; none of them throws.
 */
export class JiraTools {
  constructor(
    private readonly client: McpToolClient,
    private readonly policy: ReadOnlyPolicy,
    private readonly defaults: ResolvedCredentials
  ) {}

  static fromSettings(settings: AppSettings, fetchFn?: FetchFn): JiraTools {
    const policy = new ReadOnlyPolicy(settings.readOnly);
    return new JiraTools(new McpToolClient(settings, policy, fetchFn), policy, settings.defaults);
  }

  private call(toolName: string, args: ToolArguments, caller?: CallerContext): Promise<string> {
    return this.client.callTool(toolName, args, resolveCredentials(caller, this.defaults));
  }

  private async write(
    toolName: string,
    operation: string,
    args: ToolArguments,
    caller?: CallerContext
  ): Promise<string> {
    const denied = this.policy.check(toolName, operation);
    if (denied) {
      return denied.toPayload();
    }
    return this.call(toolName, args, caller);
  }

  // Discovery

  async discoverJiraTools(caller?: CallerContext): Promise<string> {
    return this.client.discoverTools(resolveCredentials(caller, this.defaults));
  }

  // Search & read

  async search(params: ToolParams<typeof jiraSearchTool>, caller?: CallerContext): Promise<string> {
    return this.call(
      jiraSearchTool.name,
      { jql: params.jql, limit: params.maxResults ?? 20, ...presentOnly({ fields: params.fields }) },
      caller
    );
  }

  async getIssue(params: ToolParams<typeof jiraGetIssueTool>, caller?: CallerContext): Promise<string> {
    return this.call(
      jiraGetIssueTool.name,
      { issue_key: params.issueKey, ...presentOnly({ expand: params.expand }) },
      caller
    );
  }

  async getAllProjects(caller?: CallerContext): Promise<string> {
    return this.call(jiraGetAllProjectsTool.name, {}, caller);
  }

  async getProjectIssues(params: ToolParams<typeof jiraGetProjectIssuesTool>, caller?: CallerContext): Promise<string> {
    return this.call(
      jiraGetProjectIssuesTool.name,
      { project_key: params.projectKey, limit: params.maxResults ?? 50 },
      caller
    );
  }

  async getTransitions(params: ToolParams<typeof jiraGetTransitionsTool>, caller?: CallerContext): Promise<string> {
    return this.call(jiraGetTransitionsTool.name, { issue_key: params.issueKey }, caller);
  }

  async getAgileBoards(params: ToolParams<typeof jiraGetAgileBoardsTool> = {}, caller?: CallerContext): Promise<string> {
    return this.call(jiraGetAgileBoardsTool.name, presentOnly({ project_key: params.projectKey }), caller);
  }

  async getSprintsFromBoard(
    params: ToolParams<typeof jiraGetSprintsFromBoardTool>,
    caller?: CallerContext
  ): Promise<string> {
    return this.call(
      jiraGetSprintsFromBoardTool.name,
      { board_id: params.boardId, ...presentOnly({ state: params.state }) },
      caller
    );
  }

  async getSprintIssues(params: ToolParams<typeof jiraGetSprintIssuesTool>, caller?: CallerContext): Promise<string> {
    return this.call(jiraGetSprintIssuesTool.name, { sprint_id: params.sprintId }, caller);
  }

  async getWorklog(params: ToolParams<typeof jiraGetWorklogTool>, caller?: CallerContext): Promise<string> {
    return this.call(jiraGetWorklogTool.name, { issue_key: params.issueKey }, caller);
  }

  async getUserProfile(params: ToolParams<typeof jiraGetUserProfileTool>, caller?: CallerContext): Promise<string> {
    return this.call(jiraGetUserProfileTool.name, { user_identifier: params.userIdentifier }, caller);
  }

  async searchFields(params: ToolParams<typeof jiraSearchFieldsTool> = {}, caller?: CallerContext): Promise<string> {
    return this.call(
      jiraSearchFieldsTool.name,
      { keyword: params.keyword ?? '', limit: params.limit ?? 10 },
      caller
    );
  }

  async getProjectVersions(
    params: ToolParams<typeof jiraGetProjectVersionsTool>,
    caller?: CallerContext
  ): Promise<string> {
    return this.call(jiraGetProjectVersionsTool.name, { project_key: params.projectKey }, caller);
  }

  async getBoardIssues(params: ToolParams<typeof jiraGetBoardIssuesTool>, caller?: CallerContext): Promise<string> {
    return this.call(
      jiraGetBoardIssuesTool.name,
      { board_id: params.boardId, jql: params.jql || 'order by rank', limit: params.maxResults ?? 50 },
      caller
    );
  }

  async getLinkTypes(caller?: CallerContext): Promise<string> {
    return this.call(jiraGetLinkTypesTool.name, {}, caller);
  }

  // Write operations

  async createIssue(params: ToolParams<typeof jiraCreateIssueTool>, caller?: CallerContext): Promise<string> {
    return this.write(
      jiraCreateIssueTool.name,
      'create a new Jira issue',
      {
        project_key: params.projectKey,
        summary: params.summary,
        issue_type: params.issueType || 'Task',
        ...presentOnly({
          description: params.description,
          assignee: params.assignee,
          priority: params.priority,
          labels: params.labels,
        }),
      },
      caller
    );
  }

  async updateIssue(params: ToolParams<typeof jiraUpdateIssueTool>, caller?: CallerContext): Promise<string> {
    const fields = presentOnly({
      summary: params.summary,
      description: params.description,
      assignee: params.assignee,
    });
    if (params.priority) {
      fields.priority = { name: params.priority };
    }
    if (params.labels) {
      fields.labels = params.labels.split(',').map(label => label.trim());
    }

    return this.write(
      jiraUpdateIssueTool.name,
      `update issue ${params.issueKey}`,
      { issue_key: params.issueKey, fields },
      caller
    );
  }

  async transitionIssue(params: ToolParams<typeof jiraTransitionIssueTool>, caller?: CallerContext): Promise<string> {
    return this.write(
      jiraTransitionIssueTool.name,
      `transition issue ${params.issueKey}`,
      {
        issue_key: params.issueKey,
        transition_id: params.transitionId,
        ...presentOnly({ comment: params.comment }),
      },
      caller
    );
  }

  async addComment(params: ToolParams<typeof jiraAddCommentTool>, caller?: CallerContext): Promise<string> {
    return this.write(
      jiraAddCommentTool.name,
      `add a comment to issue ${params.issueKey}`,
      { issue_key: params.issueKey, comment: params.comment },
      caller
    );
  }

  async addWorklog(params: ToolParams<typeof jiraAddWorklogTool>, caller?: CallerContext): Promise<string> {
    return this.write(
      jiraAddWorklogTool.name,
      `add a worklog to issue ${params.issueKey}`,
      {
        issue_key: params.issueKey,
        time_spent: params.timeSpent,
        ...presentOnly({ comment: params.comment, started: params.started }),
      },
      caller
    );
  }

  async linkToEpic(params: ToolParams<typeof jiraLinkToEpicTool>, caller?: CallerContext): Promise<string> {
    return this.write(
      jiraLinkToEpicTool.name,
      `link issue ${params.issueKey} to epic ${params.epicKey}`,
      { issue_key: params.issueKey, epic_key: params.epicKey },
      caller
    );
  }

  async createIssueLink(params: ToolParams<typeof jiraCreateIssueLinkTool>, caller?: CallerContext): Promise<string> {
    return this.write(
      jiraCreateIssueLinkTool.name,
      `create a link between ${params.inwardIssueKey} and ${params.outwardIssueKey}`,
      {
        link_type: params.linkType,
        inward_issue_key: params.inwardIssueKey,
        outward_issue_key: params.outwardIssueKey,
        ...presentOnly({ comment: params.comment }),
      },
      caller
    );
  }

  async deleteIssue(params: ToolParams<typeof jiraDeleteIssueTool>, caller?: CallerContext): Promise<string> {
    return this.write(
      jiraDeleteIssueTool.name,
      `delete issue ${params.issueKey}`,
      { issue_key: params.issueKey },
      caller
    );
  }

  // Generic pass-through

  async callMcpTool(
    toolName: string,
    rawArguments: string | Record<string, unknown>,
    caller?: CallerContext
  ): Promise<string> {
    const denied = this.policy.check(toolName, `execute '${toolName}'`);
    if (denied) {
      return denied.toPayload();
    }

    let args: ToolArguments;
    try {
      args = parseToolArguments(rawArguments);
    } catch (error) {
      if (error instanceof ArgumentError) {
        return error.toPayload();
      }
      throw error;
    }

    return this.call(toolName, args, caller);
  }
}
