import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  JiraTools,
  callMcpToolTool,
  discoverJiraToolsTool,
  jiraAddCommentTool,
  jiraAddWorklogTool,
  jiraCreateIssueLinkTool,
  jiraCreateIssueTool,
  jiraDeleteIssueTool,
  jiraGetAgileBoardsTool,
  jiraGetAllProjectsTool,
  jiraGetBoardIssuesTool,
  jiraGetIssueTool,
  jiraGetLinkTypesTool,
  jiraGetProjectIssuesTool,
  jiraGetProjectVersionsTool,
  jiraGetSprintIssuesTool,
  jiraGetSprintsFromBoardTool,
  jiraGetTransitionsTool,
  jiraGetUserProfileTool,
  jiraGetWorklogTool,
  jiraLinkToEpicTool,
  jiraSearchFieldsTool,
  jiraSearchTool,
  jiraTransitionIssueTool,
  jiraUpdateIssueTool,
} from './jiraTool.js';
import { CLIENT_NAME, CLIENT_VERSION } from './mcp/protocol.js';
import type { CallerContext } from './types.js';

function textResult(text: string) {
  return {
    content: [{
      type: 'text' as const,
      text,
    }],
  };
}

/**
 * Builds the MCP server a host connects to. One server per connection, bound
 * to that connection's caller context.
 */
export function createJiraMcpServer(tools: JiraTools, caller: CallerContext): McpServer {
  const server = new McpServer({
    name: CLIENT_NAME,
    version: CLIENT_VERSION,
  });

  server.tool(discoverJiraToolsTool.name, discoverJiraToolsTool.description, async () =>
    textResult(await tools.discoverJiraTools(caller))
  );

  // Search & read
  server.tool(jiraSearchTool.name, jiraSearchTool.description, jiraSearchTool.shape, async args =>
    textResult(await tools.search(args, caller))
  );
  server.tool(jiraGetIssueTool.name, jiraGetIssueTool.description, jiraGetIssueTool.shape, async args =>
    textResult(await tools.getIssue(args, caller))
  );
  server.tool(jiraGetAllProjectsTool.name, jiraGetAllProjectsTool.description, async () =>
    textResult(await tools.getAllProjects(caller))
  );
  server.tool(jiraGetProjectIssuesTool.name, jiraGetProjectIssuesTool.description, jiraGetProjectIssuesTool.shape, async args =>
    textResult(await tools.getProjectIssues(args, caller))
  );
  server.tool(jiraGetTransitionsTool.name, jiraGetTransitionsTool.description, jiraGetTransitionsTool.shape, async args =>
    textResult(await tools.getTransitions(args, caller))
  );
  server.tool(jiraGetAgileBoardsTool.name, jiraGetAgileBoardsTool.description, jiraGetAgileBoardsTool.shape, async args =>
    textResult(await tools.getAgileBoards(args, caller))
  );
  server.tool(jiraGetSprintsFromBoardTool.name, jiraGetSprintsFromBoardTool.description, jiraGetSprintsFromBoardTool.shape, async args =>
    textResult(await tools.getSprintsFromBoard(args, caller))
  );
  server.tool(jiraGetSprintIssuesTool.name, jiraGetSprintIssuesTool.description, jiraGetSprintIssuesTool.shape, async args =>
    textResult(await tools.getSprintIssues(args, caller))
  );
  server.tool(jiraGetWorklogTool.name, jiraGetWorklogTool.description, jiraGetWorklogTool.shape, async args =>
    textResult(await tools.getWorklog(args, caller))
  );
  server.tool(jiraGetUserProfileTool.name, jiraGetUserProfileTool.description, jiraGetUserProfileTool.shape, async args =>
    textResult(await tools.getUserProfile(args, caller))
  );
  server.tool(jiraSearchFieldsTool.name, jiraSearchFieldsTool.description, jiraSearchFieldsTool.shape, async args =>
    textResult(await tools.searchFields(args, caller))
  );
  server.tool(jiraGetProjectVersionsTool.name, jiraGetProjectVersionsTool.description, jiraGetProjectVersionsTool.shape, async args =>
    textResult(await tools.getProjectVersions(args, caller))
  );
  server.tool(jiraGetBoardIssuesTool.name, jiraGetBoardIssuesTool.description, jiraGetBoardIssuesTool.shape, async args =>
    textResult(await tools.getBoardIssues(args, caller))
  );
  server.tool(jiraGetLinkTypesTool.name, jiraGetLinkTypesTool.description, async () =>
    textResult(await tools.getLinkTypes(caller))
  );

  // Write operations; the read-only gate lives in JiraTools
  server.tool(jiraCreateIssueTool.name, jiraCreateIssueTool.description, jiraCreateIssueTool.shape, async args =>
    textResult(await tools.createIssue(args, caller))
  );
  server.tool(jiraUpdateIssueTool.name, jiraUpdateIssueTool.description, jiraUpdateIssueTool.shape, async args =>
    textResult(await tools.updateIssue(args, caller))
  );
  server.tool(jiraTransitionIssueTool.name, jiraTransitionIssueTool.description, jiraTransitionIssueTool.shape, async args =>
    textResult(await tools.transitionIssue(args, caller))
  );
  server.tool(jiraAddCommentTool.name, jiraAddCommentTool.description, jiraAddCommentTool.shape, async args =>
    textResult(await tools.addComment(args, caller))
  );
  server.tool(jiraAddWorklogTool.name, jiraAddWorklogTool.description, jiraAddWorklogTool.shape, async args =>
    textResult(await tools.addWorklog(args, caller))
  );
  server.tool(jiraLinkToEpicTool.name, jiraLinkToEpicTool.description, jiraLinkToEpicTool.shape, async args =>
    textResult(await tools.linkToEpic(args, caller))
  );
  server.tool(jiraCreateIssueLinkTool.name, jiraCreateIssueLinkTool.description, jiraCreateIssueLinkTool.shape, async args =>
    textResult(await tools.createIssueLink(args, caller))
  );
  server.tool(jiraDeleteIssueTool.name, jiraDeleteIssueTool.description, jiraDeleteIssueTool.shape, async args =>
    textResult(await tools.deleteIssue(args, caller))
  );

  server.tool(callMcpToolTool.name, callMcpToolTool.description, callMcpToolTool.shape, async args =>
    textResult(await tools.callMcpTool(args.toolName, args.arguments, caller))
  );

  return server;
}
