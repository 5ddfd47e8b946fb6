import {
  JiraConnectorError,
  ProtocolError,
  TransportError,
  errorMessage,
  notConfiguredError,
} from '../errors.js';
import type { ReadOnlyPolicy } from '../policy.js';
import type { DiscoveredTool, GatewaySettings, ResolvedCredentials, ToolArguments } from '../types.js';
import { handshake } from './handshake.js';
import {
  REQUEST_IDS,
  buildHeaders,
  contentItemSchema,
  jsonRpcRequest,
  listedToolSchema,
  parseJsonRpcBody,
  rpcErrorSchema,
  toolCallResultSchema,
  toolsListResultSchema,
} from './protocol.js';
import { type FetchFn, GatewayTransport } from './transport.js';

export const JIRA_TOOL_PREFIX = 'jira_';
const LIST_TOOLS_TIMEOUT_SECONDS = 60;

/** Message of a JSON-RPC error object, or the whole value when it has none. */
export function describeRpcError(error: unknown): string {
  const parsed = rpcErrorSchema.safeParse(error);
  if (parsed.success) {
    return parsed.data.message;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}

/**
 * Flattens a `tools/call` result into text: text items joined by newlines,
 * resources as `[Resource: uri]` markers. With nothing usable the whole
 * response body comes back as JSON.
 */
export function normalizeToolResult(data: Record<string, unknown>): string {
  const result = toolCallResultSchema.safeParse(data);
  const content = result.success ? result.data.result.content : [];
  const parts: string[] = [];

  for (const raw of content) {
    const item = contentItemSchema.safeParse(raw);
    if (!item.success) continue;

    switch (item.data.kind) {
      case 'text':
        parts.push(item.data.text);
        break;
      case 'resource':
        parts.push(`[Resource: ${item.data.uri}]`);
        break;
      case 'other':
        break;
    }
  }

  return parts.length > 0 ? parts.join('\n') : JSON.stringify(data);
}

/** The `tools` array of a `tools/list` response, empty when the result has none. */
export function listedTools(data: Record<string, unknown>): unknown[] {
  const parsed = toolsListResultSchema.safeParse(data);
  return parsed.success ? parsed.data.result.tools : [];
}

/**
 * Keeps the Jira tools a host may see: prefixed `jira_`, on the allow-list
 * when one is configured, and not a write tool under read-only mode.
 */
export function filterJiraTools(
  tools: unknown[],
  enabledTools: string[],
  policy: ReadOnlyPolicy
): DiscoveredTool[] {
  const visible: DiscoveredTool[] = [];
  for (const raw of tools) {
    const parsed = listedToolSchema.safeParse(raw);
    if (!parsed.success) continue;
    const { name, description, inputSchema } = parsed.data;

    if (!name.startsWith(JIRA_TOOL_PREFIX)) continue;
    if (enabledTools.length > 0 && !enabledTools.includes(name)) continue;
    if (policy.blocks(name)) continue;

    visible.push({ name, description, input_schema: inputSchema ?? {} });
  }
  return visible;
}

/**
 * Talks to the gateway on behalf of one caller at a time. Holds no session
 * state: every call resolves to handshake + one request.
 */
export class McpToolClient {
  private readonly transport: GatewayTransport;

  constructor(
    private readonly settings: GatewaySettings,
    private readonly policy: ReadOnlyPolicy,
    fetchFn?: FetchFn
  ) {
    this.transport = new GatewayTransport(settings.serverUrl, fetchFn);
  }

  /** Runs `tools/call`. Always resolves; failures come back as JSON error text. */
  async callTool(toolName: string, args: ToolArguments, credentials: ResolvedCredentials): Promise<string> {
    if (!credentials.backendToken) {
      return notConfiguredError().toPayload();
    }

    try {
      const { sessionId } = await handshake(this.transport, this.settings.serverGroup, credentials);
      console.log(`[TOOL_CLIENT] Calling ${toolName} (session ${sessionId ?? 'none'})`);

      const response = await this.transport.post(
        jsonRpcRequest('tools/call', { name: toolName, arguments: args }, REQUEST_IDS.callTool),
        {
          headers: buildHeaders(this.settings.serverGroup, credentials, sessionId),
          timeoutSeconds: credentials.timeoutSeconds,
        }
      );

      if (response.status !== 200) {
        throw new TransportError(response.status, response.body);
      }

      const data = parseJsonRpcBody(response.body);
      if ('error' in data) {
        throw new ProtocolError(data.error, describeRpcError(data.error));
      }

      return normalizeToolResult(data);
    } catch (error) {
      if (!(error instanceof JiraConnectorError)) {
        console.error(`[TOOL_CLIENT] ${toolName} failed:`, errorMessage(error));
        return JSON.stringify({ error: errorMessage(error) });
      }

      switch (error.kind) {
        case 'timeout':
          console.error(`[TOOL_CLIENT] ${toolName} timed out: ${error.message}`);
          return JSON.stringify({
            error: `Request timeout after ${credentials.timeoutSeconds}s - try increasing the request timeout in your user settings`,
          });
        default:
          console.error(`[TOOL_CLIENT] ${toolName} failed (${error.kind}):`, error.message);
          return error.toPayload();
      }
    }
  }

  /** Runs `tools/list` and returns the visible Jira tools as indented JSON. */
  async discoverTools(credentials: ResolvedCredentials): Promise<string> {
    if (!credentials.backendToken) {
      return notConfiguredError().toPayload();
    }

    try {
      const { sessionId } = await handshake(this.transport, this.settings.serverGroup, credentials);

      const response = await this.transport.post(
        jsonRpcRequest('tools/list', {}, REQUEST_IDS.listTools),
        {
          headers: buildHeaders(this.settings.serverGroup, credentials, sessionId),
          timeoutSeconds: LIST_TOOLS_TIMEOUT_SECONDS,
        }
      );

      if (response.status !== 200) {
        return new TransportError(response.status, response.body).toPayload();
      }

      const data = parseJsonRpcBody(response.body);
      if ('error' in data) {
        return JSON.stringify({ error: data.error });
      }

      const tools = listedTools(data);
      const visible = filterJiraTools(tools, this.settings.enabledTools, this.policy);
      console.log(`[TOOL_CLIENT] Discovery: ${visible.length} of ${tools.length} tools visible`);

      return JSON.stringify(visible, null, 2);
    } catch (error) {
      console.error('[TOOL_CLIENT] Discovery failed:', errorMessage(error));
      return JSON.stringify({ error: `Discovery failed: ${errorMessage(error)}` });
    }
  }
}
