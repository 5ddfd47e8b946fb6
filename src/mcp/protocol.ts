import { z } from 'zod';
import type { ResolvedCredentials, JsonRpcId, JsonRpcNotification, JsonRpcRequest } from '../types.js';
import { ProtocolError } from '../errors.js';

export const PROTOCOL_VERSION = '2024-11-05';
export const CLIENT_NAME = 'mcp-jira-connector';
export const CLIENT_VERSION = '0.1.0';

export const SESSION_HEADER = 'Mcp-Session-Id';

// Fixed ids per call site. Each operation opens its own session and never
// multiplexes, so reuse across sessions is harmless; a client sharing one
// session between concurrent requests would need unique ids.
export const REQUEST_IDS = {
  initialize: 1,
  listTools: 2,
  callTool: 3,
} as const;

export function jsonRpcRequest(
  method: string,
  params?: Record<string, unknown>,
  id: JsonRpcId = REQUEST_IDS.initialize
): JsonRpcRequest {
  const payload: JsonRpcRequest = { jsonrpc: '2.0', method, id };
  if (params !== undefined) {
    payload.params = params;
  }
  return payload;
}

export function jsonRpcNotification(method: string): JsonRpcNotification {
  return { jsonrpc: '2.0', method };
}

export function initializeRequest(): JsonRpcRequest {
  return jsonRpcRequest(
    'initialize',
    {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: { roots: { listChanged: true }, sampling: {} },
      clientInfo: { name: CLIENT_NAME, version: CLIENT_VERSION },
    },
    REQUEST_IDS.initialize
  );
}

/**
 * Headers for every request to the gateway. Auth headers are only sent when
 * the caller has the matching credential; the session header only once the
 * handshake produced an id.
 */
export function buildHeaders(
  serverGroup: string,
  credentials: ResolvedCredentials,
  sessionId?: string
): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json, text/event-stream;q=0.5',
    'User-Agent': `${CLIENT_NAME}/${CLIENT_VERSION}`,
    'Mcp-Protocol-Version': PROTOCOL_VERSION,
    'x-mcp-servers': serverGroup,
  };

  if (credentials.proxyApiKey) {
    headers['x-litellm-api-key'] = `Bearer ${credentials.proxyApiKey}`;
  }
  if (credentials.backendToken) {
    headers['x-mcp-jira-authorization'] = `Token ${credentials.backendToken}`;
  }
  if (sessionId) {
    headers[SESSION_HEADER] = sessionId;
  }

  return headers;
}

const jsonRpcBodySchema = z.record(z.unknown());

/** Parses a gateway body; a JSON value that is not an object is a protocol fault. */
export function parseJsonRpcBody(body: string): Record<string, unknown> {
  const data: unknown = JSON.parse(body);
  const parsed = jsonRpcBodySchema.safeParse(data);
  if (!parsed.success) {
    throw new ProtocolError(data, `Unexpected JSON-RPC response: ${body}`);
  }
  return parsed.data;
}

// tools/call result items, tagged by kind. Unknown item types still parse so
// callers can skip them.
const textItemSchema = z.object({
  type: z.literal('text'),
  text: z.string().catch(''),
});

const resourceItemSchema = z.object({
  type: z.literal('resource'),
  resource: z.object({ uri: z.string().catch('unknown') }).catch({ uri: 'unknown' }),
});

const otherItemSchema = z.object({ type: z.string() }).passthrough();

export const contentItemSchema = z.union([
  textItemSchema.transform(item => ({ kind: 'text' as const, text: item.text })),
  resourceItemSchema.transform(item => ({ kind: 'resource' as const, uri: item.resource.uri })),
  otherItemSchema.transform(item => ({ kind: 'other' as const, type: item.type })),
]);
export type ContentItem = z.infer<typeof contentItemSchema>;

export const toolCallResultSchema = z.object({
  result: z.object({ content: z.array(z.unknown()) }),
});

export const listedToolSchema = z.object({
  name: z.string(),
  description: z.string().catch(''),
  inputSchema: z.unknown(),
});

export const toolsListResultSchema = z.object({
  result: z.object({ tools: z.array(z.unknown()) }),
});

export const rpcErrorSchema = z.object({ message: z.string() });
