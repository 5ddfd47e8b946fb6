export interface ResolvedCredentials {
  proxyApiKey: string;
  backendToken: string;
  timeoutSeconds: number;
}

/**
 * Whatever the host hands over per invocation. `valves` is either a
 * `UserValves` instance, a plain mapping collected by some configuration UI,
 * or missing; `resolveCredentials` sorts that out.
 */
export interface CallerContext {
  valves?: unknown;
  userId?: string; // Only used for log lines
}

export interface GatewaySettings {
  serverUrl: string;
  serverGroup: string;
  enabledTools: string[];
  readOnly: boolean;
}

export interface AppSettings extends GatewaySettings {
  defaults: ResolvedCredentials;
  port: number;
}

export interface McpSession {
  sessionId?: string;
}

export type JsonRpcId = number;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  id: JsonRpcId;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
}

export type ToolArguments = Record<string, unknown>;

export interface DiscoveredTool {
  name: string;
  description: string;
  input_schema: unknown;
}
