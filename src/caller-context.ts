import type { IncomingHttpHeaders } from 'http';
import type { CallerContext } from './types.js';

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim().length > 0 ? first.trim() : undefined;
}

/**
 * Reads the per-user settings a host sends when it opens a connection.
 * Absent headers stay absent so the process defaults apply.
 */
export function callerFromHeaders(headers: IncomingHttpHeaders): CallerContext {
  const valves: Record<string, string> = {};

  const proxyApiKey = headerValue(headers, 'x-litellm-api-key');
  if (proxyApiKey) valves.proxyApiKey = proxyApiKey.replace(/^Bearer\s+/i, '');

  const backendToken = headerValue(headers, 'x-jira-pat');
  if (backendToken) valves.backendToken = backendToken;

  const timeout = headerValue(headers, 'x-request-timeout');
  if (timeout) valves.timeoutSeconds = timeout;

  return {
    valves: Object.keys(valves).length > 0 ? valves : undefined,
    userId: headerValue(headers, 'x-user-id'),
  };
}
