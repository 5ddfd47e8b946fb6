import { ProtocolError, TransportError, errorMessage } from '../errors.js';
import type { McpSession, ResolvedCredentials } from '../types.js';
import { buildHeaders, initializeRequest, jsonRpcNotification, parseJsonRpcBody } from './protocol.js';
import type { GatewayTransport } from './transport.js';

const MIN_HANDSHAKE_TIMEOUT_SECONDS = 30;
const NOTIFY_TIMEOUT_SECONDS = 10;

/** A quarter of the caller's timeout, but never below 30 seconds. */
export function handshakeTimeoutSeconds(requestTimeoutSeconds: number): number {
  return Math.max(MIN_HANDSHAKE_TIMEOUT_SECONDS, Math.floor(requestTimeoutSeconds / 4));
}

/**
 * Opens a fresh MCP session: `initialize`, then `notifications/initialized`.
 * The returned session belongs to the calling operation only.
 */
export async function handshake(
  transport: GatewayTransport,
  serverGroup: string,
  credentials: ResolvedCredentials
): Promise<McpSession> {
  const response = await transport.post(initializeRequest(), {
    headers: buildHeaders(serverGroup, credentials),
    timeoutSeconds: handshakeTimeoutSeconds(credentials.timeoutSeconds),
  });

  if (response.status !== 200) {
    throw new TransportError(response.status, response.body);
  }

  const { sessionId } = response;
  const data = parseJsonRpcBody(response.body);
  if ('error' in data) {
    throw new ProtocolError(data.error);
  }

  if (!sessionId) {
    console.warn('[HANDSHAKE] Gateway returned no session id; continuing without one');
  }

  // The acknowledgement is best effort: a lost notification does not
  // invalidate the session, so failures are logged and dropped here.
  try {
    await transport.post(jsonRpcNotification('notifications/initialized'), {
      headers: buildHeaders(serverGroup, credentials, sessionId),
      timeoutSeconds: NOTIFY_TIMEOUT_SECONDS,
    });
  } catch (error) {
    console.warn(`[HANDSHAKE] initialized notification failed: ${errorMessage(error)}`);
  }

  return { sessionId };
}
