import fetch, { AbortError, type RequestInit, type Response } from 'node-fetch';
import { TimeoutError } from '../errors.js';
import type { JsonRpcNotification, JsonRpcRequest } from '../types.js';

// setTimeout fires at once past 2^31-1 ms
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface GatewayResponse {
  status: number;
  sessionId?: string;
  body: string;
}

export interface PostOptions {
  headers: Record<string, string>;
  timeoutSeconds: number;
}

/**
 * Minimal JSON-RPC over HTTP POST. The deadline covers the whole exchange,
 * body included, and expiry surfaces as a TimeoutError.
 */
export class GatewayTransport {
  constructor(
    private readonly url: string,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  async post(
    payload: JsonRpcRequest | JsonRpcNotification,
    { headers, timeoutSeconds }: PostOptions
  ): Promise<GatewayResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), Math.min(timeoutSeconds, MAX_TIMEOUT_SECONDS) * 1000);

    try {
      const response = await this.fetchFn(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      const body = await response.text();
      return {
        status: response.status,
        sessionId: response.headers.get('mcp-session-id') ?? undefined,
        body,
      };
    } catch (error) {
      if (error instanceof AbortError || (error instanceof Error && error.name === 'AbortError')) {
        throw new TimeoutError(timeoutSeconds);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
