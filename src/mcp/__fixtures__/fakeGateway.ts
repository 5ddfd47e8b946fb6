import { AbortError, Headers, Response } from 'node-fetch';
import type { AppSettings } from '../../types.js';
import { parseJsonRpcBody } from '../protocol.js';
import type { FetchFn } from '../transport.js';

export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
  /** Set on a hung request once its deadline aborts it */
  abortedAfterMs?: number;
}

const HANG = Symbol('hang');

export type ScriptedReply =
  | { status?: number; body?: unknown; rawBody?: string; sessionId?: string }
  | Error
  | typeof HANG;

/**
 * Stands in for the MCP gateway: answers POSTs from a script, in order, and
 * records what was sent. Header names are recorded lower-cased.
 */
export class FakeGateway {
  readonly requests: RecordedRequest[] = [];
  private readonly replies: ScriptedReply[] = [];

  reply(...replies: ScriptedReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  /** initialize + notification replies for a successful handshake */
  handshake(sessionId = 'sess-1'): this {
    return this.reply(
      { body: { jsonrpc: '2.0', id: 1, result: { protocolVersion: '2024-11-05', capabilities: {} } }, sessionId },
      { status: 202, rawBody: '' }
    );
  }

  /** A request that never answers; it only ends when its signal aborts. */
  hang(): this {
    return this.reply(HANG);
  }

  /** Lets real I/O run until `count` requests have arrived. */
  async untilRequests(count: number): Promise<void> {
    while (this.requests.length < count) {
      await new Promise(resolve => setImmediate(resolve));
    }
  }

  get methods(): unknown[] {
    return this.requests.map(request => request.body.method);
  }

  readonly fetch: FetchFn = async (url, init) => {
    const request: RecordedRequest = {
      url,
      headers: Object.fromEntries(new Headers(init.headers)),
      body: parseJsonRpcBody(String(init.body)),
    };
    this.requests.push(request);

    const next = this.replies.shift();
    if (!next) {
      throw new Error(`FakeGateway: no reply scripted for request ${this.requests.length}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    if (next === HANG) {
      const startedAt = Date.now();
      return new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          request.abortedAfterMs = Date.now() - startedAt;
          reject(new AbortError('The operation was aborted.'));
        });
      });
    }

    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (next.sessionId) {
      headers['mcp-session-id'] = next.sessionId;
    }
    return new Response(next.rawBody ?? JSON.stringify(next.body ?? {}), {
      status: next.status ?? 200,
      headers,
    });
  };
}

export function testSettings(overrides: Partial<AppSettings> = {}): AppSettings {
  return {
    serverUrl: 'http://gateway.test/mcp/',
    serverGroup: 'jira-group',
    enabledTools: [],
    readOnly: false,
    defaults: { proxyApiKey: '', backendToken: '', timeoutSeconds: 120 },
    port: 3333,
    ...overrides,
  };
}

export const PAT_CALLER = { valves: { backendToken: 'test-pat', proxyApiKey: 'test-key' } };
