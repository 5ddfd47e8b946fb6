import { describe, expect, it } from 'vitest';
import { ProtocolError } from '../errors.js';
import {
  buildHeaders,
  initializeRequest,
  jsonRpcNotification,
  jsonRpcRequest,
  parseJsonRpcBody,
} from './protocol.js';

const noCredentials = { proxyApiKey: '', backendToken: '', timeoutSeconds: 120 };

describe('jsonRpcRequest', () => {
  it('omits params when none are given', () => {
    expect(jsonRpcRequest('tools/list')).toEqual({ jsonrpc: '2.0', method: 'tools/list', id: 1 });
  });

  it('keeps an empty params object', () => {
    expect(jsonRpcRequest('tools/list', {}, 2)).toEqual({ jsonrpc: '2.0', method: 'tools/list', id: 2, params: {} });
  });

  it('builds notifications without an id', () => {
    expect(jsonRpcNotification('notifications/initialized')).toEqual({
      jsonrpc: '2.0',
      method: 'notifications/initialized',
    });
  });
});

describe('initializeRequest', () => {
  it('declares protocol version, client and capabilities', () => {
    expect(initializeRequest()).toEqual({
      jsonrpc: '2.0',
      method: 'initialize',
      id: 1,
      params: {
        protocolVersion: '2024-11-05',
        capabilities: { roots: { listChanged: true }, sampling: {} },
        clientInfo: { name: 'mcp-jira-connector', version: '0.1.0' },
      },
    });
  });
});

describe('buildHeaders', () => {
  it('sends only the base headers without credentials or session', () => {
    expect(buildHeaders('jira-group', noCredentials)).toEqual({
      'Content-Type': 'application/json',
      Accept: 'application/json, text/event-stream;q=0.5',
      'User-Agent': 'mcp-jira-connector/0.1.0',
      'Mcp-Protocol-Version': '2024-11-05',
      'x-mcp-servers': 'jira-group',
    });
  });

  it('adds auth and session headers when available', () => {
    const headers = buildHeaders(
      'jira-group',
      { proxyApiKey: 'test-key', backendToken: 'test-pat', timeoutSeconds: 120 },
      'sess-9'
    );
    expect(headers['x-litellm-api-key']).toBe('Bearer test-key');
    expect(headers['x-mcp-jira-authorization']).toBe('Token test-pat');
    expect(headers['Mcp-Session-Id']).toBe('sess-9');
  });
});

describe('parseJsonRpcBody', () => {
  it('returns JSON objects', () => {
    expect(parseJsonRpcBody('{"result":{}}')).toEqual({ result: {} });
  });

  it('rejects JSON that is not an object', () => {
    expect(() => parseJsonRpcBody('[1,2]')).toThrow(ProtocolError);
    expect(() => parseJsonRpcBody('[1,2]')).toThrow('Unexpected JSON-RPC response: [1,2]');
  });
});
