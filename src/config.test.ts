import { describe, expect, it } from 'vitest';
import { loadSettings, parseToolList } from './config.js';
import { ConfigurationError } from './errors.js';

describe('loadSettings', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadSettings({})).toEqual({
      serverUrl: 'http://localhost:4000/mcp/',
      serverGroup: 'jira',
      enabledTools: [],
      readOnly: true,
      defaults: { proxyApiKey: '', backendToken: '', timeoutSeconds: 120 },
      port: 3333,
    });
  });

  it('reads gateway and caller defaults from the environment', () => {
    const settings = loadSettings({
      MCP_SERVER_URL: 'https://gateway.example.com/mcp/',
      MCP_SERVER_GROUP: 'atlassian',
      ENABLED_TOOLS: ' jira_search, jira_get_issue ,,',
      READ_ONLY_MODE: 'false',
      JIRA_PAT: 'test-pat',
      DEFAULT_REQUEST_TIMEOUT: '300',
      PORT: '8080',
    });

    expect(settings.serverUrl).toBe('https://gateway.example.com/mcp/');
    expect(settings.serverGroup).toBe('atlassian');
    expect(settings.enabledTools).toEqual(['jira_search', 'jira_get_issue']);
    expect(settings.readOnly).toBe(false);
    expect(settings.defaults).toEqual({ proxyApiKey: '', backendToken: 'test-pat', timeoutSeconds: 300 });
    expect(settings.port).toBe(8080);
  });

  it('rejects invalid values', () => {
    expect(() => loadSettings({ MCP_SERVER_URL: 'not a url' })).toThrow(ConfigurationError);
    expect(() => loadSettings({ READ_ONLY_MODE: 'maybe' })).toThrow(/READ_ONLY_MODE/);
    expect(() => loadSettings({ DEFAULT_REQUEST_TIMEOUT: '-5' })).toThrow(/DEFAULT_REQUEST_TIMEOUT/);
  });

  it('caps the request timeout at what a timer can hold', () => {
    expect(loadSettings({ DEFAULT_REQUEST_TIMEOUT: '2147483' }).defaults.timeoutSeconds).toBe(2_147_483);
    expect(() => loadSettings({ DEFAULT_REQUEST_TIMEOUT: '2147484' })).toThrow(/DEFAULT_REQUEST_TIMEOUT/);
  });
});

describe('parseToolList', () => {
  it('splits and trims', () => {
    expect(parseToolList('a, b ,c')).toEqual(['a', 'b', 'c']);
    expect(parseToolList('')).toEqual([]);
  });
});
