import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { callerFromHeaders } from './caller-context.js';
import { UserValves, resolveCredentials } from './credentials.js';

const defaults = { proxyApiKey: 'default-key', backendToken: '', timeoutSeconds: 120 };

describe('resolveCredentials', () => {
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the defaults without a caller', () => {
    expect(resolveCredentials(undefined, defaults)).toEqual(defaults);
    expect(resolveCredentials({}, defaults)).toEqual(defaults);
    expect(resolveCredentials({ valves: null }, defaults)).toEqual(defaults);
  });

  it('uses a UserValves instance as-is', () => {
    const valves = new UserValves('test-key', 'test-pat', 300);
    expect(resolveCredentials({ valves }, defaults)).toEqual({
      proxyApiKey: 'test-key',
      backendToken: 'test-pat',
      timeoutSeconds: 300,
    });
  });

  it('fills a partial mapping from the defaults', () => {
    expect(resolveCredentials({ valves: { backendToken: 'test-pat' } }, defaults)).toEqual({
      proxyApiKey: 'default-key',
      backendToken: 'test-pat',
      timeoutSeconds: 120,
    });
    expect(warn).not.toHaveBeenCalled();
  });

  it('coerces a numeric timeout given as text', () => {
    expect(resolveCredentials({ valves: { timeoutSeconds: '60' } }, defaults).timeoutSeconds).toBe(60);
  });

  it('falls back to the defaults for malformed valves', () => {
    expect(resolveCredentials({ valves: { timeoutSeconds: 'soon' } }, defaults)).toEqual(defaults);
    expect(resolveCredentials({ valves: { backendToken: 42 } }, defaults)).toEqual(defaults);
    expect(resolveCredentials({ valves: ['test-pat'] }, defaults)).toEqual(defaults);
    expect(resolveCredentials({ valves: 'test-pat' }, defaults)).toEqual(defaults);
  });

  it('keeps the caller token when only the timeout is malformed', () => {
    const processDefaults = { proxyApiKey: '', backendToken: 'process-pat', timeoutSeconds: 120 };
    const caller = callerFromHeaders({ 'x-jira-pat': 'caller-pat', 'x-request-timeout': '90s' });

    expect(resolveCredentials(caller, processDefaults)).toEqual({
      proxyApiKey: '',
      backendToken: 'caller-pat',
      timeoutSeconds: 120,
    });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe('[CREDENTIALS] Ignoring malformed timeoutSeconds:');
  });

  it('replaces only the malformed field of a mapping', () => {
    expect(
      resolveCredentials({ valves: { proxyApiKey: 'test-key', backendToken: 7, timeoutSeconds: 45 } }, defaults)
    ).toEqual({ proxyApiKey: 'test-key', backendToken: '', timeoutSeconds: 45 });
  });

  it('rejects a timeout too large for a timer', () => {
    expect(resolveCredentials({ valves: { timeoutSeconds: 2_147_483 } }, defaults).timeoutSeconds).toBe(2_147_483);
    expect(resolveCredentials({ valves: { timeoutSeconds: 10_368_000 } }, defaults).timeoutSeconds).toBe(120);
  });

  it('returns a fresh record each time', () => {
    const first = resolveCredentials(undefined, defaults);
    expect(first).not.toBe(defaults);
  });
});
