import { z } from 'zod';
import { MAX_TIMEOUT_SECONDS } from './mcp/transport.js';
import type { CallerContext, ResolvedCredentials } from './types.js';

/**
 * Typed per-user settings. Hosts that already hold one of these can put it
 * on the caller context directly.
 */
export class UserValves implements ResolvedCredentials {
  constructor(
    public readonly proxyApiKey: string = '',
    public readonly backendToken: string = '',
    public readonly timeoutSeconds: number = 120
  ) {}
}

// A bad field falls back on its own; the valid ones the caller sent still apply
function fallback<T>(field: keyof ResolvedCredentials, value: T) {
  return ({ error }: { error: z.ZodError }): T => {
    console.warn(`[CREDENTIALS] Ignoring malformed ${field}:`, error.issues);
    return value;
  };
}

function valvesSchema(defaults: ResolvedCredentials) {
  return z.object({
    proxyApiKey: z.string().default(defaults.proxyApiKey).catch(fallback('proxyApiKey', defaults.proxyApiKey)),
    backendToken: z.string().default(defaults.backendToken).catch(fallback('backendToken', defaults.backendToken)),
    timeoutSeconds: z.coerce
      .number()
      .int()
      .positive()
      .max(MAX_TIMEOUT_SECONDS)
      .default(defaults.timeoutSeconds)
      .catch(fallback('timeoutSeconds', defaults.timeoutSeconds)),
  });
}

/**
 * Turns whatever the host put on the caller context into one credentials
 * record. Missing valves give `defaults`, and so does each malformed field
 * of a mapping; this never throws.
 */
export function resolveCredentials(
  caller: CallerContext | null | undefined,
  defaults: ResolvedCredentials
): ResolvedCredentials {
  const valves = caller?.valves;
  if (valves === null || valves === undefined) {
    return { ...defaults };
  }

  if (valves instanceof UserValves) {
    return {
      proxyApiKey: valves.proxyApiKey,
      backendToken: valves.backendToken,
      timeoutSeconds: valves.timeoutSeconds,
    };
  }

  if (typeof valves === 'object' && !Array.isArray(valves)) {
    const parsed = valvesSchema(defaults).safeParse(valves);
    if (parsed.success) {
      return parsed.data;
    }
    console.warn('[CREDENTIALS] Ignoring malformed user valves:', parsed.error.issues);
  }

  return { ...defaults };
}
