import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { MAX_TIMEOUT_SECONDS } from './mcp/transport.js';
import type { AppSettings } from './types.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

// Environment schema; every variable is optional and falls back to a default
const envSchema = z.object({
  MCP_SERVER_URL: z.string().url().default('http://localhost:4000/mcp/'),
  MCP_SERVER_GROUP: z.string().min(1).default('jira'),
  ENABLED_TOOLS: z.string().default(''),
  READ_ONLY_MODE: booleanFlag.default('true'),
  LITELLM_API_KEY: z.string().default(''),
  JIRA_PAT: z.string().default(''),
  DEFAULT_REQUEST_TIMEOUT: z.coerce.number().int().positive().max(MAX_TIMEOUT_SECONDS).default(120),
  PORT: z.coerce.number().int().positive().default(3333),
});

export function parseToolList(value: string): string[] {
  return value
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    serverUrl: vars.MCP_SERVER_URL,
    serverGroup: vars.MCP_SERVER_GROUP,
    enabledTools: parseToolList(vars.ENABLED_TOOLS),
    readOnly: vars.READ_ONLY_MODE,
    defaults: {
      proxyApiKey: vars.LITELLM_API_KEY,
      backendToken: vars.JIRA_PAT,
      timeoutSeconds: vars.DEFAULT_REQUEST_TIMEOUT,
    },
    port: vars.PORT,
  };
}
