export type JiraConnectorErrorKind =
  | 'configuration'
  | 'transport'
  | 'protocol'
  | 'timeout'
  | 'argument'
  | 'policy';

export class JiraConnectorError extends Error {
  constructor(
    public readonly kind: JiraConnectorErrorKind,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }

  /** JSON payload handed back to the host in place of a tool result. */
  toPayload(): string {
    return JSON.stringify({ error: this.message });
  }
}

export class ConfigurationError extends JiraConnectorError {
  constructor(
    message: string,
    public readonly hint?: string
  ) {
    super('configuration', message);
  }

  override toPayload(): string {
    return this.hint
      ? JSON.stringify({ error: this.message, message: this.hint })
      : JSON.stringify({ error: this.message });
  }
}

export class TransportError extends JiraConnectorError {
  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super('transport', `HTTP ${status}: ${body}`);
  }
}

export class ProtocolError extends JiraConnectorError {
  constructor(
    public readonly payload: unknown,
    message: string = `MCP Error: ${JSON.stringify(payload)}`
  ) {
    super('protocol', message);
  }
}

export class TimeoutError extends JiraConnectorError {
  constructor(public readonly timeoutSeconds: number) {
    super('timeout', `Request timeout after ${timeoutSeconds}s`);
  }
}

export class ArgumentError extends JiraConnectorError {
  constructor(message: string) {
    super('argument', message);
  }
}

export class PolicyDenied extends JiraConnectorError {
  constructor(public readonly operation: string) {
    super('policy', `Read-only mode blocks: ${operation}`);
  }

  override toPayload(): string {
    return readOnlyMessage(this.operation);
  }
}

export function readOnlyMessage(operation: string): string {
  return [
    '🔒 **Read-Only Mode Active**',
    '',
    `I cannot ${operation} because the Jira integration is running in read-only mode. Your administrator configured this safety setting.`,
    '',
    'To perform this action:',
    '1. Ask your administrator to enable write access, or',
    '2. Perform the action directly in Jira',
  ].join('\n');
}

export const notConfiguredError = () =>
  new ConfigurationError(
    'Jira PAT not configured',
    'Please configure your Jira Personal Access Token in User Settings'
  );

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
