/**
 * Error taxonomy for the NetBox MCP server
 *
 * Everything thrown below the tool layer is one of these. The tool layer
 * converts them into `{ success: false, error }` envelopes (see result.ts),
 * except ConfigurationError, which aborts startup.
 */

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'NOT_FOUND'
  | 'MALFORMED_RESPONSE'
  | 'INVALID_ARGUMENTS';

export class NetBoxMcpError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'NetBoxMcpError';
  }
}

/**
 * Required connection settings are missing or unusable.
 */
export class ConfigurationError extends NetBoxMcpError {
  constructor(
    public readonly variable: string,
    message: string,
    public readonly example?: string
  ) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * NetBox answered with a non-2xx status, or the request never completed.
 * `status` is undefined for timeouts and network failures.
 */
export class TransportError extends NetBoxMcpError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly statusText?: string
  ) {
    super('TRANSPORT_ERROR', message);
    this.name = 'TransportError';
  }
}

export class NotFoundError extends NetBoxMcpError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class MalformedResponseError extends NetBoxMcpError {
  constructor(message: string) {
    super('MALFORMED_RESPONSE', message);
    this.name = 'MalformedResponseError';
  }
}

export interface ArgumentIssue {
  path: string;
  message: string;
}

export class InvalidArgumentsError extends NetBoxMcpError {
  constructor(
    public readonly tool: string,
    public readonly issues: ArgumentIssue[]
  ) {
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    super('INVALID_ARGUMENTS', `Invalid arguments for ${tool}: ${summary}`);
    this.name = 'InvalidArgumentsError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
