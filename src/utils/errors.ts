/**
 * Error types raised while talking to the JSS Classic API
 */

export class JssApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly errorCode?: string,
    public readonly suggestions: string[] = [],
    public readonly context?: Record<string, unknown>,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'JssApiError';
  }

  toDetailedString(): string {
    const parts = [`${this.name}: ${this.message}`];
    if (this.statusCode !== undefined) parts.push(`Status: ${this.statusCode}`);
    if (this.errorCode) parts.push(`Code: ${this.errorCode}`);
    if (this.context && Object.keys(this.context).length > 0) {
      parts.push(`Context: ${JSON.stringify(this.context)}`);
    }
    if (this.suggestions.length > 0) {
      parts.push(`Suggestions: ${this.suggestions.join('; ')}`);
    }
    return parts.join(' | ');
  }
}

/**
 * No response was received: connection refused, DNS failure, timeout
 */
export class NetworkError extends JssApiError {
  constructor(message: string, context?: Record<string, unknown>, originalError?: Error, errorCode = 'NETWORK_ERROR') {
    super(
      message,
      undefined,
      errorCode,
      ['Check that CASPER_HOST is reachable from this machine', 'Raise CASPER_TIMEOUT_MS for slow servers'],
      context,
      originalError
    );
    this.name = 'NetworkError';
  }

  static fromError(error: Error, context?: Record<string, unknown>): NetworkError {
    return new NetworkError(error.message, context, error);
  }
}

/**
 * The server answered with a non-2xx status
 */
export class HttpStatusError extends JssApiError {
  constructor(message: string, statusCode: number, context?: Record<string, unknown>, originalError?: Error) {
    const suggestions =
      statusCode === 404 ? ['Verify the identifier still exists and CASPER_HOST points at the right server'] : [];
    super(message, statusCode, `HTTP_${statusCode}`, suggestions, context, originalError);
    this.name = 'HttpStatusError';
  }
}

/**
 * Credentials were rejected (401) or lack privileges (403)
 */
export class AuthenticationError extends JssApiError {
  constructor(message: string, context?: Record<string, unknown>, statusCode = 401, originalError?: Error) {
    super(
      message,
      statusCode,
      'AUTHENTICATION_ERROR',
      ['Check CASPER_USER and CASPER_PASS', 'The account needs read privileges for computers and patch reporting'],
      context,
      originalError
    );
    this.name = 'AuthenticationError';
  }
}

/**
 * The payload decoded but does not have the expected shape
 */
export class MalformedResponseError extends JssApiError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(
      message,
      undefined,
      'MALFORMED_RESPONSE',
      ['Make sure the server honours Accept: application/json on /JSSResource'],
      context
    );
    this.name = 'MalformedResponseError';
  }
}
