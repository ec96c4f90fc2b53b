import statusMessages from './status-messages.json' with { type: 'json' };

export const HTTP_VERSION = 'HTTP/1.1';

const REASON_PHRASES: Record<string, string> = statusMessages;

// Methods that only read; they may not appear inside a changeset.
const QUERY_METHODS = new Set(['GET', 'HEAD', 'OPTIONS', 'TRACE']);

export function isQueryMethod(method: string): boolean {
  return QUERY_METHODS.has(method.toUpperCase());
}

/**
 * Reason phrase for a status code, `Unknown Status Code` when none is registered.
 */
export function getStatusMessage(statusCode: number): string {
  return REASON_PHRASES[String(statusCode)] ?? 'Unknown Status Code';
}
