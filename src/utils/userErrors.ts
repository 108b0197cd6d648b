import { FetchError, QueryValidationError } from '../errors.js';
import { logger } from './logger.js';

/**
 * Maps technical error messages to user-friendly messages.
 * The original message is logged at debug level.
 */

// Common error patterns and their user-friendly equivalents
const ERROR_PATTERNS: Array<{ pattern: RegExp; message: string }> = [
  // Network errors
  { pattern: /ECONNREFUSED/i, message: 'Unable to connect to the search service. Please try again later.' },
  { pattern: /ECONNRESET/i, message: 'Connection was interrupted. Please try again.' },
  { pattern: /ETIMEDOUT|ECONNABORTED|timeout/i, message: 'The request timed out. Please try again.' },
  { pattern: /ENOTFOUND|EAI_AGAIN/i, message: 'The search service could not be reached. Please check your connection.' },
  { pattern: /network\s*(error|failure)/i, message: 'Network error. Please check your connection and try again.' },
  { pattern: /socket hang up/i, message: 'Connection was lost. Please try again.' },

  // File system errors (downloads, manifests)
  { pattern: /ENOENT/i, message: 'The requested file or folder was not found.' },
  { pattern: /EACCES|EPERM/i, message: 'Permission denied while writing to the output folder.' },
  { pattern: /ENOSPC/i, message: 'Storage space is full.' },
];

// HTTP statuses with specific messages
const STATUS_MAP: Record<number, string> = {
  400: 'The search service rejected the request parameters.',
  401: 'The search service requires authentication.',
  403: 'The search service refused the request.',
  404: 'The search endpoint was not found.',
  429: 'Too many requests. Please wait a moment and try again.',
};

function messageForFetchError(error: FetchError): string | null {
  switch (error.kind) {
    case 'cancelled':
      return 'The search was cancelled.';
    case 'decode':
      return 'The search service returned an unexpected response.';
    case 'http_status':
      if (error.status !== undefined && STATUS_MAP[error.status]) return STATUS_MAP[error.status];
      if (error.status !== undefined && error.status >= 500) {
        return 'The search service is temporarily unavailable. Please try again later.';
      }
      return `The search service responded with HTTP ${error.status ?? 'error'}.`;
    case 'transport':
      return null;
  }
}

/**
 * Converts a technical error to a user-friendly message.
 *
 * @param context - Optional label for the debug log (e.g., 'collect', 'download')
 */
export function toUserFriendlyError(error: unknown, context?: string): string {
  const originalMessage =
    typeof error === 'string' ? error : error instanceof Error ? error.message : 'Unknown error';

  if (context) {
    logger.debug(`[${context}] Original error: ${originalMessage}`);
  }

  if (error instanceof QueryValidationError) {
    return error.issues.join('; ');
  }

  if (error instanceof FetchError) {
    const mapped = messageForFetchError(error);
    if (mapped) return mapped;
  }

  const text = error instanceof FetchError ? error.detail : originalMessage;
  for (const { pattern, message } of ERROR_PATTERNS) {
    if (pattern.test(text)) {
      return message;
    }
  }

  if (error instanceof FetchError) {
    return 'Could not reach the search service. Please check your connection and try again.';
  }

  logger.warn(`Unrecognized error (${context || 'unknown'}): ${originalMessage}`);

  if (isUserFriendlyMessage(originalMessage)) {
    return originalMessage;
  }

  return 'An unexpected error occurred. Please try again.';
}

/**
 * Checks if a message is already user-friendly (no technical jargon)
 */
function isUserFriendlyMessage(message: string): boolean {
  // Too long = likely technical
  if (message.length > 200) return false;

  // Contains stack trace indicators
  if (/^\s*at\s+/m.test(message)) return false;

  // Contains common code patterns
  if (/\.(js|ts):\d+/.test(message)) return false;

  // Contains error codes in ALL_CAPS format
  if (/\b[A-Z]{3,}_[A-Z_]+\b/.test(message) && !/\b(URL|API|ID)\b/.test(message)) return false;

  return true;
}
