/**
 * errors.ts: Typed MCP error responses for all tool handlers.
 *
 * MCP tool errors are returned as successful MCP responses (not thrown)
 * with isError: true and a structured content block. This lets agents
 * read the error_code and decide whether to retry or surface to user.
 */

import { RemoteRequestError, SpotifyError } from '../client/types.js';

export type ToolErrorCode =
  | 'MISSING_SCOPE'
  | 'TOO_MANY_IDS'
  | 'RATE_LIMITED'
  | 'TOKEN_EXPIRED'
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'INVALID_INPUT'
  | 'UPSTREAM_ERROR'
  | 'INTERNAL_ERROR';

export interface ToolErrorPayload {
  error_code: ToolErrorCode;
  message: string;
  retryable: boolean;
}

/**
 * toolError: builds a structured MCP error response envelope.
 *
 * Returns the shape expected by McpServer tool handlers:
 *   { isError: true, content: [{ type: 'text', text: JSON.stringify(payload) }] }
 */
export function toolError(
  code: ToolErrorCode,
  message: string,
  retryable = false,
): { isError: true; content: Array<{ type: 'text'; text: string }> } {
  const payload: ToolErrorPayload = { error_code: code, message, retryable };
  return {
    isError: true,
    content: [{ type: 'text', text: JSON.stringify(payload) }],
  };
}

/**
 * toolSuccess: wraps a plain object as a successful MCP content envelope.
 *
 * All tool handlers return content blocks with type 'text' containing JSON.
 */
export function toolSuccess(
  data: unknown,
): { content: Array<{ type: 'text'; text: string }> } {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

/**
 * classifyError: maps SpotifyClient errors to ToolErrorCode.
 *
 * Called in every tool handler's catch block.
 */
export function classifyError(error: unknown): ReturnType<typeof toolError> {
  if (!(error instanceof SpotifyError)) {
    return toolError('INTERNAL_ERROR', error instanceof Error ? error.message : String(error), false);
  }
  switch (error.code) {
    case 'MISSING_SCOPE':
      return toolError('MISSING_SCOPE', error.message, false);
    case 'TOO_MANY_IDENTIFIERS':
      return toolError('TOO_MANY_IDS', error.message, false);
    case 'INVALID_URI':
    case 'UNSUPPORTED_DIRECTION':
    case 'READ_ONLY':
      return toolError('INVALID_INPUT', error.message, false);
    case 'REMOTE_REQUEST_FAILED':
      return classifyRemote(error.message, error instanceof RemoteRequestError ? error.statusCode : null);
    case 'UNRECOGNIZED_ITEM_KIND':
    case 'PARSE_ERROR':
      return toolError('UPSTREAM_ERROR', error.message, false);
  }
}

function classifyRemote(message: string, statusCode: number | null): ReturnType<typeof toolError> {
  switch (statusCode) {
    case 429:
      return toolError('RATE_LIMITED', message, true);
    case 401:
      return toolError('TOKEN_EXPIRED', message, false);
    case 403:
      return toolError('PERMISSION_DENIED', message, false);
    case 404:
      return toolError('NOT_FOUND', message, false);
    default:
      return toolError('UPSTREAM_ERROR', message, statusCode === null || statusCode >= 500);
  }
}
