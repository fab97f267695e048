/**
 * Microsoft Graph API Utility Functions
 */

import { GraphRequest } from '@microsoft/microsoft-graph-client';
import { DirectoryFetchError, FetchFailureKind } from '../services/base/errors';

export interface GraphQueryOptions {
  select?: string[];
  top?: number;
}

export interface GraphCollectionPage<T> {
  data: T[];
  nextLink?: string;
}

/**
 * Build a Graph API request with common query parameters
 */
export function buildGraphRequest(
  request: GraphRequest,
  options: GraphQueryOptions
): GraphRequest {
  if (options.select) {
    request = request.select(options.select.join(','));
  }

  if (options.top) {
    request = request.top(options.top);
  }

  return request;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Parse a Graph collection response into its items and paging links
 */
export function parseGraphResponse<T>(
  response: unknown,
  isItem: (value: unknown) => value is T
): GraphCollectionPage<T> {
  if (!isRecord(response)) {
    return { data: [] };
  }

  const value = response.value;
  const nextLink = response['@odata.nextLink'];

  return {
    data: Array.isArray(value) ? value.filter(isItem) : [],
    nextLink: typeof nextLink === 'string' ? nextLink : undefined
  };
}

const PERMISSION_CODES = new Set([
  'Authorization_RequestDenied',
  'Authentication_RequestFromNonPremiumTenantOrB2CTenant',
  'InvalidAuthenticationToken',
  'Forbidden',
  'accessDenied'
]);

const TRANSIENT_CODES = new Set([
  'TooManyRequests',
  'Request_Timeout',
  'serviceNotAvailable',
  'ServiceUnavailable',
  'generalException',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN'
]);

const TRANSIENT_STATUS = new Set([408, 429, 500, 502, 503, 504]);

interface GraphErrorDetails {
  statusCode?: number;
  code?: string;
  message: string;
}

function extractErrorDetails(error: unknown): GraphErrorDetails {
  if (!isRecord(error)) {
    return { message: String(error) };
  }

  const statusCode = typeof error.statusCode === 'number' && error.statusCode > 0
    ? error.statusCode
    : undefined;

  let code = typeof error.code === 'string' ? error.code : undefined;
  // Node's fetch reports socket failures on the cause
  if (!code && isRecord(error.cause) && typeof error.cause.code === 'string') {
    code = error.cause.code;
  }

  const message = typeof error.message === 'string' && error.message && error.message !== '[object Object]'
    ? error.message
    : 'Unknown Graph API error';

  return { statusCode, code, message };
}

export function classifyGraphError(error: unknown): FetchFailureKind {
  const { statusCode, code } = extractErrorDetails(error);

  if ((code && PERMISSION_CODES.has(code)) || statusCode === 401 || statusCode === 403) {
    return 'permission';
  }

  if ((code && TRANSIENT_CODES.has(code)) || (statusCode !== undefined && TRANSIENT_STATUS.has(statusCode))) {
    return 'transient';
  }

  return 'unknown';
}

const REMEDIATION: Record<FetchFailureKind, string> = {
  permission: 'Grant the read scopes User.Read.All, AuditLog.Read.All and Directory.Read.All (a Global Reader sign-in is enough) and run again.',
  transient: 'The service was unavailable or throttled the request. Run the audit again later.',
  unknown: 'Check the request details above and run again.'
};

/**
 * Wrap a Graph SDK failure so the operator sees what went wrong and what to do about it
 */
export function toDirectoryFetchError(error: unknown, operation: string): DirectoryFetchError {
  const details = extractErrorDetails(error);
  const kind = classifyGraphError(error);
  const status = [details.statusCode, details.code].filter(part => part !== undefined).join(' ');
  const label = status ? ` (${status})` : '';

  return new DirectoryFetchError(
    `${operation} failed${label}: ${details.message.replace(/\.+$/, '')}. ${REMEDIATION[kind]}`,
    kind,
    details.statusCode,
    error instanceof Error ? error : undefined
  );
}
