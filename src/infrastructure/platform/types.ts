/**
 * scopeline - Platform Types
 *
 * Protocol-agnostic request/response shapes the pipeline operates on.
 * A host adapter translates its transport's request into a
 * {@link ScopelineRequest} and writes the resulting {@link ScopelineResponse}
 * back out.
 */

/**
 * HTTP Status codes
 */
export enum HttpStatus {
  OK = 200,
  CREATED = 201,
  NO_CONTENT = 204,

  BAD_REQUEST = 400,
  UNAUTHORIZED = 401,
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  CONFLICT = 409,

  INTERNAL_SERVER_ERROR = 500,
  SERVICE_UNAVAILABLE = 503,
}

/**
 * Protocol type for multi-protocol support
 */
export type ProtocolType = 'http' | 'grpc' | 'websocket' | 'message-queue';

/**
 * Abstract Response - Protocol-agnostic response structure
 */
export interface ScopelineResponse<T = unknown> {
  /** Response status code (HTTP-style) */
  status: number;

  /** Response headers */
  headers: Record<string, string | string[]>;

  /** Response body */
  body?: T;
}

/**
 * Abstract Request - Protocol-agnostic request structure
 */
export interface ScopelineRequest<T = unknown> {
  /** Request ID */
  id: string;

  /** HTTP method or operation type */
  method: string;

  /** Request path/route */
  path: string;

  /** Request headers */
  headers: Record<string, string | string[] | undefined>;

  /** Query parameters */
  query: Record<string, string | string[] | undefined>;

  /** Request body */
  body?: T;

  /** Protocol type */
  protocol: ProtocolType;
}

/**
 * Error response body
 */
export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
  traceId?: string;
  timestamp?: string;
  path?: string;
  stack?: string;
}

/**
 * Create an error response
 */
export function createErrorResponse(
  status: number,
  error: string,
  message: string,
  details?: unknown,
): ScopelineResponse<ErrorResponse> {
  return {
    status,
    headers: { 'Content-Type': 'application/json' },
    body: {
      error,
      message,
      statusCode: status,
      details,
      timestamp: new Date().toISOString(),
    },
  };
}
