/**
 * @fileoverview Exception Types and Exception Filters
 *
 * @packageDocumentation
 * @module scopeline/domain/exceptions
 *
 * ## Architectural Responsibility
 *
 * Faults raised anywhere in the pipeline (a middleware, a handler, or the
 * container failing to build a middleware) propagate up to the host's
 * error-handling stage. That stage turns them into a response by running an
 * {@link ExceptionFilterChain}:
 *
 * ```
 * throw NotFoundException         → DefaultExceptionFilter → 404
 * throw DependencyResolutionError → DefaultExceptionFilter → 500
 * ```
 *
 * Filters added with `useExceptionFilter` run first, in the order added, and
 * the default filter runs last. Each filter either returns a response or
 * rethrows to hand the error to the next filter. If no filter handles the error the chain answers with a plain
 * 500.
 */

import { RequestContext } from '../context';
import {
  ScopelineResponse,
  ErrorResponse,
  HttpStatus,
  createErrorResponse,
} from '../../infrastructure/platform/types';
import { ILogger, consoleLogger } from '../../application/host/logger';

/**
 * Exception context passed to filters
 */
export interface ExceptionContext {
  /** The caught exception */
  error: Error;

  /** Request context */
  context: RequestContext;

  /** Request path */
  path: string;

  /** HTTP method */
  method: string;

  /** Timestamp when exception occurred */
  timestamp: Date;
}

/**
 * Exception filter interface.
 *
 * @remarks
 * Throw from `catch` to pass the error to the next filter in the chain.
 */
export interface IExceptionFilter {
  catch(ctx: ExceptionContext): Promise<ScopelineResponse<ErrorResponse>>;
}

export type ExceptionFilterFunction = (
  ctx: ExceptionContext,
) => Promise<ScopelineResponse<ErrorResponse>>;

/**
 * Create an exception filter from a function
 */
export function createExceptionFilter(
  fn: ExceptionFilterFunction,
): IExceptionFilter {
  return { catch: fn };
}

// ==================== Built-in Exceptions ====================

/**
 * Base HTTP exception
 */
export class HttpException extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'HttpException';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestException extends HttpException {
  constructor(message: string = 'Bad Request', details?: unknown) {
    super(HttpStatus.BAD_REQUEST, message, details);
    this.name = 'BadRequestException';
  }
}

export class UnauthorizedException extends HttpException {
  constructor(message: string = 'Unauthorized', details?: unknown) {
    super(HttpStatus.UNAUTHORIZED, message, details);
    this.name = 'UnauthorizedException';
  }
}

export class NotFoundException extends HttpException {
  constructor(message: string = 'Not Found', details?: unknown) {
    super(HttpStatus.NOT_FOUND, message, details);
    this.name = 'NotFoundException';
  }
}

// ==================== Built-in Exception Filters ====================

/**
 * Options for {@link DefaultExceptionFilter}
 */
export interface DefaultExceptionFilterOptions {
  /** Include stack traces in responses (default: not in production) */
  includeStack?: boolean;

  /** Include error messages/details of non-HTTP errors (default: not in production) */
  includeDetails?: boolean;

  /** Log every handled error (default: true) */
  logErrors?: boolean;

  logger?: ILogger;
}

/**
 * Default exception filter - handles every error.
 *
 * @remarks
 * `HttpException`s keep their status code. Any other error (including
 * container resolution failures) becomes a 500; its message is only exposed
 * when `includeDetails` is on.
 */
export class DefaultExceptionFilter implements IExceptionFilter {
  private readonly options: Required<Omit<DefaultExceptionFilterOptions, 'logger'>>;
  private readonly logger: ILogger;

  constructor(options: DefaultExceptionFilterOptions = {}) {
    const isProduction = process.env.NODE_ENV === 'production';
    this.options = {
      includeStack: options.includeStack ?? !isProduction,
      includeDetails: options.includeDetails ?? !isProduction,
      logErrors: options.logErrors ?? true,
    };
    this.logger = options.logger ?? consoleLogger;
  }

  async catch(ctx: ExceptionContext): Promise<ScopelineResponse<ErrorResponse>> {
    const { error, context, path, method, timestamp } = ctx;
    const traceId = context.traceId;

    if (this.options.logErrors) {
      this.logger.error(`[${traceId}] Exception in ${method} ${path}:`, error);
    }

    if (error instanceof HttpException) {
      return {
        status: error.statusCode,
        headers: { 'Content-Type': 'application/json' },
        body: {
          error: error.name
            .replace('Exception', '')
            .replace(/([A-Z])/g, ' $1')
            .trim(),
          message: error.message,
          statusCode: error.statusCode,
          traceId,
          timestamp: timestamp.toISOString(),
          path,
          ...(this.options.includeDetails &&
            error.details !== undefined && { details: error.details }),
          ...(this.options.includeStack && { stack: error.stack }),
        },
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      headers: { 'Content-Type': 'application/json' },
      body: {
        error: 'Internal Server Error',
        message: this.options.includeDetails
          ? error.message
          : 'An unexpected error occurred',
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        traceId,
        timestamp: timestamp.toISOString(),
        path,
        ...(this.options.includeStack && { stack: error.stack }),
      },
    };
  }
}

/**
 * Exception filter chain - tries filters in order
 */
export class ExceptionFilterChain implements IExceptionFilter {
  private filters: IExceptionFilter[] = [];

  addFilter(filter: IExceptionFilter): this {
    this.filters.push(filter);
    return this;
  }

  get size(): number {
    return this.filters.length;
  }

  async catch(ctx: ExceptionContext): Promise<ScopelineResponse<ErrorResponse>> {
    let lastError: Error = ctx.error;

    for (const filter of this.filters) {
      try {
        return await filter.catch({ ...ctx, error: lastError });
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
      }
    }

    return createErrorResponse(
      HttpStatus.INTERNAL_SERVER_ERROR,
      'Internal Server Error',
      lastError.message,
    );
  }
}
