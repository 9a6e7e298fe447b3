/**
 * scopeline - Exceptions Module
 *
 * HTTP exceptions and the exception filters the host maps faults with
 */

export {
  createExceptionFilter,
  HttpException,
  BadRequestException,
  UnauthorizedException,
  NotFoundException,
  DefaultExceptionFilter,
  ExceptionFilterChain,
} from './exceptions';

export type {
  IExceptionFilter,
  ExceptionFilterFunction,
  ExceptionContext,
  DefaultExceptionFilterOptions,
} from './exceptions';
