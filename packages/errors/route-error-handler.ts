import type { FastifyReply } from 'fastify';
import { getLogger, type Logger } from '@kernel/logger';
import { getRequestId } from '@kernel/request-context';
import {
  AppError,
  ErrorCodes,
  isErrorCode,
  type ErrorCode,
  type ErrorResponse,
  shouldExposeErrorDetails,
} from './index';

interface RouteErrorHandlerOptions {
  /** Logger instance or service name string (will create a logger) */
  logger: Logger | string;
}

/**
* Shape of errors raised by Fastify itself (body parsing, content type)
*/
interface HttpErrorLike {
  message: string;
  statusCode: number;
  code?: unknown;
}

function isHttpErrorLike(error: unknown): error is HttpErrorLike {
  if (!(error instanceof Error)) {
    return false;
  }
  const statusCode: unknown = Reflect.get(error, 'statusCode');
  return typeof statusCode === 'number';
}

/**
 * Creates a reusable error handler for Fastify route catch blocks.
 *
 * Usage:
 *   const handleError = createRouteErrorHandler({ logger: 'routes:posts' });
 *   app.post('/api/posts', async (req, res) => {
 *     try { ... } catch (error) {
 *       return handleError(res, error, 'create content item');
 *     }
 *   });
 */
export function createRouteErrorHandler(options: RouteErrorHandlerOptions) {
  const log = typeof options.logger === 'string'
    ? getLogger(options.logger)
    : options.logger;

  return function handleRouteError(
    res: FastifyReply,
    error: unknown,
    operationDescription: string,
  ): FastifyReply {
    const requestId = getRequestId();
    const err = error instanceof Error ? error : new Error(String(error));

    let statusCode = 500;
    let errorCode: ErrorCode = ErrorCodes.INTERNAL_ERROR;
    let clientMessage = 'An error occurred processing your request';

    if (error instanceof AppError) {
      statusCode = error.statusCode;
      errorCode = error.code;
      clientMessage = error.message;
    } else if (isHttpErrorLike(error) && error.statusCode >= 400 && error.statusCode < 500) {
      // Client errors raised by Fastify (malformed JSON, wrong content type)
      statusCode = error.statusCode;
      errorCode = isErrorCode(error.code) ? error.code : ErrorCodes.INVALID_PARAMS;
      clientMessage = error.message;
    }

    // 4xx are expected outcomes; only server-side failures log at error level
    if (statusCode >= 500) {
      log.error(`${operationDescription} failed`, err, { requestId, operation: operationDescription });
    } else {
      log.warn(`${operationDescription} rejected`, { requestId, code: errorCode, error: err.message });
    }

    const response: ErrorResponse = {
      error: clientMessage,
      code: errorCode,
      requestId,
    };

    if (error instanceof AppError && error.details !== undefined && statusCode < 500) {
      // Validation issues are meant for the client
      response.details = error.details;
    } else if (shouldExposeErrorDetails()) {
      response.details = {
        operation: operationDescription,
        originalMessage: err.message,
        ...(err.cause instanceof Error ? { cause: err.cause.message } : {}),
      };
    }

    return res.status(statusCode).send(response);
  };
}
