import { type FastifyInstance } from 'fastify';
import { DatabaseError } from 'pg';
import { AppError, ErrorCode, createLogger } from '@inkwell/shared';

const logger = createLogger({ name: 'api:error' });

const PG_UNIQUE_VIOLATION = '23505';

// socket-level failures reaching the database server
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENOTFOUND',
  'EPIPE',
]);

// pg's own client errors carry no code
const PG_CONNECTION_MESSAGES = [
  'Connection terminated',
  'timeout exceeded when trying to connect',
  'Client has encountered a connection error',
];

function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ('code' in error && typeof error.code === 'string' && CONNECTION_ERROR_CODES.has(error.code)) {
    return true;
  }
  return PG_CONNECTION_MESSAGES.some((prefix) => error.message.startsWith(prefix));
}

/** Translates storage-layer failures into the public error taxonomy. */
export function toAppError(error: unknown): AppError | null {
  if (error instanceof AppError) return error;
  if (error instanceof DatabaseError) {
    if (error.code === PG_UNIQUE_VIOLATION) {
      return new AppError(ErrorCode.CONFLICT, 'Record already exists');
    }
    return new AppError(ErrorCode.STORAGE, 'Storage failure');
  }
  if (isConnectionError(error)) {
    return new AppError(ErrorCode.STORAGE, 'Storage failure');
  }
  return null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    const appError = toAppError(error);

    if (appError) {
      if (appError.code === ErrorCode.STORAGE) {
        logger.error({ err: error.message, requestId: request.id }, 'Storage error');
      } else {
        logger.warn({ code: appError.code, requestId: request.id }, appError.message);
      }
      return reply.status(appError.httpStatus).send(appError.toJSON());
    }

    // malformed JSON, oversized bodies and similar Fastify client errors
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      logger.warn({ code: error.code, requestId: request.id }, error.message);
      return reply.status(error.statusCode).send({
        code: ErrorCode.VALIDATION,
        message: error.message,
      });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(ErrorCode.NOT_FOUND, `Route ${request.method} ${request.url} not found`);
    return reply.status(error.httpStatus).send(error.toJSON());
  });
}
