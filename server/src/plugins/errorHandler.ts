import fp from 'fastify-plugin';
import type { FastifyError } from 'fastify';
import Database from 'better-sqlite3';
import type { ApiErrorResponse } from '@office-duties/shared';
import { AppError, StoreError } from '../errors/AppError.js';

/**
 * Driver errors that escape a service become StoreErrors; the driver's
 * message never reaches the client.
 */
function toAppError(error: FastifyError): AppError | undefined {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Database.SqliteError) {
    return new StoreError('Database operation failed', error);
  }
  return undefined;
}

export default fp(
  async function errorHandlerPlugin(fastify) {
    fastify.setErrorHandler<FastifyError>((error, request, reply) => {
      // Known application errors
      const appError = toAppError(error);
      if (appError) {
        const level = appError.statusCode >= 500 ? 'error' : 'warn';
        request.log[level]({ err: error }, appError.message);

        const response: ApiErrorResponse = {
          error: {
            code: appError.code,
            message: appError.message,
            ...(appError.details && { details: appError.details }),
          },
        };
        return reply.status(appError.statusCode).send(response);
      }

      // Fastify/AJV validation errors (schema validation), one entry per violated field
      if (error.validation) {
        request.log.warn({ err: error }, 'Validation error');

        const details: Record<string, unknown> = {
          fields: error.validation.map((v) => ({
            path: v.instancePath || '/',
            message: v.message,
            ...(v.params && { params: v.params }),
          })),
        };

        const response: ApiErrorResponse = {
          error: {
            code: 'VALIDATION_ERROR',
            message: 'Validation failed',
            details,
          },
        };
        return reply.status(400).send(response);
      }

      // Malformed JSON bodies and other client errors raised by Fastify itself
      if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
        request.log.warn({ err: error }, error.message);

        const response: ApiErrorResponse = {
          error: {
            code: 'VALIDATION_ERROR',
            message: error.message,
          },
        };
        return reply.status(error.statusCode).send(response);
      }

      // Unknown/unexpected errors
      request.log.error({ err: error }, 'Unhandled error');

      const isProduction = fastify.config.nodeEnv === 'production';
      const response: ApiErrorResponse = {
        error: {
          code: 'INTERNAL_ERROR',
          message: isProduction ? 'An internal error occurred' : error.message,
        },
      };
      return reply.status(500).send(response);
    });
  },
  {
    name: 'error-handler',
    dependencies: ['config'],
  },
);
