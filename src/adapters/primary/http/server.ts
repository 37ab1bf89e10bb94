import fastify, { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { ValidationError } from '../../../domain/errors/ValidationError';
import { InventoryRecordNotFoundError } from '../../../domain/errors/InventoryRecordNotFoundError';
import { InventoryRecordAlreadyExistsError } from '../../../domain/errors/InventoryRecordAlreadyExistsError';
import { InsufficientInventoryError } from '../../../domain/errors/InsufficientInventoryError';
import { OptimisticLockError } from '../../../domain/errors/OptimisticLockError';
import { InfrastructureError } from '../../../domain/errors/InfrastructureError';

/**
 * Fastify Server Configuration
 *
 * This module configures the Fastify HTTP server with:
 * - Global error handling for domain, validation and store errors
 * - CORS support
 * - JSON logging with Pino
 *
 * **Architecture:** This is a Primary Adapter in Hexagonal Architecture.
 * It translates HTTP requests into use case calls and domain outcomes
 * back into HTTP responses.
 *
 * **Error mapping:**
 *
 * | Error | Status | Code |
 * |-------|--------|------|
 * | ZodError, ValidationError | 400 | VALIDATION_FAILED |
 * | InventoryRecordNotFoundError | 404 | RECORD_NOT_FOUND |
 * | InventoryRecordAlreadyExistsError | 409 | RECORD_ALREADY_EXISTS |
 * | OptimisticLockError | 409 | VERSION_CONFLICT |
 * | InsufficientInventoryError | 422 | INSUFFICIENT_INVENTORY |
 * | InfrastructureError | 503 | STORE_UNAVAILABLE |
 */

/**
 * Create and configure a Fastify server instance
 *
 * @returns Configured Fastify instance ready to register routes
 */
export function createServer(): FastifyInstance {
  const server = fastify({
    logger:
      process.env['NODE_ENV'] === 'test'
        ? false // Disable logging in tests
        : {
            level: process.env['LOG_LEVEL'] || 'info',
          },
  });

  void server.register(cors, {
    origin: true,
  });

  server.setErrorHandler((error: Error, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_FAILED',
          message: 'Request validation failed',
          details: error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        },
      });
    }

    if (error instanceof ValidationError) {
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_FAILED',
          message: error.message,
          details: error.details,
        },
      });
    }

    if (error instanceof InventoryRecordNotFoundError) {
      return reply.status(404).send({
        error: {
          code: 'RECORD_NOT_FOUND',
          message: error.message,
        },
      });
    }

    if (error instanceof InventoryRecordAlreadyExistsError) {
      return reply.status(409).send({
        error: {
          code: 'RECORD_ALREADY_EXISTS',
          message: error.message,
        },
      });
    }

    if (error instanceof OptimisticLockError) {
      return reply.status(409).send({
        error: {
          code: 'VERSION_CONFLICT',
          message: error.message,
          attempts: error.attempts,
        },
      });
    }

    if (error instanceof InsufficientInventoryError) {
      return reply.status(422).send({
        error: {
          code: 'INSUFFICIENT_INVENTORY',
          message: error.message,
          delta: error.delta,
          observedQuantity: error.observedQuantity,
        },
      });
    }

    if (error instanceof InfrastructureError) {
      request.log.error(error);
      return reply.status(503).send({
        error: {
          code: 'STORE_UNAVAILABLE',
          message: 'The inventory store is unavailable',
        },
      });
    }

    // Fastify's own client errors (malformed JSON, unsupported media type)
    if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: 'BAD_REQUEST',
          message: error.message,
        },
      });
    }

    // Log unexpected errors
    request.log.error(error);

    return reply.status(500).send({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      },
    });
  });

  return server;
}

/**
 * Start the Fastify server
 *
 * @param server - Fastify instance
 * @param port - Port to listen on (default: 3000)
 * @param host - Host to bind to (default: 0.0.0.0)
 */
export async function startServer(
  server: FastifyInstance,
  port = 3000,
  host = '0.0.0.0'
): Promise<void> {
  await server.listen({ port, host });
  server.log.info(`Server listening on ${host}:${port}`);
}
