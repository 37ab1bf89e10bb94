import { FastifyInstance } from 'fastify';
import type { IInventoryRepository } from '../../../../modules/inventory/application/ports/IInventoryRepository';
import { ProvisionInventoryUseCase } from '../../../../modules/inventory/application/use-cases/ProvisionInventoryUseCase';
import { GetInventoryUseCase } from '../../../../modules/inventory/application/use-cases/GetInventoryUseCase';
import { AdjustInventoryUseCase } from '../../../../modules/inventory/application/use-cases/AdjustInventoryUseCase';
import {
  OptimisticUpdater,
  type OptimisticUpdaterOptions,
} from '../../../../modules/inventory/application/services/OptimisticUpdater';
import { outcomeToError } from '../../../../modules/inventory/application/services/outcomeToError';
import { InventoryRecordNotFoundError } from '../../../../domain/errors/InventoryRecordNotFoundError';
import { isSuccess } from '../../../../modules/inventory/domain/value-objects/UpdateOutcome';
import {
  AdjustInventorySchema,
  AdjustmentResponseSchema,
  InventoryParamsSchema,
  InventoryResponseSchema,
  ProvisionInventorySchema,
  type InventoryResponse,
} from '../../../../shared/validation/schemas';
import type { InventoryRecord } from '../../../../modules/inventory/domain/entities/InventoryRecord';

/**
 * Inventory Routes Module
 *
 * - POST /inventory - Provision a record at version 0
 * - GET /inventory/:id - Read a record
 * - POST /inventory/:id/adjustments - Apply a signed delta with optimistic concurrency control
 *
 * **Architecture:**
 * This is a Primary Adapter that:
 * 1. Validates requests using Zod schemas
 * 2. Calls use case execute() methods
 * 3. Maps domain entities and outcomes to HTTP responses
 *
 * Failed adjustment outcomes are converted to typed errors and left to the
 * server's error handler.
 */

function mapRecordToResponse(record: InventoryRecord): InventoryResponse {
  return {
    id: record.id,
    quantity: record.quantity,
    version: record.version,
    createdAt: record.createdAt.toISO() ?? '',
    updatedAt: record.updatedAt.toISO() ?? '',
  };
}

/**
 * Register inventory routes on Fastify server
 *
 * @param server - Fastify instance
 * @param repository - Inventory store used by every route
 * @param updaterOptions - Retry settings for adjustments
 */
export function registerInventoryRoutes(
  server: FastifyInstance,
  repository: IInventoryRepository,
  updaterOptions: OptimisticUpdaterOptions = {}
): void {
  const provisionUseCase = new ProvisionInventoryUseCase(repository);
  const getUseCase = new GetInventoryUseCase(repository);
  const adjustUseCase = new AdjustInventoryUseCase(
    new OptimisticUpdater(repository, updaterOptions)
  );

  /**
   * POST /inventory - Provision a record
   *
   * **Response Codes:**
   * - 201: Record created
   * - 400: Invalid input
   * - 409: Id already taken
   */
  server.post<{
    Body: unknown;
  }>('/inventory', async (request, reply) => {
    const body = ProvisionInventorySchema.parse(request.body);

    const record = await provisionUseCase.execute(body);

    return reply.status(201).send(InventoryResponseSchema.parse(mapRecordToResponse(record)));
  });

  /**
   * GET /inventory/:id - Retrieve a record
   *
   * **Response Codes:**
   * - 200: Record found
   * - 400: Malformed id
   * - 404: Record not found
   */
  server.get<{
    Params: { id: string };
  }>('/inventory/:id', async (request, reply) => {
    const params = InventoryParamsSchema.parse(request.params);

    const record = await getUseCase.execute(params.id);
    if (!record) {
      throw new InventoryRecordNotFoundError(params.id);
    }

    return reply.status(200).send(InventoryResponseSchema.parse(mapRecordToResponse(record)));
  });

  /**
   * POST /inventory/:id/adjustments - Apply a delta
   *
   * **Request Body:** { delta: integer, maxAttempts?: integer }
   *
   * **Response Codes:**
   * - 200: Adjustment committed
   * - 400: Invalid input
   * - 404: Record not found
   * - 409: Version conflicts on every attempt
   * - 422: Quantity would go negative
   * - 503: Store failure
   */
  server.post<{
    Params: { id: string };
    Body: unknown;
  }>('/inventory/:id/adjustments', async (request, reply) => {
    const params = InventoryParamsSchema.parse(request.params);

    const body = AdjustInventorySchema.parse(request.body);

    const outcome = await adjustUseCase.execute(params.id, body);
    if (!isSuccess(outcome)) {
      throw outcomeToError(outcome);
    }

    return reply.status(200).send(
      AdjustmentResponseSchema.parse({
        id: outcome.id,
        quantity: outcome.finalQuantity,
        version: outcome.version,
        attempts: outcome.attempts,
      })
    );
  });
}
