import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AuthorizationError } from '../lib/errors.js';
import type { RepairActor } from '../lib/repairStatusMachine.js';

const actorHeadersSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('technician'),
    id: z.string().trim().min(1)
  }),
  z.object({
    kind: z.literal('customer'),
    id: z.string().trim().min(1),
    customerId: z.string().trim().min(1)
  })
]);

function readHeader(req: FastifyRequest, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Resolves the acting party from `x-actor-kind`, `x-actor-id` and, for customers,
 * `x-customer-id`. Technicians are loaded with their manager scope.
 */
export async function requireActor(app: FastifyInstance, req: FastifyRequest): Promise<RepairActor> {
  const parsed = actorHeadersSchema.safeParse({
    kind: readHeader(req, 'x-actor-kind'),
    id: readHeader(req, 'x-actor-id'),
    customerId: readHeader(req, 'x-customer-id')
  });
  if (!parsed.success) {
    throw new AuthorizationError(
      'x-actor-kind and x-actor-id headers are required (customers also send x-customer-id)',
      'ACTOR_REQUIRED',
      401
    );
  }

  const headers = parsed.data;
  return headers.kind === 'technician'
    ? app.repairWorkflow.technicianActor(headers.id)
    : app.repairWorkflow.customerActor(headers.customerId, headers.id);
}

export async function requireTechnician(
  app: FastifyInstance,
  req: FastifyRequest
): Promise<Extract<RepairActor, { kind: 'technician' }>> {
  const actor = await requireActor(app, req);
  if (actor.kind !== 'technician') {
    throw new AuthorizationError('this action is performed by technicians', 'TECHNICIAN_REQUIRED');
  }
  return actor;
}

export async function requireCustomer(
  app: FastifyInstance,
  req: FastifyRequest
): Promise<Extract<RepairActor, { kind: 'customer' }>> {
  const actor = await requireActor(app, req);
  if (actor.kind !== 'customer') {
    throw new AuthorizationError('this action is performed by the customer', 'CUSTOMER_REQUIRED');
  }
  return actor;
}

/** Customers are confined to their own account; technicians pass through. */
export function assertCustomerScope(actor: RepairActor, customerId: string) {
  if (actor.kind === 'customer' && actor.customerId !== customerId) {
    throw new AuthorizationError(`customer ${actor.customerId} cannot act on account ${customerId}`, 'CUSTOMER_SCOPE');
  }
}
