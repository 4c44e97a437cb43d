import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { getCorrelationId } from '../../lib/apiError.js';
import { AuthorizationError } from '../../lib/errors.js';
import { fromCents } from '../../lib/money.js';
import type { RepairDomainEvent } from '../../lib/repairEvents.js';
import type { ApiEnvelope } from '../../lib/types.js';
import { requireMutationApiKey } from '../../plugins/apiKeyAuth.js';
import {
  assertCustomerScope,
  requireActor,
  requireCustomer,
  requireTechnician
} from '../../plugins/requestActor.js';
import type { RepairCreationResult } from '../../services/batchCoordinator.js';
import type { TransitionResult } from '../../services/repairWorkflow.js';
import { presentDecision, presentPreview, presentRepair, type RepairView } from './presenters.js';
import {
  assignSchema,
  batchParamsSchema,
  createBatchSchema,
  createSingleSchema,
  listQuerySchema,
  previewSchema,
  repairParamsSchema,
  resolveSchema
} from './schemas.js';

type CreationView = {
  batchId: string | null;
  total: string;
  repairs: RepairView[];
  activeRepairId: string | null;
};

type TransitionView = {
  repairs: RepairView[];
  decisions: ReturnType<typeof presentDecision>[];
};

function presentCreation(result: RepairCreationResult, activeRepairId: string | null): CreationView {
  return {
    batchId: result.batchId,
    total: fromCents(result.total),
    repairs: result.repairs.map(presentRepair),
    activeRepairId
  };
}

function presentTransition(result: TransitionResult): TransitionView {
  return {
    repairs: result.repairs.map(presentRepair),
    decisions: result.decisions.map(presentDecision)
  };
}

export const repairRoutes: FastifyPluginAsync = async (app) => {
  // runs after the unit of work has committed, so a dispatch failure must not fail the request
  async function dispatch(req: FastifyRequest, events: readonly RepairDomainEvent[]) {
    try {
      await app.repairEventQueue.enqueueAll(events);
    } catch (error) {
      req.log.error(
        { err: error, eventIds: events.map((event) => event.eventId) },
        'repair_event.dispatch_failed'
      );
    }
  }

  app.post('/repairs', { preHandler: requireMutationApiKey }, async (req, reply) => {
    const body = createSingleSchema.parse(req.body);
    const actor = await requireActor(app, req);
    assertCustomerScope(actor, body.customerId);
    if (actor.kind === 'customer' && body.origin !== 'CUSTOMER') {
      throw new AuthorizationError('customers can only submit CUSTOMER repair requests', 'CUSTOMER_ORIGIN_ONLY');
    }

    const active = await app.repairWorkflow.findActiveForUnit(body.customerId, body.unitNumber);
    const result = await app.batchCoordinator.createSingle({
      ...body,
      actingTechnicianId: actor.kind === 'technician' ? actor.technicianId : undefined
    });
    await dispatch(req, [result.event]);

    const envelope: ApiEnvelope<CreationView> = {
      ok: true,
      data: presentCreation(result, active?.repairId ?? null),
      correlationId: getCorrelationId(req, reply)
    };
    return reply.code(201).send(envelope);
  });

  app.post('/repairs/batches', { preHandler: requireMutationApiKey }, async (req, reply) => {
    const body = createBatchSchema.parse(req.body);
    const actor = await requireTechnician(app, req);

    const active = await app.repairWorkflow.findActiveForUnit(body.customerId, body.unitNumber);
    const result = await app.batchCoordinator.createBatch({
      customerId: body.customerId,
      technicianId: body.technicianId ?? actor.technicianId,
      unitNumber: body.unitNumber,
      breaks: body.breaks,
      actingTechnicianId: actor.technicianId
    });
    await dispatch(req, [result.event]);

    const envelope: ApiEnvelope<CreationView> = {
      ok: true,
      data: presentCreation(result, active?.repairId ?? null),
      correlationId: getCorrelationId(req, reply)
    };
    return reply.code(201).send(envelope);
  });

  app.post('/repairs/batches/preview', { preHandler: requireMutationApiKey }, async (req, reply) => {
    const body = previewSchema.parse(req.body);
    const actor = await requireActor(app, req);
    assertCustomerScope(actor, body.customerId);

    const preview = await app.batchCoordinator.previewBatch(body.customerId, body.unitNumber, body.breakCount);
    return reply.send({ ok: true, data: presentPreview(preview) });
  });

  app.post('/repairs/batches/:batchId/resolve', { preHandler: requireMutationApiKey }, async (req, reply) => {
    const { batchId } = batchParamsSchema.parse(req.params);
    const body = resolveSchema.parse(req.body);
    const actor = await requireCustomer(app, req);

    const result = await app.repairWorkflow.resolveBatch(
      { batchId, approved: body.approved, decidedBy: actor.userId, notes: body.notes },
      actor
    );
    await dispatch(req, result.events);
    return reply.send({ ok: true, data: presentTransition(result) });
  });

  app.post('/repairs/:repairId/resolve', { preHandler: requireMutationApiKey }, async (req, reply) => {
    const { repairId } = repairParamsSchema.parse(req.params);
    const body = resolveSchema.parse(req.body);
    const actor = await requireCustomer(app, req);

    const result = await app.repairWorkflow.resolvePending(
      { repairId, approved: body.approved, decidedBy: actor.userId, notes: body.notes },
      actor
    );
    await dispatch(req, result.events);
    return reply.send({ ok: true, data: presentTransition(result) });
  });

  app.post('/repairs/:repairId/assign', { preHandler: requireMutationApiKey }, async (req, reply) => {
    const { repairId } = repairParamsSchema.parse(req.params);
    const body = assignSchema.parse(req.body);
    const actor = await requireTechnician(app, req);

    const result = await app.repairWorkflow.assignRequested({
      repairId,
      assignToTechnicianId: body.assignToTechnicianId,
      assignedByManagerId: actor.technicianId
    });
    await dispatch(req, result.events);
    return reply.send({ ok: true, data: presentTransition(result) });
  });

  app.post('/repairs/:repairId/start', { preHandler: requireMutationApiKey }, async (req, reply) => {
    const { repairId } = repairParamsSchema.parse(req.params);
    const actor = await requireTechnician(app, req);

    const result = await app.repairWorkflow.startWork(repairId, actor);
    await dispatch(req, result.events);
    return reply.send({ ok: true, data: presentTransition(result) });
  });

  app.post('/repairs/:repairId/complete', { preHandler: requireMutationApiKey }, async (req, reply) => {
    const { repairId } = repairParamsSchema.parse(req.params);
    const actor = await requireTechnician(app, req);

    const result = await app.repairWorkflow.completeWork(repairId, actor);
    await dispatch(req, result.events);
    return reply.send({ ok: true, data: presentTransition(result) });
  });

  app.get('/repairs', async (req, reply) => {
    const query = listQuerySchema.parse(req.query);
    const actor = await requireActor(app, req);

    const repairs = await app.repairWorkflow.listVisible(actor, {
      customerId: query.customerId,
      statuses: query.status,
      unitNumber: query.unitNumber,
      batchId: query.batchId,
      limit: query.limit
    });
    return reply.send({ ok: true, data: repairs.map(presentRepair) });
  });

  app.get('/repairs/:repairId', async (req, reply) => {
    const { repairId } = repairParamsSchema.parse(req.params);
    const actor = await requireActor(app, req);

    const repair = await app.repairWorkflow.getVisible(repairId, actor);
    const approval = await app.repositories.approvals.getByRepair(repairId);
    return reply.send({ ok: true, data: { ...presentRepair(repair), approval: presentDecision(approval) } });
  });
};
