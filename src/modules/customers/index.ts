import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { fromCents } from '../../lib/money.js';
import { describePricing } from '../../lib/pricingEngine.js';
import { canView } from '../../lib/repairStatusMachine.js';
import { assertCustomerScope, requireActor } from '../../plugins/requestActor.js';
import { NotFoundError } from '../../lib/errors.js';
import { policyOf } from '../../lib/approvalPolicy.js';

const customerParamsSchema = z.object({
  customerId: z.string().trim().min(1)
});

const unitParamsSchema = customerParamsSchema.extend({
  unitNumber: z.string().trim().min(1).max(50)
});

export const customerRoutes: FastifyPluginAsync = async (app) => {
  async function loadCustomer(customerId: string) {
    const customer = await app.repositories.customers.getById(customerId);
    if (!customer) {
      throw new NotFoundError(`customer not found: ${customerId}`, 'CUSTOMER_NOT_FOUND');
    }
    return customer;
  }

  app.get('/customers/:customerId/pricing', async (req, reply) => {
    const { customerId } = customerParamsSchema.parse(req.params);
    const actor = await requireActor(app, req);
    assertCustomerScope(actor, customerId);
    await loadCustomer(customerId);

    const [profile, preference, lifetimeRepairs] = await Promise.all([
      app.repositories.customers.getPricingProfile(customerId),
      app.repositories.customers.getApprovalPreference(customerId),
      app.repositories.counters.customerTotal(customerId)
    ]);
    const pricing = describePricing(customerId, profile);

    return reply.send({
      ok: true,
      data: {
        customerId,
        usesCustomPricing: pricing.usesCustomPricing,
        tiers: pricing.tiers.map(fromCents),
        defaultTiers: pricing.defaultTiers.map(fromCents),
        volumeDiscount: {
          enabled: pricing.volumeDiscount.enabled,
          threshold: pricing.volumeDiscount.threshold,
          percent: pricing.volumeDiscount.percent === null ? null : fromCents(pricing.volumeDiscount.percent)
        },
        approvalPolicy: policyOf(preference),
        lifetimeRepairs
      }
    });
  });

  app.get('/customers/:customerId/units', async (req, reply) => {
    const { customerId } = customerParamsSchema.parse(req.params);
    const actor = await requireActor(app, req);
    assertCustomerScope(actor, customerId);
    await loadCustomer(customerId);

    const counters = await app.repositories.counters.listForCustomer(customerId);
    return reply.send({
      ok: true,
      data: counters.map((counter) => ({ unitNumber: counter.unitNumber, repairCount: counter.count }))
    });
  });

  app.get('/customers/:customerId/units/:unitNumber', async (req, reply) => {
    const { customerId, unitNumber } = unitParamsSchema.parse(req.params);
    const actor = await requireActor(app, req);
    assertCustomerScope(actor, customerId);

    const [preview, active] = await Promise.all([
      app.batchCoordinator.previewBatch(customerId, unitNumber, 1),
      app.repairWorkflow.findActiveForUnit(customerId, unitNumber)
    ]);
    const [next] = preview.breakdown;

    return reply.send({
      ok: true,
      data: {
        customerId,
        unitNumber: preview.unitNumber,
        repairCount: preview.currentCount,
        nextTierIndex: next?.tierIndex ?? preview.currentCount,
        nextPrice: next ? fromCents(next.price) : null,
        activeRepair:
          active && canView(actor, active)
            ? { repairId: active.repairId, status: active.status }
            : active
              ? { repairId: null, status: 'HIDDEN' }
              : null
      }
    });
  });
};
