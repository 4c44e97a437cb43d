import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import { initialStatus, policyOf } from '../lib/approvalPolicy.js';
import { AuthorizationError, ValidationError } from '../lib/errors.js';
import { fromCents, type Cents } from '../lib/money.js';
import { authorizeOverride } from '../lib/overrideAuthorizer.js';
import { previewBatch, priceFor, type BatchPricingSummary } from '../lib/pricingEngine.js';
import { repairCreated, type RepairCreatedEvent } from '../lib/repairEvents.js';
import { assertInitialStatus } from '../lib/repairStatusMachine.js';
import type {
  ApprovalPolicy,
  CustomerPricingProfile,
  RepairOrigin,
  RepairRecord,
  RepairStatus,
  RepositoryBundle,
  UnitOfWork
} from '../repositories/contracts.js';

export const MAX_BREAKS_PER_BATCH = 25;
const MAX_UNIT_NUMBER_LENGTH = 50;

export type BreakSpec = {
  damageType: string;
  description?: string | null;
  overridePrice?: Cents | null;
  overrideReason?: string | null;
};

export type CreateBatchInput = {
  customerId: string;
  technicianId: string;
  unitNumber: string;
  breaks: BreakSpec[];
  /** technician whose override permission is checked; defaults to `technicianId` */
  actingTechnicianId?: string;
};

export type CreateSingleInput = BreakSpec & {
  customerId: string;
  technicianId: string;
  unitNumber: string;
  origin: RepairOrigin;
  actingTechnicianId?: string;
};

export type RepairCreationResult = {
  batchId: string | null;
  repairs: RepairRecord[];
  total: Cents;
  event: RepairCreatedEvent;
};

export type BatchPreview = BatchPricingSummary & {
  customerId: string;
  unitNumber: string;
  currentCount: number;
  usesCustomPricing: boolean;
};

export type BatchCoordinatorDeps = {
  repositories: RepositoryBundle;
  unitOfWork: UnitOfWork;
  log: FastifyBaseLogger;
  newId?: () => string;
};

type CreationPlan = {
  customerId: string;
  technicianId: string;
  unitNumber: string;
  origin: RepairOrigin;
  batchId: string | null;
  breaks: Array<BreakSpec & { override: { price: Cents; reason: string; by: string } | null }>;
  profile: CustomerPricingProfile | null;
  policy: ApprovalPolicy;
};

function normalizeUnitNumber(unitNumber: string): string {
  const trimmed = unitNumber.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_UNIT_NUMBER_LENGTH) {
    throw new ValidationError(
      `unit number must be 1-${MAX_UNIT_NUMBER_LENGTH} characters`,
      'UNIT_NUMBER_INVALID'
    );
  }
  return trimmed;
}

function hasOverride(spec: BreakSpec): spec is BreakSpec & { overridePrice: Cents } {
  return spec.overridePrice !== undefined && spec.overridePrice !== null;
}

/**
 * Creates one or more repairs on a unit as a single all-or-nothing unit of work.
 *
 * Everything that can be rejected without touching storage (input shape, entity
 * lookups, override authorization) is checked before the transaction opens. Inside it,
 * each break advances the unit counter, is priced from the resulting tier index, and
 * gets its initial status; any failure rolls back every row and counter increment.
 */
export class BatchCoordinator {
  private readonly newId: () => string;

  constructor(private readonly deps: BatchCoordinatorDeps) {
    this.newId = deps.newId ?? randomUUID;
  }

  /** Field-discovered breaks found in one technician session. */
  async createBatch(input: CreateBatchInput): Promise<RepairCreationResult> {
    const plan = await this.plan({
      customerId: input.customerId,
      technicianId: input.technicianId,
      unitNumber: input.unitNumber,
      origin: 'FIELD',
      breaks: input.breaks,
      actingTechnicianId: input.actingTechnicianId ?? input.technicianId,
      grouped: true
    });
    return this.execute(plan);
  }

  /** The N=1 case of `createBatch`, without a batch id; the only path for customer requests. */
  async createSingle(input: CreateSingleInput): Promise<RepairCreationResult> {
    const plan = await this.plan({
      customerId: input.customerId,
      technicianId: input.technicianId,
      unitNumber: input.unitNumber,
      origin: input.origin,
      breaks: [
        {
          damageType: input.damageType,
          description: input.description,
          overridePrice: input.overridePrice,
          overrideReason: input.overrideReason
        }
      ],
      actingTechnicianId: input.actingTechnicianId ?? input.technicianId,
      grouped: false
    });
    return this.execute(plan);
  }

  async previewBatch(customerId: string, unitNumber: string, breakCount: number): Promise<BatchPreview> {
    if (!Number.isInteger(breakCount) || breakCount < 1 || breakCount > MAX_BREAKS_PER_BATCH) {
      throw new ValidationError(`break count must be between 1 and ${MAX_BREAKS_PER_BATCH}`, 'BATCH_SIZE_INVALID');
    }

    const unit = normalizeUnitNumber(unitNumber);
    const { repositories } = this.deps;
    const customer = await repositories.customers.getById(customerId);
    if (!customer) {
      throw new ValidationError(`customer not found: ${customerId}`, 'CUSTOMER_NOT_FOUND');
    }

    const [profile, currentCount, lifetimeRepairs] = await Promise.all([
      repositories.customers.getPricingProfile(customerId),
      repositories.counters.getCount(customerId, unit),
      repositories.counters.customerTotal(customerId)
    ]);

    return {
      customerId,
      unitNumber: unit,
      currentCount,
      usesCustomPricing: Boolean(profile?.usesCustomPricing),
      ...previewBatch({ profile, currentCount, lifetimeRepairs, breakCount })
    };
  }

  private async plan(input: {
    customerId: string;
    technicianId: string;
    unitNumber: string;
    origin: RepairOrigin;
    breaks: BreakSpec[];
    actingTechnicianId: string;
    grouped: boolean;
  }): Promise<CreationPlan> {
    if (input.breaks.length === 0) {
      throw new ValidationError('a batch needs at least one break', 'BATCH_EMPTY');
    }
    if (input.breaks.length > MAX_BREAKS_PER_BATCH) {
      throw new ValidationError(`a batch holds at most ${MAX_BREAKS_PER_BATCH} breaks`, 'BATCH_SIZE_INVALID');
    }

    const unitNumber = normalizeUnitNumber(input.unitNumber);
    input.breaks.forEach((spec, index) => {
      if (spec.damageType.trim().length === 0) {
        throw new ValidationError(`break ${index + 1} is missing a damage type`, 'DAMAGE_TYPE_REQUIRED');
      }
    });

    const wantsOverride = input.breaks.some(hasOverride);
    if (input.origin === 'CUSTOMER' && wantsOverride) {
      throw new ValidationError('customer repair requests cannot carry a price override', 'OVERRIDE_NOT_ALLOWED');
    }

    const { repositories } = this.deps;
    const onBehalf = input.actingTechnicianId !== input.technicianId;
    const [customer, technician, actor] = await Promise.all([
      repositories.customers.getById(input.customerId),
      repositories.technicians.getById(input.technicianId),
      wantsOverride || onBehalf
        ? repositories.technicians.getAuthorization(input.actingTechnicianId)
        : Promise.resolve(null)
    ]);
    if (!customer) {
      throw new ValidationError(`customer not found: ${input.customerId}`, 'CUSTOMER_NOT_FOUND');
    }
    if (!technician) {
      throw new ValidationError(`technician not found: ${input.technicianId}`, 'TECHNICIAN_NOT_FOUND');
    }
    if (onBehalf && !(actor?.isManager && actor.managedTechnicianIds.has(input.technicianId))) {
      throw new AuthorizationError(
        `${input.actingTechnicianId} cannot submit repairs on behalf of ${input.technicianId}`,
        'NOT_TEAM_MANAGER'
      );
    }

    const breaks = input.breaks.map((spec) => {
      if (!hasOverride(spec)) {
        return { ...spec, override: null };
      }
      const price = authorizeOverride(actor, { proposedPrice: spec.overridePrice, reason: spec.overrideReason });
      return {
        ...spec,
        override: { price, reason: (spec.overrideReason ?? '').trim(), by: input.actingTechnicianId }
      };
    });

    const [profile, preference] = await Promise.all([
      repositories.customers.getPricingProfile(input.customerId),
      repositories.customers.getApprovalPreference(input.customerId)
    ]);

    return {
      customerId: input.customerId,
      technicianId: input.technicianId,
      unitNumber,
      origin: input.origin,
      batchId: input.grouped ? this.newId() : null,
      breaks,
      profile,
      policy: policyOf(preference)
    };
  }

  private async execute(plan: CreationPlan): Promise<RepairCreationResult> {
    const totalBreaks = plan.breaks.length;

    const repairs = await this.deps.unitOfWork.run(async (scope) => {
      const created: RepairRecord[] = [];
      let lifetimeBefore: number | null = null;

      for (const [offset, spec] of plan.breaks.entries()) {
        const breakNumber = offset + 1;
        const tierIndex = await scope.counters.nextIndex(plan.customerId, plan.unitNumber);
        if (lifetimeBefore === null) {
          // read under the counter lock; the total already includes this break
          lifetimeBefore = (await scope.counters.customerTotal(plan.customerId)) - 1;
        }

        const quote = priceFor({
          profile: plan.profile,
          tierIndex,
          lifetimeRepairs: lifetimeBefore + offset
        });

        const status: RepairStatus =
          plan.origin === 'CUSTOMER' ? 'REQUESTED' : initialStatus(plan.policy, breakNumber);
        assertInitialStatus(plan.origin, status);

        const override = spec.override;
        created.push(
          await scope.repairs.insert({
            repairId: this.newId(),
            customerId: plan.customerId,
            technicianId: plan.technicianId,
            unitNumber: plan.unitNumber,
            damageType: spec.damageType.trim(),
            description: spec.description?.trim() || null,
            origin: plan.origin,
            status,
            tierIndex,
            basePrice: quote.basePrice,
            discount: override ? 0 : quote.discount,
            price: override ? override.price : quote.price,
            priceSource: override ? 'OVERRIDE' : 'TIER',
            overrideReason: override?.reason ?? null,
            overriddenBy: override?.by ?? null,
            batchId: plan.batchId,
            breakNumber,
            totalBreaksInBatch: totalBreaks
          })
        );
      }

      return created;
    });

    const event = repairCreated(repairs, new Date().toISOString());
    this.deps.log.info(
      {
        batchId: plan.batchId,
        customerId: plan.customerId,
        unitNumber: plan.unitNumber,
        origin: plan.origin,
        repairIds: repairs.map((repair) => repair.repairId),
        tierIndexes: repairs.map((repair) => repair.tierIndex),
        total: fromCents(event.total)
      },
      'repair.batch_created'
    );

    return { batchId: plan.batchId, repairs, total: event.total, event };
  }
}
