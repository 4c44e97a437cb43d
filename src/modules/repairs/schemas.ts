import { z } from 'zod';
import { toCents } from '../../lib/money.js';
import { REPAIR_STATUSES } from '../../repositories/contracts.js';
import { MAX_BREAKS_PER_BATCH } from '../../services/batchCoordinator.js';

export const moneySchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  try {
    return toCents(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : 'invalid amount'
    });
    return z.NEVER;
  }
});

const breakSchema = z.object({
  damageType: z.string().trim().min(1),
  description: z.string().trim().max(2000).optional(),
  overridePrice: moneySchema.optional(),
  overrideReason: z.string().trim().min(1).optional()
});

export const createSingleSchema = breakSchema.extend({
  customerId: z.string().trim().min(1),
  technicianId: z.string().trim().min(1),
  unitNumber: z.string().trim().min(1).max(50),
  origin: z.enum(['CUSTOMER', 'FIELD'])
});

export const createBatchSchema = z.object({
  customerId: z.string().trim().min(1),
  technicianId: z.string().trim().min(1).optional(),
  unitNumber: z.string().trim().min(1).max(50),
  breaks: z.array(breakSchema).min(1).max(MAX_BREAKS_PER_BATCH)
});

export const previewSchema = z.object({
  customerId: z.string().trim().min(1),
  unitNumber: z.string().trim().min(1).max(50),
  breakCount: z.coerce.number().int().min(1).max(MAX_BREAKS_PER_BATCH)
});

export const resolveSchema = z.object({
  approved: z.boolean(),
  notes: z.string().trim().max(2000).optional()
});

export const assignSchema = z.object({
  assignToTechnicianId: z.string().trim().min(1)
});

export const repairParamsSchema = z.object({
  repairId: z.string().trim().min(1)
});

export const batchParamsSchema = z.object({
  batchId: z.string().trim().min(1)
});

const statusSchema = z.enum(REPAIR_STATUSES);

export const listQuerySchema = z.object({
  status: z
    .union([statusSchema, z.array(statusSchema)])
    .optional()
    .transform((value) => (value === undefined ? undefined : Array.isArray(value) ? value : [value])),
  customerId: z.string().trim().min(1).optional(),
  unitNumber: z.string().trim().min(1).optional(),
  batchId: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50)
});
