import { fromCents } from '../../lib/money.js';
import type { BatchPreview } from '../../services/batchCoordinator.js';
import type { ApprovalDecision, RepairRecord } from '../../repositories/contracts.js';

export function presentRepair(repair: RepairRecord) {
  return {
    ...repair,
    basePrice: fromCents(repair.basePrice),
    discount: fromCents(repair.discount),
    price: fromCents(repair.price)
  };
}

export type RepairView = ReturnType<typeof presentRepair>;

export function presentDecision(decision: ApprovalDecision | null) {
  return decision ? { ...decision } : null;
}

export function presentPreview(preview: BatchPreview) {
  return {
    customerId: preview.customerId,
    unitNumber: preview.unitNumber,
    currentCount: preview.currentCount,
    usesCustomPricing: preview.usesCustomPricing,
    totalBreaks: preview.totalBreaks,
    total: fromCents(preview.total),
    highest: preview.highest === null ? null : fromCents(preview.highest),
    lowest: preview.lowest === null ? null : fromCents(preview.lowest),
    breakdown: preview.breakdown.map((quote) => ({
      breakNumber: quote.breakNumber,
      tierIndex: quote.tierIndex,
      basePrice: fromCents(quote.basePrice),
      discount: fromCents(quote.discount),
      price: fromCents(quote.price),
      volumeDiscountApplied: quote.volumeDiscountApplied
    }))
  };
}
