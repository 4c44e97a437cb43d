import type { CustomerPricingProfile } from '../repositories/contracts.js';
import { applyPercentDiscount, sumCents, toCents, type Cents } from './money.js';

export const DEFAULT_TIER_PRICES: readonly Cents[] = [50, 40, 35, 30, 25].map((dollars) => toCents(dollars));

export type PriceQuote = {
  tierIndex: number;
  basePrice: Cents;
  discount: Cents;
  price: Cents;
  volumeDiscountApplied: boolean;
};

export type PriceRequest = {
  profile: CustomerPricingProfile | null;
  /** 0-based position of this repair in the unit's history */
  tierIndex: number;
  /** customer's repairs across all units before the one being priced */
  lifetimeRepairs: number;
};

export function resolveTierPrices(profile: CustomerPricingProfile | null): readonly Cents[] {
  if (profile?.usesCustomPricing && profile.tierPrices.length > 0) {
    return profile.tierPrices;
  }
  return DEFAULT_TIER_PRICES;
}

export function qualifiesForVolumeDiscount(
  profile: CustomerPricingProfile | null,
  lifetimeRepairs: number
): boolean {
  // the discount is part of a custom pricing agreement; default-tier customers never get it
  if (!profile?.usesCustomPricing || profile.volumeDiscountThreshold === null || profile.volumeDiscountPercent === null) {
    return false;
  }
  return profile.volumeDiscountPercent > 0 && lifetimeRepairs >= profile.volumeDiscountThreshold;
}

/**
 * Prices the Nth repair of a unit. Tier lookup clamps to the last tier, so the final
 * price repeats for every later repair; the volume discount is applied on top and
 * rounded half-up to the cent.
 */
export function priceFor(request: PriceRequest): PriceQuote {
  if (!Number.isInteger(request.tierIndex) || request.tierIndex < 0) {
    throw new RangeError(`tier index must be a non-negative integer, got ${request.tierIndex}`);
  }

  const tiers = resolveTierPrices(request.profile);
  const basePrice = tiers[Math.min(request.tierIndex, tiers.length - 1)];

  if (!request.profile || !qualifiesForVolumeDiscount(request.profile, request.lifetimeRepairs)) {
    return { tierIndex: request.tierIndex, basePrice, discount: 0, price: basePrice, volumeDiscountApplied: false };
  }

  const price = applyPercentDiscount(basePrice, request.profile.volumeDiscountPercent ?? 0);
  return {
    tierIndex: request.tierIndex,
    basePrice,
    discount: basePrice - price,
    price,
    volumeDiscountApplied: true
  };
}

export type BatchBreakQuote = PriceQuote & {
  breakNumber: number;
};

export type BatchPricingSummary = {
  totalBreaks: number;
  total: Cents;
  highest: Cents | null;
  lowest: Cents | null;
  breakdown: BatchBreakQuote[];
};

export function summarizeBatch(breakdown: BatchBreakQuote[]): BatchPricingSummary {
  const prices = breakdown.map((quote) => quote.price);
  return {
    totalBreaks: breakdown.length,
    total: sumCents(prices),
    highest: prices.length > 0 ? Math.max(...prices) : null,
    lowest: prices.length > 0 ? Math.min(...prices) : null,
    breakdown
  };
}

/**
 * Quotes `breakCount` consecutive repairs on a unit without touching the counter:
 * break i is priced as tier `currentCount + i - 1` and sees the earlier breaks in its
 * lifetime total, which is what creating the batch would do.
 */
export function previewBatch(input: {
  profile: CustomerPricingProfile | null;
  currentCount: number;
  lifetimeRepairs: number;
  breakCount: number;
}): BatchPricingSummary {
  const breakdown: BatchBreakQuote[] = [];
  for (let offset = 0; offset < input.breakCount; offset += 1) {
    const quote = priceFor({
      profile: input.profile,
      tierIndex: input.currentCount + offset,
      lifetimeRepairs: input.lifetimeRepairs + offset
    });
    breakdown.push({ ...quote, breakNumber: offset + 1 });
  }
  return summarizeBatch(breakdown);
}

export type PricingDescription = {
  customerId: string;
  usesCustomPricing: boolean;
  tiers: readonly Cents[];
  defaultTiers: readonly Cents[];
  volumeDiscount: { enabled: boolean; threshold: number | null; percent: number | null };
};

export function describePricing(customerId: string, profile: CustomerPricingProfile | null): PricingDescription {
  const percent = profile?.volumeDiscountPercent ?? null;
  const threshold = profile?.volumeDiscountThreshold ?? null;
  return {
    customerId,
    usesCustomPricing: Boolean(profile?.usesCustomPricing && profile.tierPrices.length > 0),
    tiers: resolveTierPrices(profile),
    defaultTiers: DEFAULT_TIER_PRICES,
    volumeDiscount: {
      enabled: Boolean(profile?.usesCustomPricing) && threshold !== null && (percent ?? 0) > 0,
      threshold,
      percent
    }
  };
}
