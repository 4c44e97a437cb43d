import { describe, expect, it } from 'vitest';
import {
  DEFAULT_TIER_PRICES,
  describePricing,
  previewBatch,
  priceFor,
  summarizeBatch
} from '../src/lib/pricingEngine.js';
import type { CustomerPricingProfile } from '../src/repositories/contracts.js';

function profile(overrides: Partial<CustomerPricingProfile> = {}): CustomerPricingProfile {
  return {
    customerId: 'cust-1',
    usesCustomPricing: false,
    tierPrices: [],
    volumeDiscountThreshold: null,
    volumeDiscountPercent: null,
    ...overrides
  };
}

describe('priceFor', () => {
  it('walks the default tiers and repeats the last one', () => {
    const prices = [0, 1, 2, 3, 4, 5, 9].map(
      (tierIndex) => priceFor({ profile: null, tierIndex, lifetimeRepairs: 0 }).price
    );
    expect(prices).toEqual([5000, 4000, 3500, 3000, 2500, 2500, 2500]);
    expect(DEFAULT_TIER_PRICES).toEqual([5000, 4000, 3500, 3000, 2500]);
  });

  it('uses custom tiers only when the customer has them switched on', () => {
    const custom = profile({ usesCustomPricing: true, tierPrices: [4500, 4000] });
    expect(priceFor({ profile: custom, tierIndex: 0, lifetimeRepairs: 0 }).price).toBe(4500);
    expect(priceFor({ profile: custom, tierIndex: 5, lifetimeRepairs: 0 }).price).toBe(4000);

    const switchedOff = profile({ usesCustomPricing: false, tierPrices: [4500, 4000] });
    expect(priceFor({ profile: switchedOff, tierIndex: 0, lifetimeRepairs: 0 }).price).toBe(5000);

    const empty = profile({ usesCustomPricing: true, tierPrices: [] });
    expect(priceFor({ profile: empty, tierIndex: 1, lifetimeRepairs: 0 }).price).toBe(4000);
  });

  it('applies the volume discount once lifetime repairs reach the threshold', () => {
    const discounted = profile({ usesCustomPricing: true, volumeDiscountThreshold: 10, volumeDiscountPercent: 1500 });

    expect(priceFor({ profile: discounted, tierIndex: 2, lifetimeRepairs: 10 })).toEqual({
      tierIndex: 2,
      basePrice: 3500,
      discount: 525,
      price: 2975,
      volumeDiscountApplied: true
    });
    expect(priceFor({ profile: discounted, tierIndex: 2, lifetimeRepairs: 9 })).toEqual({
      tierIndex: 2,
      basePrice: 3500,
      discount: 0,
      price: 3500,
      volumeDiscountApplied: false
    });
  });

  it('never discounts a customer on default pricing', () => {
    const defaultTiers = profile({ usesCustomPricing: false, volumeDiscountThreshold: 10, volumeDiscountPercent: 1500 });

    expect(priceFor({ profile: defaultTiers, tierIndex: 2, lifetimeRepairs: 12 })).toEqual({
      tierIndex: 2,
      basePrice: 3500,
      discount: 0,
      price: 3500,
      volumeDiscountApplied: false
    });
    expect(describePricing('cust-1', defaultTiers).volumeDiscount).toEqual({
      enabled: false,
      threshold: 10,
      percent: 1500
    });
  });

  it('skips a zero percent discount', () => {
    const zero = profile({ usesCustomPricing: true, volumeDiscountThreshold: 0, volumeDiscountPercent: 0 });
    expect(priceFor({ profile: zero, tierIndex: 0, lifetimeRepairs: 50 }).volumeDiscountApplied).toBe(false);
  });

  it('rejects a negative tier index', () => {
    expect(() => priceFor({ profile: null, tierIndex: -1, lifetimeRepairs: 0 })).toThrow(RangeError);
  });
});

describe('previewBatch', () => {
  it('quotes consecutive tiers from the current count', () => {
    const preview = previewBatch({ profile: null, currentCount: 0, lifetimeRepairs: 0, breakCount: 3 });

    expect(preview.breakdown.map((quote) => [quote.breakNumber, quote.tierIndex, quote.price])).toEqual([
      [1, 0, 5000],
      [2, 1, 4000],
      [3, 2, 3500]
    ]);
    expect(preview.total).toBe(12500);
    expect(preview.highest).toBe(5000);
    expect(preview.lowest).toBe(3500);
  });

  it('continues from an existing history', () => {
    const preview = previewBatch({ profile: null, currentCount: 3, lifetimeRepairs: 3, breakCount: 1 });
    expect(preview.breakdown[0]?.price).toBe(3000);
  });

  it('counts earlier breaks of the same batch toward the volume threshold', () => {
    const discounted = profile({ usesCustomPricing: true, volumeDiscountThreshold: 2, volumeDiscountPercent: 1500 });
    const preview = previewBatch({ profile: discounted, currentCount: 0, lifetimeRepairs: 1, breakCount: 3 });

    expect(preview.breakdown.map((quote) => quote.price)).toEqual([5000, 3400, 2975]);
    expect(preview.total).toBe(11375);
  });
});

describe('summarizeBatch', () => {
  it('reports no extremes for an empty batch', () => {
    expect(summarizeBatch([])).toEqual({ totalBreaks: 0, total: 0, highest: null, lowest: null, breakdown: [] });
  });
});

describe('describePricing', () => {
  it('describes default pricing for a customer without a profile', () => {
    expect(describePricing('cust-1', null)).toEqual({
      customerId: 'cust-1',
      usesCustomPricing: false,
      tiers: [5000, 4000, 3500, 3000, 2500],
      defaultTiers: [5000, 4000, 3500, 3000, 2500],
      volumeDiscount: { enabled: false, threshold: null, percent: null }
    });
  });

  it('reports custom tiers and an enabled discount', () => {
    const custom = profile({
      usesCustomPricing: true,
      tierPrices: [4500, 4000],
      volumeDiscountThreshold: 20,
      volumeDiscountPercent: 1000
    });

    expect(describePricing('cust-1', custom)).toMatchObject({
      usesCustomPricing: true,
      tiers: [4500, 4000],
      volumeDiscount: { enabled: true, threshold: 20, percent: 1000 }
    });
  });
});
