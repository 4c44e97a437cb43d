import { fromCents } from '../lib/money.js';
import type {
  ApprovalPolicy,
  CustomerAccount,
  CustomerApprovalPreference,
  CustomerPricingProfile,
  CustomersRepository
} from './contracts.js';
import type { DbExecutor, DbRow } from './db.js';
import { mapTimestamps, nullableNumericToCents, numericToCents } from './db.js';
import type { MemoryStore } from './memoryStore.js';

export const DEFAULT_UNIT_THRESHOLD = 5;

function toCustomer(row: DbRow): CustomerAccount {
  const value = mapTimestamps(row);
  return {
    customerId: String(value.customer_id),
    name: String(value.name),
    createdAt: String(value.created_at)
  };
}

function toPricingProfile(row: DbRow): CustomerPricingProfile {
  const tiers = Array.isArray(row.tier_prices) ? row.tier_prices : [];
  return {
    customerId: String(row.customer_id),
    usesCustomPricing: Boolean(row.uses_custom_pricing),
    tierPrices: tiers.map((tier) => numericToCents(tier)),
    volumeDiscountThreshold:
      row.volume_discount_threshold === null ? null : Number(row.volume_discount_threshold),
    volumeDiscountPercent: nullableNumericToCents(row.volume_discount_percent)
  };
}

export function toApprovalPolicy(mode: string, unitThreshold: number | null): ApprovalPolicy {
  switch (mode) {
    case 'AUTO_APPROVE':
      return { mode: 'AUTO_APPROVE' };
    case 'UNIT_THRESHOLD':
      return { mode: 'UNIT_THRESHOLD', unitThreshold: unitThreshold ?? DEFAULT_UNIT_THRESHOLD };
    case 'REQUIRE_APPROVAL':
      return { mode: 'REQUIRE_APPROVAL' };
    default:
      throw new TypeError(`unknown approval mode: ${mode}`);
  }
}

function toApprovalPreference(row: DbRow): CustomerApprovalPreference {
  return {
    customerId: String(row.customer_id),
    policy: toApprovalPolicy(
      String(row.approval_mode),
      row.unit_threshold === null ? null : Number(row.unit_threshold)
    )
  };
}

export function createCustomersRepository(db: DbExecutor | null, store: MemoryStore): CustomersRepository {
  return {
    async upsert(input) {
      if (!db) {
        const existing = store.customers.get(input.customerId);
        const next: CustomerAccount = {
          customerId: input.customerId,
          name: input.name,
          createdAt: existing?.createdAt ?? new Date().toISOString()
        };
        store.customers.set(input.customerId, next);
        return next;
      }

      const result = await db.query(
        `
          INSERT INTO customers(customer_id, name)
          VALUES ($1, $2)
          ON CONFLICT(customer_id) DO UPDATE SET name = EXCLUDED.name
          RETURNING customer_id, name, created_at
        `,
        [input.customerId, input.name]
      );
      return toCustomer(result.rows[0]);
    },

    async getById(customerId) {
      if (!db) {
        return store.customers.get(customerId) ?? null;
      }

      const result = await db.query(
        `SELECT customer_id, name, created_at FROM customers WHERE customer_id = $1`,
        [customerId]
      );
      return result.rows.length === 0 ? null : toCustomer(result.rows[0]);
    },

    async getPricingProfile(customerId) {
      if (!db) {
        return store.pricingProfiles.get(customerId) ?? null;
      }

      const result = await db.query(
        `
          SELECT customer_id, uses_custom_pricing, tier_prices,
                 volume_discount_threshold, volume_discount_percent
          FROM customer_pricing
          WHERE customer_id = $1
        `,
        [customerId]
      );
      return result.rows.length === 0 ? null : toPricingProfile(result.rows[0]);
    },

    async upsertPricingProfile(profile) {
      if (!db) {
        const next = { ...profile, tierPrices: [...profile.tierPrices] };
        store.pricingProfiles.set(profile.customerId, next);
        return next;
      }

      const result = await db.query(
        `
          INSERT INTO customer_pricing(
            customer_id, uses_custom_pricing, tier_prices,
            volume_discount_threshold, volume_discount_percent
          )
          VALUES ($1, $2, $3::numeric[], $4, $5)
          ON CONFLICT(customer_id) DO UPDATE SET
            uses_custom_pricing = EXCLUDED.uses_custom_pricing,
            tier_prices = EXCLUDED.tier_prices,
            volume_discount_threshold = EXCLUDED.volume_discount_threshold,
            volume_discount_percent = EXCLUDED.volume_discount_percent,
            updated_at = NOW()
          RETURNING customer_id, uses_custom_pricing, tier_prices,
                    volume_discount_threshold, volume_discount_percent
        `,
        [
          profile.customerId,
          profile.usesCustomPricing,
          profile.tierPrices.map((tier) => fromCents(tier)),
          profile.volumeDiscountThreshold,
          profile.volumeDiscountPercent === null ? null : fromCents(profile.volumeDiscountPercent)
        ]
      );
      return toPricingProfile(result.rows[0]);
    },

    async getApprovalPreference(customerId) {
      if (!db) {
        return store.approvalPreferences.get(customerId) ?? null;
      }

      const result = await db.query(
        `
          SELECT customer_id, approval_mode, unit_threshold
          FROM customer_approval_preferences
          WHERE customer_id = $1
        `,
        [customerId]
      );
      return result.rows.length === 0 ? null : toApprovalPreference(result.rows[0]);
    },

    async upsertApprovalPreference(preference) {
      if (!db) {
        store.approvalPreferences.set(preference.customerId, preference);
        return preference;
      }

      const unitThreshold =
        preference.policy.mode === 'UNIT_THRESHOLD' ? preference.policy.unitThreshold : null;
      const result = await db.query(
        `
          INSERT INTO customer_approval_preferences(customer_id, approval_mode, unit_threshold)
          VALUES ($1, $2, $3)
          ON CONFLICT(customer_id) DO UPDATE SET
            approval_mode = EXCLUDED.approval_mode,
            unit_threshold = EXCLUDED.unit_threshold,
            updated_at = NOW()
          RETURNING customer_id, approval_mode, unit_threshold
        `,
        [preference.customerId, preference.policy.mode, unitThreshold]
      );
      return toApprovalPreference(result.rows[0]);
    }
  };
}
