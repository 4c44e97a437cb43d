import { describe, expect, it } from 'vitest';
import { AuthorizationError, ValidationError } from '../src/lib/errors.js';
import { authorizeOverride } from '../src/lib/overrideAuthorizer.js';
import type { ManagerAuthorization } from '../src/repositories/contracts.js';

function manager(overrides: Partial<ManagerAuthorization> = {}): ManagerAuthorization {
  return {
    technicianId: 'mgr-1',
    isManager: true,
    canOverridePricing: true,
    approvalLimit: 15000,
    managedTechnicianIds: new Set(['tech-1']),
    ...overrides
  };
}

function failure(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('authorizeOverride', () => {
  it('returns the proposed price when it is within the limit', () => {
    expect(authorizeOverride(manager(), { proposedPrice: 15000, reason: 'fleet agreement' })).toBe(15000);
    expect(authorizeOverride(manager(), { proposedPrice: 0, reason: 'warranty' })).toBe(0);
  });

  it('treats a missing limit as unlimited', () => {
    expect(
      authorizeOverride(manager({ approvalLimit: null }), { proposedPrice: 999_999, reason: 'fleet agreement' })
    ).toBe(999_999);
  });

  it('requires a reason before anything else', () => {
    const error = failure(() => authorizeOverride(null, { proposedPrice: 20000, reason: '   ' }));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ code: 'OVERRIDE_REASON_REQUIRED' });
  });

  it('rejects negative prices as invalid input', () => {
    const error = failure(() => authorizeOverride(manager(), { proposedPrice: -100, reason: 'refund' }));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ code: 'OVERRIDE_PRICE_INVALID' });
  });

  it('rejects technicians without override permission', () => {
    for (const actor of [null, manager({ isManager: false }), manager({ canOverridePricing: false })]) {
      const error = failure(() => authorizeOverride(actor, { proposedPrice: 1000, reason: 'goodwill' }));
      expect(error).toBeInstanceOf(AuthorizationError);
      expect(error).toMatchObject({ code: 'OVERRIDE_NOT_PERMITTED', statusCode: 403 });
    }
  });

  it('rejects prices above the approval limit', () => {
    const error = failure(() => authorizeOverride(manager(), { proposedPrice: 20000, reason: 'fleet agreement' }));
    expect(error).toBeInstanceOf(AuthorizationError);
    expect(error).toMatchObject({
      code: 'OVERRIDE_LIMIT_EXCEEDED',
      message: 'override of 200.00 exceeds approval limit 150.00'
    });
  });
});
