import type { ManagerAuthorization } from '../repositories/contracts.js';
import { AuthorizationError, ValidationError } from './errors.js';
import { fromCents, type Cents } from './money.js';

export type OverrideRequest = {
  proposedPrice: Cents;
  reason: string | null | undefined;
};

/**
 * Validates a manual price override for a single repair and returns the price to
 * charge. Checks run in a fixed order: a reason is required, the actor must be a
 * manager allowed to override, and the price must sit within the manager's limit.
 * The unit counter is not involved; an override changes price, never tier count.
 */
export function authorizeOverride(
  manager: ManagerAuthorization | null,
  request: OverrideRequest
): Cents {
  if (!request.reason || request.reason.trim().length === 0) {
    throw new ValidationError('an override reason is required when an override price is supplied', 'OVERRIDE_REASON_REQUIRED');
  }

  if (!Number.isSafeInteger(request.proposedPrice) || request.proposedPrice < 0) {
    throw new ValidationError('override price cannot be negative', 'OVERRIDE_PRICE_INVALID');
  }

  if (!manager || !manager.isManager || !manager.canOverridePricing) {
    throw new AuthorizationError(
      'only managers with pricing override permission can override repair prices',
      'OVERRIDE_NOT_PERMITTED'
    );
  }

  if (manager.approvalLimit !== null && request.proposedPrice > manager.approvalLimit) {
    throw new AuthorizationError(
      `override of ${fromCents(request.proposedPrice)} exceeds approval limit ${fromCents(manager.approvalLimit)}`,
      'OVERRIDE_LIMIT_EXCEEDED'
    );
  }

  return request.proposedPrice;
}
