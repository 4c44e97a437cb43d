import type { ApprovalPolicy, CustomerApprovalPreference } from '../repositories/contracts.js';

export type FieldInitialStatus = 'APPROVED' | 'PENDING';

export const DEFAULT_APPROVAL_POLICY: ApprovalPolicy = { mode: 'REQUIRE_APPROVAL' };

export function policyOf(preference: CustomerApprovalPreference | null): ApprovalPolicy {
  return preference?.policy ?? DEFAULT_APPROVAL_POLICY;
}

/**
 * Initial status of a field-discovered break. `breakPosition` is 1-based within the
 * current batch and restarts at 1 for every submission.
 */
export function initialStatus(policy: ApprovalPolicy, breakPosition: number): FieldInitialStatus {
  if (!Number.isInteger(breakPosition) || breakPosition < 1) {
    throw new RangeError(`break position must be a positive integer, got ${breakPosition}`);
  }

  switch (policy.mode) {
    case 'AUTO_APPROVE':
      return 'APPROVED';
    case 'REQUIRE_APPROVAL':
      return 'PENDING';
    case 'UNIT_THRESHOLD':
      return breakPosition <= policy.unitThreshold ? 'APPROVED' : 'PENDING';
    default: {
      const unreachable: never = policy;
      throw new TypeError(`unhandled approval policy: ${JSON.stringify(unreachable)}`);
    }
  }
}
