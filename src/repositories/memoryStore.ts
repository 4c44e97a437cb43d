import { KeyedLock } from '../lib/keyedLock.js';
import type {
  ApprovalDecision,
  AuditEvent,
  CustomerAccount,
  CustomerApprovalPreference,
  CustomerPricingProfile,
  RepairRecord,
  TeamMembership,
  TechnicianProfile,
  UnitRepairCounter
} from './contracts.js';

export type MemoryStore = {
  customers: Map<string, CustomerAccount>;
  pricingProfiles: Map<string, CustomerPricingProfile>;
  approvalPreferences: Map<string, CustomerApprovalPreference>;
  technicians: Map<string, TechnicianProfile>;
  teamMemberships: Map<string, TeamMembership>;
  unitCounters: Map<string, UnitRepairCounter>;
  repairs: Map<string, RepairRecord>;
  approvals: Map<string, ApprovalDecision>;
  audit: Map<string, AuditEvent>;
  counterLocks: KeyedLock;
};

export function createMemoryStore(): MemoryStore {
  return {
    customers: new Map(),
    pricingProfiles: new Map(),
    approvalPreferences: new Map(),
    technicians: new Map(),
    teamMemberships: new Map(),
    unitCounters: new Map(),
    repairs: new Map(),
    approvals: new Map(),
    audit: new Map(),
    counterLocks: new KeyedLock()
  };
}

export function counterKey(customerId: string, unitNumber: string): string {
  return `${customerId}::${unitNumber}`;
}

export function membershipKey(membership: TeamMembership): string {
  return `${membership.managerId}::${membership.memberId}`;
}
