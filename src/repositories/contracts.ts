import type { Cents } from '../lib/money.js';

export const REPAIR_STATUSES = [
  'REQUESTED',
  'PENDING',
  'APPROVED',
  'IN_PROGRESS',
  'COMPLETED',
  'DENIED'
] as const;

export type RepairStatus = (typeof REPAIR_STATUSES)[number];
export type RepairOrigin = 'CUSTOMER' | 'FIELD';
export type PriceSource = 'TIER' | 'OVERRIDE';

export type CustomerAccount = {
  customerId: string;
  name: string;
  createdAt: string;
};

export type CustomerPricingProfile = {
  customerId: string;
  usesCustomPricing: boolean;
  /** index 0 prices a unit's first repair; the last entry repeats for every later repair */
  tierPrices: Cents[];
  volumeDiscountThreshold: number | null;
  /** hundredths of a percent, 1500 = 15% */
  volumeDiscountPercent: number | null;
};

export type ApprovalPolicy =
  | { mode: 'AUTO_APPROVE' }
  | { mode: 'REQUIRE_APPROVAL' }
  | { mode: 'UNIT_THRESHOLD'; unitThreshold: number };

export type ApprovalMode = ApprovalPolicy['mode'];

export type CustomerApprovalPreference = {
  customerId: string;
  policy: ApprovalPolicy;
};

export type Identity = {
  userId: string;
  displayName: string;
  email: string | null;
};

export type ManagerCapability = {
  isManager: boolean;
  canOverridePricing: boolean;
  /** null means the manager has no override ceiling */
  approvalLimit: Cents | null;
};

export type TechnicianProfile = {
  technicianId: string;
  identity: Identity;
  manager: ManagerCapability | null;
  createdAt: string;
};

export type TeamMembership = {
  managerId: string;
  memberId: string;
};

/** A technician's capability together with the team it is scoped to. */
export type ManagerAuthorization = ManagerCapability & {
  technicianId: string;
  managedTechnicianIds: ReadonlySet<string>;
};

export type UnitRepairCounter = {
  customerId: string;
  unitNumber: string;
  count: number;
};

export type RepairRecord = {
  repairId: string;
  customerId: string;
  technicianId: string;
  unitNumber: string;
  damageType: string;
  description: string | null;
  origin: RepairOrigin;
  status: RepairStatus;
  tierIndex: number;
  basePrice: Cents;
  discount: Cents;
  price: Cents;
  priceSource: PriceSource;
  overrideReason: string | null;
  overriddenBy: string | null;
  batchId: string | null;
  breakNumber: number;
  totalBreaksInBatch: number;
  createdAt: string;
  updatedAt: string;
};

export type ApprovalDecision = {
  repairId: string;
  approved: boolean | null;
  decidedBy: string | null;
  decidedAt: string | null;
  notes: string;
};

export type AuditEvent = {
  eventId: string;
  repairId: string | null;
  batchId: string | null;
  eventType: string;
  actor: string;
  payload: Record<string, unknown>;
  createdAt: string;
};

export type RepairListFilters = {
  customerId?: string;
  technicianIds?: readonly string[];
  statuses?: readonly RepairStatus[];
  unitNumber?: string;
  batchId?: string;
  limit?: number;
};

export type RepairInsert = Omit<RepairRecord, 'createdAt' | 'updatedAt'>;

export type RepairStatusChange = {
  from: RepairStatus;
  to: RepairStatus;
  technicianId?: string;
};

export interface CustomersRepository {
  upsert(input: { customerId: string; name: string }): Promise<CustomerAccount>;
  getById(customerId: string): Promise<CustomerAccount | null>;
  getPricingProfile(customerId: string): Promise<CustomerPricingProfile | null>;
  upsertPricingProfile(profile: CustomerPricingProfile): Promise<CustomerPricingProfile>;
  getApprovalPreference(customerId: string): Promise<CustomerApprovalPreference | null>;
  upsertApprovalPreference(preference: CustomerApprovalPreference): Promise<CustomerApprovalPreference>;
}

export interface TechniciansRepository {
  upsert(input: Omit<TechnicianProfile, 'createdAt'>): Promise<TechnicianProfile>;
  getById(technicianId: string): Promise<TechnicianProfile | null>;
  addTeamMember(membership: TeamMembership): Promise<void>;
  listTeamMembers(managerId: string): Promise<string[]>;
  getAuthorization(technicianId: string): Promise<ManagerAuthorization | null>;
}

export interface UnitCountersRepository {
  getCount(customerId: string, unitNumber: string): Promise<number>;
  customerTotal(customerId: string): Promise<number>;
  listForCustomer(customerId: string): Promise<UnitRepairCounter[]>;
}

export interface RepairsRepository {
  insert(record: RepairInsert): Promise<RepairRecord>;
  getById(repairId: string): Promise<RepairRecord | null>;
  list(filters: RepairListFilters): Promise<RepairRecord[]>;
  /** compare-and-set on status; null when the repair is missing or no longer in `change.from` */
  transitionStatus(repairId: string, change: RepairStatusChange): Promise<RepairRecord | null>;
}

export interface ApprovalsRepository {
  upsert(decision: ApprovalDecision): Promise<ApprovalDecision>;
  getByRepair(repairId: string): Promise<ApprovalDecision | null>;
}

export interface AuditRepository {
  insert(event: Omit<AuditEvent, 'createdAt'>): Promise<AuditEvent>;
  listByRepair(repairId: string): Promise<AuditEvent[]>;
  listByBatch(batchId: string): Promise<AuditEvent[]>;
}

export interface RepositoryBundle {
  customers: CustomersRepository;
  technicians: TechniciansRepository;
  counters: UnitCountersRepository;
  repairs: RepairsRepository;
  approvals: ApprovalsRepository;
  audit: AuditRepository;
}

/**
 * Writes that must commit or roll back together. `nextIndex` is only reachable here:
 * the counter increment has to share a transaction with the repair insert it prices.
 */
export interface TransactionScope {
  counters: UnitCountersRepository & {
    nextIndex(customerId: string, unitNumber: string): Promise<number>;
  };
  repairs: RepairsRepository;
  approvals: ApprovalsRepository;
}

export interface UnitOfWork {
  run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T>;
}
