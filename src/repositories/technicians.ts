import { fromCents } from '../lib/money.js';
import type { ManagerAuthorization, TechnicianProfile, TechniciansRepository } from './contracts.js';
import type { DbExecutor, DbRow } from './db.js';
import { mapTimestamps, nullableNumericToCents, nullableString } from './db.js';
import type { MemoryStore } from './memoryStore.js';
import { membershipKey } from './memoryStore.js';

const TECHNICIAN_COLUMNS = `
  t.technician_id, t.user_id, t.display_name, t.email, t.created_at,
  m.is_manager, m.can_override_pricing, m.approval_limit
`;

function toTechnician(row: DbRow): TechnicianProfile {
  const value = mapTimestamps(row);
  const hasCapability = value.is_manager !== null && value.is_manager !== undefined;
  return {
    technicianId: String(value.technician_id),
    identity: {
      userId: String(value.user_id),
      displayName: String(value.display_name),
      email: nullableString(value.email)
    },
    manager: hasCapability
      ? {
          isManager: Boolean(value.is_manager),
          canOverridePricing: Boolean(value.can_override_pricing),
          approvalLimit: nullableNumericToCents(value.approval_limit)
        }
      : null,
    createdAt: String(value.created_at)
  };
}

function toAuthorization(profile: TechnicianProfile, memberIds: string[]): ManagerAuthorization {
  const capability = profile.manager ?? { isManager: false, canOverridePricing: false, approvalLimit: null };
  return {
    technicianId: profile.technicianId,
    ...capability,
    managedTechnicianIds: new Set(capability.isManager ? memberIds : [])
  };
}

export function createTechniciansRepository(
  db: DbExecutor | null,
  store: MemoryStore
): TechniciansRepository {
  const repository: TechniciansRepository = {
    async upsert(input) {
      if (!db) {
        const existing = store.technicians.get(input.technicianId);
        const next: TechnicianProfile = {
          ...input,
          createdAt: existing?.createdAt ?? new Date().toISOString()
        };
        store.technicians.set(input.technicianId, next);
        return next;
      }

      await db.query(
        `
          INSERT INTO technicians(technician_id, user_id, display_name, email)
          VALUES ($1, $2, $3, $4)
          ON CONFLICT(technician_id) DO UPDATE SET
            user_id = EXCLUDED.user_id,
            display_name = EXCLUDED.display_name,
            email = EXCLUDED.email
        `,
        [input.technicianId, input.identity.userId, input.identity.displayName, input.identity.email]
      );

      if (input.manager) {
        await db.query(
          `
            INSERT INTO manager_authorizations(technician_id, is_manager, can_override_pricing, approval_limit)
            VALUES ($1, $2, $3, $4)
            ON CONFLICT(technician_id) DO UPDATE SET
              is_manager = EXCLUDED.is_manager,
              can_override_pricing = EXCLUDED.can_override_pricing,
              approval_limit = EXCLUDED.approval_limit
          `,
          [
            input.technicianId,
            input.manager.isManager,
            input.manager.canOverridePricing,
            input.manager.approvalLimit === null ? null : fromCents(input.manager.approvalLimit)
          ]
        );
      } else {
        await db.query(`DELETE FROM manager_authorizations WHERE technician_id = $1`, [input.technicianId]);
      }

      const saved = await repository.getById(input.technicianId);
      if (!saved) {
        throw new Error(`technician vanished after upsert: ${input.technicianId}`);
      }
      return saved;
    },

    async getById(technicianId) {
      if (!db) {
        return store.technicians.get(technicianId) ?? null;
      }

      const result = await db.query(
        `
          SELECT ${TECHNICIAN_COLUMNS}
          FROM technicians t
          LEFT JOIN manager_authorizations m ON m.technician_id = t.technician_id
          WHERE t.technician_id = $1
        `,
        [technicianId]
      );
      return result.rows.length === 0 ? null : toTechnician(result.rows[0]);
    },

    async addTeamMember(membership) {
      if (!db) {
        store.teamMemberships.set(membershipKey(membership), { ...membership });
        return;
      }

      await db.query(
        `
          INSERT INTO team_memberships(manager_id, member_id)
          VALUES ($1, $2)
          ON CONFLICT DO NOTHING
        `,
        [membership.managerId, membership.memberId]
      );
    },

    async listTeamMembers(managerId) {
      if (!db) {
        return Array.from(store.teamMemberships.values())
          .filter((membership) => membership.managerId === managerId)
          .map((membership) => membership.memberId)
          .sort();
      }

      const result = await db.query(
        `SELECT member_id FROM team_memberships WHERE manager_id = $1 ORDER BY member_id ASC`,
        [managerId]
      );
      return result.rows.map((row: DbRow) => String(row.member_id));
    },

    async getAuthorization(technicianId) {
      const profile = await repository.getById(technicianId);
      if (!profile) {
        return null;
      }

      const memberIds = profile.manager?.isManager ? await repository.listTeamMembers(technicianId) : [];
      return toAuthorization(profile, memberIds);
    }
  };

  return repository;
}
