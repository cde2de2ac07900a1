import type { DbExecutor, DbRow } from './db.js';
import type { MemoryStore } from './memoryStore.js';
import type { Organization, OrganizationsRepository } from './contracts.js';

function toOrganization(row: DbRow): Organization {
  return {
    orgId: String(row.org_id),
    name: String(row.name)
  };
}

export function createOrganizationsRepository(
  db: DbExecutor | null,
  store: MemoryStore
): OrganizationsRepository {
  return {
    async insert(org) {
      if (!db) {
        store.organizations.set(org.orgId, org);
        return org;
      }

      const result = await db.query<DbRow>(
        `INSERT INTO organizations(org_id, name) VALUES ($1, $2) RETURNING org_id, name`,
        [org.orgId, org.name]
      );
      return toOrganization(result.rows[0]);
    },

    async getById(orgId) {
      if (!db) {
        return store.organizations.get(orgId) ?? null;
      }

      const result = await db.query<DbRow>(`SELECT org_id, name FROM organizations WHERE org_id = $1`, [orgId]);
      if (result.rows.length === 0) {
        return null;
      }
      return toOrganization(result.rows[0]);
    }
  };
}
