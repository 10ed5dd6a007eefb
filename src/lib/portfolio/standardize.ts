import { inferExitType, normalizeStatus } from "@/lib/portfolio/status";
import type { CompanyStatus, CompanyUpdate, StatusRow } from "@/types/company";

const ACQUIRED_BY = /acquired by (.+)/i;

export interface StatusChange {
  id: number;
  name: string;
  before: string | null;
  after: CompanyStatus;
  acquirer: string | null;
  update: CompanyUpdate;
}

/** Rows whose stored lifecycle columns differ from what the status rules give. */
export function planStatusChanges(rows: StatusRow[]): StatusChange[] {
  return rows.flatMap((row) => {
    const after = normalizeStatus({ rawStatus: row.status, exitType: row.exit_type, isPublic: row.is_public });
    const inferredExit = row.exit_type ? null : inferExitType(row.status, row.is_public);
    const acquired = inferredExit === "Acquisition" || row.exit_type === "Acquisition";

    const update: CompanyUpdate = {};
    if (row.status !== after) update.status = after;
    if (inferredExit) update.exit_type = inferredExit;
    if (acquired && !row.is_acquired) update.is_acquired = true;

    if (!Object.keys(update).length) {
      return [];
    }

    const acquirer = row.status ? (ACQUIRED_BY.exec(row.status)?.[1]?.trim() ?? null) : null;
    return [{ id: row.id, name: row.name, before: row.status, after, acquirer, update }];
  });
}

export function countStatuses(statuses: Array<string | null>): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const status of statuses) {
    const key = status ?? "Unknown";
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Array.from(counts.entries()).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}
