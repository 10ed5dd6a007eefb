import type { SupabaseClient } from "@supabase/supabase-js";

import { normalizeCompanyRow, normalizeFirmRow, toCompanyFacet, toStatusRow } from "@/lib/portfolio/normalize";
import type { PortfolioRepository, ResolvedCompanyQuery } from "@/lib/portfolio/repository";
import { ACQUISITION_MARKERS, ACTIVE_MARKERS } from "@/lib/portfolio/status";
import type {
  CompanyFacet,
  CompanyStatus,
  CompanyFirmLink,
  CompanyRecord,
  CompanyUpdate,
  FirmRecord,
  StatusRow,
} from "@/types/company";

type Row = Record<string, unknown>;

interface RowsResponse {
  data: Row[] | null;
  error: { message: string; code?: string } | null;
}

const COMPANY_SELECT = "*, company_firms(firms(name))";
const FACET_SELECT = "id, sector, industry, industry_category, status, exit_type, is_public, linkedin_url";

// PostgREST caps a response at 1000 rows by default.
const PAGE_CHUNK = 1000;
const RANGE_NOT_SATISFIABLE = "PGRST103";

export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

export function containsPattern(value: string): string {
  return `%${escapeLikePattern(value)}%`;
}

/** Quotes a value for use inside an `or=(...)` filter, where commas and parentheses are reserved. */
export function quoteFilterValue(value: string): string {
  return `"${value.replace(/["\\]/g, (match) => `\\${match}`)}"`;
}

export function anyColumnContains(columns: string[], fragment: string): string {
  const quoted = quoteFilterValue(containsPattern(fragment));
  return columns.map((column) => `${column}.ilike.${quoted}`).join(",");
}

function statusMatches(operator: "ilike" | "not.ilike", markers: readonly string[]): string[] {
  return markers.map((marker) => `status.${operator}.${quoteFilterValue(containsPattern(marker))}`);
}

/**
 * Builds the `or=(...)` body selecting rows that `normalizeCompanyRow` reads back with
 * the given status: a stored `Active` is kept, otherwise the status is inferred from
 * `is_public`, `exit_type` and the raw status text.
 */
export function statusFilter(status: CompanyStatus): string {
  const inferredActive = [
    "is_public.not.is.true",
    'or(exit_type.is.null,exit_type.in.("",None))',
    ...statusMatches("not.ilike", ACQUISITION_MARKERS),
    `or(${statusMatches("ilike", ACTIVE_MARKERS).join(",")})`,
  ].join(",");
  const active = `status.ilike.active,and(${inferredActive})`;

  // A null status reads back as Exit.
  return status === "Active" ? active : `status.is.null,not.or(${active})`;
}

function rowsOrThrow(label: string, response: RowsResponse): Row[] {
  if (response.error) {
    if (response.error.code === RANGE_NOT_SATISFIABLE) {
      return [];
    }
    throw new Error(`${label} failed: ${response.error.message}`);
  }

  return response.data ?? [];
}

async function fetchAllRows(label: string, page: (from: number, to: number) => PromiseLike<RowsResponse>): Promise<Row[]> {
  const rows: Row[] = [];

  for (let from = 0; ; from += PAGE_CHUNK) {
    const chunk = rowsOrThrow(label, await page(from, from + PAGE_CHUNK - 1));
    rows.push(...chunk);
    if (chunk.length < PAGE_CHUNK) {
      return rows;
    }
  }
}

export function createSupabasePortfolioRepository(client: SupabaseClient): PortfolioRepository {
  async function findCompanyById(id: number): Promise<CompanyRecord | null> {
    const response = await client
      .from("companies")
      .select(COMPANY_SELECT)
      .eq("id", id)
      .limit(1)
      .returns<Row[]>();

    const [row] = rowsOrThrow("findCompanyById", response);
    return row ? normalizeCompanyRow(row) : null;
  }

  return {
    async findCompanies(query: ResolvedCompanyQuery): Promise<CompanyRecord[]> {
      const select = query.peFirm
        ? `${COMPANY_SELECT}, firm_filter:company_firms!inner(firms!inner(name))`
        : COMPANY_SELECT;

      let request = client.from("companies").select(select);

      if (query.peFirm) {
        request = request.ilike("firm_filter.firms.name", containsPattern(query.peFirm));
      }
      if (query.status) {
        request = request.or(statusFilter(query.status));
      }
      if (query.sector) {
        request = request.ilike("sector", containsPattern(query.sector));
      }
      if (query.industry) {
        request = request.or(anyColumnContains(["industry", "industry_category"], query.industry));
      }
      if (query.exitType) {
        request = request.ilike("exit_type", containsPattern(query.exitType));
      }
      if (query.isPublic !== undefined) {
        request = request.eq("is_public", query.isPublic);
      }
      if (query.search) {
        request = request.or(anyColumnContains(["name", "description"], query.search));
      }

      const response = await request
        .order("name", { ascending: true })
        .order("id", { ascending: true })
        .range(query.offset, query.offset + query.limit - 1)
        .returns<Row[]>();

      return rowsOrThrow("findCompanies", response).map((row) => normalizeCompanyRow(row));
    },

    findCompanyById,

    async findCompaniesByFirm(firmId: number, limit: number): Promise<CompanyRecord[]> {
      const response = await client
        .from("companies")
        .select(`${COMPANY_SELECT}, firm_filter:company_firms!inner(firm_id)`)
        .eq("firm_filter.firm_id", firmId)
        .order("name", { ascending: true })
        .order("id", { ascending: true })
        .limit(limit)
        .returns<Row[]>();

      return rowsOrThrow("findCompaniesByFirm", response).map((row) => normalizeCompanyRow(row));
    },

    async findFirmByName(fragment: string): Promise<FirmRecord | null> {
      const response = await client
        .from("firms")
        .select("id, name, last_scraped")
        .ilike("name", containsPattern(fragment))
        .order("name", { ascending: true })
        .limit(1)
        .returns<Row[]>();

      const [row] = rowsOrThrow("findFirmByName", response);
      return row ? normalizeFirmRow(row) : null;
    },

    async listFirms(): Promise<FirmRecord[]> {
      const rows = await fetchAllRows("listFirms", (from, to) =>
        client.from("firms").select("id, name, last_scraped").order("name").range(from, to).returns<Row[]>(),
      );
      return rows.map(normalizeFirmRow);
    },

    async listFirmLinks(): Promise<CompanyFirmLink[]> {
      const rows = await fetchAllRows("listFirmLinks", (from, to) =>
        client
          .from("company_firms")
          .select("company_id, firm_id")
          .order("company_id")
          .order("firm_id")
          .range(from, to)
          .returns<Row[]>(),
      );

      return rows.map((row) => ({ company_id: Number(row.company_id), firm_id: Number(row.firm_id) }));
    },

    async listCompanyFacets(): Promise<CompanyFacet[]> {
      const rows = await fetchAllRows("listCompanyFacets", (from, to) =>
        client.from("companies").select(FACET_SELECT).order("id").range(from, to).returns<Row[]>(),
      );
      return rows.map((row) => toCompanyFacet(normalizeCompanyRow(row)));
    },

    async listAllCompanies(): Promise<CompanyRecord[]> {
      const rows = await fetchAllRows("listAllCompanies", (from, to) =>
        client.from("companies").select(COMPANY_SELECT).order("id").range(from, to).returns<Row[]>(),
      );
      return rows.map((row) => normalizeCompanyRow(row));
    },

    async listStatusRows(): Promise<StatusRow[]> {
      const rows = await fetchAllRows("listStatusRows", (from, to) =>
        client
          .from("companies")
          .select("id, name, status, exit_type, is_public, is_acquired")
          .order("id")
          .range(from, to)
          .returns<Row[]>(),
      );
      return rows.map(toStatusRow);
    },

    async updateCompany(id: number, update: CompanyUpdate): Promise<CompanyRecord | null> {
      const response = await client
        .from("companies")
        .update({ ...update, updated_at: new Date().toISOString() })
        .eq("id", id)
        .select("id")
        .returns<Row[]>();

      if (!rowsOrThrow("updateCompany", response).length) {
        return null;
      }

      return findCompanyById(id);
    },

    async deleteCompany(id: number): Promise<boolean> {
      const response = await client.from("companies").delete().eq("id", id).select("id").returns<Row[]>();
      return rowsOrThrow("deleteCompany", response).length > 0;
    },
  };
}
