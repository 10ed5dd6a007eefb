import { decodeEmployeeCount, decodeRevenueRange } from "@/lib/portfolio/decoders";
import { canonicalStatus, normalizeStatus } from "@/lib/portfolio/status";
import type { Company, CompanyFacet, CompanyRecord, FirmRecord, StatusRow } from "@/types/company";

function parseNullableString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length ? trimmed : null;
}

function parseNullableNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}

function parseYear(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(Math.trunc(value));
  }

  return parseNullableString(value);
}

function parseInteger(value: unknown): number {
  const parsed = parseNullableNumber(value);
  return parsed === null ? 0 : Math.trunc(parsed);
}

function parseBoolean(value: unknown): boolean {
  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value === "string") {
    return value.toLowerCase() === "true";
  }

  return value === 1;
}

function parseStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter((item): item is string => typeof item === "string" && item.trim().length > 0);
}

/** Accepts `pe_firms` as names, or as the nested `company_firms(firms(name))` embed. */
function parseFirmNames(row: Record<string, unknown>): string[] {
  if (Array.isArray(row.pe_firms)) {
    return parseStringArray(row.pe_firms);
  }

  if (!Array.isArray(row.company_firms)) {
    return [];
  }

  const names = row.company_firms.flatMap((link: unknown) => {
    if (!link || typeof link !== "object" || !("firms" in link)) {
      return [];
    }

    const firm = link.firms;
    if (firm && typeof firm === "object" && "name" in firm && typeof firm.name === "string") {
      return [firm.name];
    }

    return [];
  });

  return Array.from(new Set(names)).sort((a, b) => a.localeCompare(b));
}

export function normalizeCompanyRow(row: Record<string, unknown>): CompanyRecord {
  const isPublic = parseBoolean(row.is_public);
  const exitType = parseNullableString(row.exit_type);
  const ipoYear = parseNullableNumber(row.ipo_year);
  const rawStatus = parseNullableString(row.status);

  return {
    id: parseInteger(row.id),
    name: parseNullableString(row.name) ?? "Unknown Company",
    pe_firms: parseFirmNames(row),
    sector: parseNullableString(row.sector),
    industry: parseNullableString(row.industry),
    industry_category: parseNullableString(row.industry_category),
    headquarters: parseNullableString(row.headquarters),
    website: parseNullableString(row.website),
    linkedin_url: parseNullableString(row.linkedin_url),
    description: parseNullableString(row.description),
    summary: parseNullableString(row.summary),
    // A stored canonical status is kept even when the flags disagree with it.
    status: canonicalStatus(rawStatus) ?? normalizeStatus({ rawStatus, exitType, isPublic }),
    exit_type: exitType,
    exit_info: parseNullableString(row.exit_info),
    investment_year: parseYear(row.investment_year),
    revenue_range: parseNullableString(row.revenue_range),
    employee_count: parseNullableString(row.employee_count),
    swarm_headcount: parseNullableNumber(row.swarm_headcount),
    size_class: parseNullableString(row.size_class),
    total_funding_usd: parseNullableNumber(row.total_funding_usd),
    last_round_type: parseNullableString(row.last_round_type),
    last_round_amount_usd: parseNullableNumber(row.last_round_amount_usd),
    market_cap: parseNullableNumber(row.market_cap),
    ipo_date: parseNullableString(row.ipo_date),
    ipo_year: ipoYear === null ? null : Math.trunc(ipoYear),
    stock_exchange: parseNullableString(row.stock_exchange),
    ownership_status: parseNullableString(row.ownership_status),
    customer_types: parseNullableString(row.customer_types),
    is_public: isPublic,
    is_acquired: parseBoolean(row.is_acquired),
    is_exited: parseBoolean(row.is_exited),
    predicted_revenue: parseNullableNumber(row.predicted_revenue),
    created_at: parseNullableString(row.created_at),
    updated_at: parseNullableString(row.updated_at),
  };
}

export function normalizeFirmRow(row: Record<string, unknown>): FirmRecord {
  return {
    id: parseInteger(row.id),
    name: parseNullableString(row.name) ?? "Unknown Firm",
    last_scraped: parseNullableString(row.last_scraped),
  };
}

export function toCompanyFacet(company: CompanyRecord): CompanyFacet {
  return {
    id: company.id,
    sector: company.sector,
    industry: company.industry,
    industry_category: company.industry_category,
    status: company.status,
    linkedin_url: company.linkedin_url,
  };
}

export function toCompany(record: CompanyRecord): Company {
  return {
    ...record,
    revenue_range: decodeRevenueRange(record.revenue_range),
    employee_count: decodeEmployeeCount(record.employee_count),
  };
}

export function toStatusRow(row: Record<string, unknown>): StatusRow {
  return {
    id: parseInteger(row.id),
    name: parseNullableString(row.name) ?? "Unknown Company",
    status: parseNullableString(row.status),
    exit_type: parseNullableString(row.exit_type),
    is_public: parseBoolean(row.is_public),
    is_acquired: parseBoolean(row.is_acquired),
  };
}
