import { employeeRangeLowerBound, revenueRangeRank } from "@/lib/portfolio/decoders";
import type { Company } from "@/types/company";

export const TABLE_PAGE_SIZE = 100;

export type SortField = "name" | "pe_firms" | "status" | "industry" | "headquarters" | "employee_count" | "revenue_range";
export type SortDirection = "asc" | "desc";

export interface SortState {
  field: SortField;
  direction: SortDirection;
}

export const DEFAULT_SORT: SortState = { field: "name", direction: "asc" };

function textKey(company: Company, field: Exclude<SortField, "employee_count" | "revenue_range">): string {
  switch (field) {
    case "pe_firms":
      return company.pe_firms.join(", ");
    case "industry":
      return company.industry ?? company.industry_category ?? "";
    case "headquarters":
      return company.headquarters ?? "";
    case "status":
      return company.status;
    case "name":
      return company.name;
  }
}

function compareBy(field: SortField, a: Company, b: Company): number {
  if (field === "employee_count") {
    return employeeRangeLowerBound(a.employee_count) - employeeRangeLowerBound(b.employee_count);
  }
  if (field === "revenue_range") {
    return revenueRangeRank(a.revenue_range) - revenueRangeRank(b.revenue_range);
  }
  return textKey(a, field).localeCompare(textKey(b, field));
}

/** Coded ranges sort by magnitude; "N/A" sorts before every known range. */
export function sortCompanies(companies: Company[], sort: SortState): Company[] {
  const sign = sort.direction === "asc" ? 1 : -1;
  return [...companies].sort((a, b) => sign * compareBy(sort.field, a, b) || a.id - b.id);
}

export function toggleSort(current: SortState, field: SortField): SortState {
  if (current.field === field) {
    return { field, direction: current.direction === "asc" ? "desc" : "asc" };
  }
  return { field, direction: "asc" };
}

export interface Page<T> {
  rows: T[];
  page: number;
  totalPages: number;
  start: number;
  end: number;
}

export function paginate<T>(items: T[], page: number, pageSize = TABLE_PAGE_SIZE): Page<T> {
  const totalPages = Math.max(Math.ceil(items.length / pageSize), 1);
  const current = Math.min(Math.max(page, 1), totalPages);
  const start = (current - 1) * pageSize;
  const rows = items.slice(start, start + pageSize);
  return { rows, page: current, totalPages, start, end: start + rows.length };
}

/** Up to `size` page numbers centred on the current page. */
export function pageWindow(page: number, totalPages: number, size = 5): number[] {
  const first = Math.max(1, Math.min(page - Math.floor(size / 2), totalPages - size + 1));
  const last = Math.min(totalPages, first + size - 1);
  return Array.from({ length: last - first + 1 }, (_, index) => first + index);
}
