import type {
  CompanyFacet,
  CompanyFirmLink,
  CompanyQuery,
  CompanyRecord,
  CompanyStatus,
  CompanyUpdate,
  FirmRecord,
  StatusRow,
} from "@/types/company";

/** A company query whose status, when present, is already canonical. */
export type ResolvedCompanyQuery = Omit<CompanyQuery, "status"> & { status?: CompanyStatus };

export interface PortfolioRepository {
  /** Filtered page ordered by name, then id. */
  findCompanies(query: ResolvedCompanyQuery): Promise<CompanyRecord[]>;
  findCompanyById(id: number): Promise<CompanyRecord | null>;
  findCompaniesByFirm(firmId: number, limit: number): Promise<CompanyRecord[]>;
  /** First firm (by name) whose name contains the fragment, case-insensitively. */
  findFirmByName(fragment: string): Promise<FirmRecord | null>;
  listFirms(): Promise<FirmRecord[]>;
  listFirmLinks(): Promise<CompanyFirmLink[]>;
  listCompanyFacets(): Promise<CompanyFacet[]>;
  /** Every company, for maintenance scripts. */
  listAllCompanies(): Promise<CompanyRecord[]>;
  /** Raw lifecycle columns, for status standardization. */
  listStatusRows(): Promise<StatusRow[]>;
  /** Returns `null` without writing when the company does not exist. */
  updateCompany(id: number, update: CompanyUpdate): Promise<CompanyRecord | null>;
  deleteCompany(id: number): Promise<boolean>;
}

export function includesIgnoreCase(value: string | null | undefined, fragment: string): boolean {
  return typeof value === "string" && value.toLowerCase().includes(fragment.toLowerCase());
}

export function compareCompanies(a: CompanyRecord, b: CompanyRecord): number {
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }
  return a.id - b.id;
}

export function matchesCompanyQuery(company: CompanyRecord, query: ResolvedCompanyQuery): boolean {
  if (query.peFirm && !company.pe_firms.some((firm) => includesIgnoreCase(firm, query.peFirm ?? ""))) {
    return false;
  }

  if (query.status && company.status !== query.status) {
    return false;
  }

  if (query.sector && !includesIgnoreCase(company.sector, query.sector)) {
    return false;
  }

  if (
    query.industry &&
    !includesIgnoreCase(company.industry, query.industry) &&
    !includesIgnoreCase(company.industry_category, query.industry)
  ) {
    return false;
  }

  if (query.exitType && !includesIgnoreCase(company.exit_type, query.exitType)) {
    return false;
  }

  if (query.isPublic !== undefined && company.is_public !== query.isPublic) {
    return false;
  }

  if (
    query.search &&
    !includesIgnoreCase(company.name, query.search) &&
    !includesIgnoreCase(company.description, query.search)
  ) {
    return false;
  }

  return true;
}
