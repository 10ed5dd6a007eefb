import { normalizeCompanyRow, normalizeFirmRow, toCompanyFacet, toStatusRow } from "@/lib/portfolio/normalize";
import {
  compareCompanies,
  includesIgnoreCase,
  matchesCompanyQuery,
  type PortfolioRepository,
  type ResolvedCompanyQuery,
} from "@/lib/portfolio/repository";
import type {
  CompanyFacet,
  CompanyFirmLink,
  CompanyRecord,
  CompanyUpdate,
  FirmRecord,
  StatusRow,
} from "@/types/company";

export interface PortfolioSeed {
  firms: Array<Record<string, unknown>>;
  companies: Array<Record<string, unknown>>;
  company_firms: CompanyFirmLink[];
}

/**
 * Keeps the portfolio in process. Backs the `mock` data source and the tests;
 * filtering follows the same rules the Supabase queries express in SQL.
 */
export class InMemoryPortfolioRepository implements PortfolioRepository {
  private readonly firms: FirmRecord[];
  private companies: CompanyRecord[];
  private links: CompanyFirmLink[];
  private readonly rawStatuses: Map<number, string | null>;
  private readonly now: () => Date;

  constructor(seed: PortfolioSeed, options: { now?: () => Date } = {}) {
    this.firms = seed.firms.map(normalizeFirmRow);
    this.companies = seed.companies.map((row) => normalizeCompanyRow(row));
    this.links = [...seed.company_firms];
    this.rawStatuses = new Map<number, string | null>(
      seed.companies.map((row) => {
        const { id, status } = toStatusRow(row);
        return [id, status];
      }),
    );
    this.now = options.now ?? (() => new Date());
  }

  private withFirms(company: CompanyRecord): CompanyRecord {
    const firmIds = new Set(this.links.filter((link) => link.company_id === company.id).map((link) => link.firm_id));
    const names = this.firms
      .filter((firm) => firmIds.has(firm.id))
      .map((firm) => firm.name)
      .sort((a, b) => a.localeCompare(b));
    return { ...company, pe_firms: names };
  }

  private all(): CompanyRecord[] {
    return this.companies.map((company) => this.withFirms(company)).sort(compareCompanies);
  }

  async findCompanies(query: ResolvedCompanyQuery): Promise<CompanyRecord[]> {
    return this.all()
      .filter((company) => matchesCompanyQuery(company, query))
      .slice(query.offset, query.offset + query.limit);
  }

  async findCompanyById(id: number): Promise<CompanyRecord | null> {
    const company = this.companies.find((candidate) => candidate.id === id);
    return company ? this.withFirms(company) : null;
  }

  async findCompaniesByFirm(firmId: number, limit: number): Promise<CompanyRecord[]> {
    const companyIds = new Set(this.links.filter((link) => link.firm_id === firmId).map((link) => link.company_id));
    return this.all()
      .filter((company) => companyIds.has(company.id))
      .slice(0, limit);
  }

  async findFirmByName(fragment: string): Promise<FirmRecord | null> {
    const matches = this.firms
      .filter((firm) => includesIgnoreCase(firm.name, fragment))
      .sort((a, b) => a.name.localeCompare(b.name));
    return matches[0] ?? null;
  }

  async listFirms(): Promise<FirmRecord[]> {
    return [...this.firms].sort((a, b) => a.name.localeCompare(b.name));
  }

  async listFirmLinks(): Promise<CompanyFirmLink[]> {
    return [...this.links];
  }

  async listCompanyFacets(): Promise<CompanyFacet[]> {
    return this.companies.map(toCompanyFacet);
  }

  async listAllCompanies(): Promise<CompanyRecord[]> {
    return this.all();
  }

  async listStatusRows(): Promise<StatusRow[]> {
    return this.companies.map((company) => ({
      id: company.id,
      name: company.name,
      status: this.rawStatuses.has(company.id) ? (this.rawStatuses.get(company.id) ?? null) : company.status,
      exit_type: company.exit_type,
      is_public: company.is_public,
      is_acquired: company.is_acquired,
    }));
  }

  async updateCompany(id: number, update: CompanyUpdate): Promise<CompanyRecord | null> {
    const index = this.companies.findIndex((company) => company.id === id);
    const existing = this.companies[index];
    if (!existing) {
      return null;
    }

    const next: CompanyRecord = { ...existing, ...update, updated_at: this.now().toISOString() };
    if (update.status !== undefined) {
      this.rawStatuses.set(id, update.status);
    }
    this.companies = this.companies.map((company, position) => (position === index ? next : company));
    return this.withFirms(next);
  }

  async deleteCompany(id: number): Promise<boolean> {
    const before = this.companies.length;
    this.companies = this.companies.filter((company) => company.id !== id);
    if (this.companies.length === before) {
      return false;
    }

    this.links = this.links.filter((link) => link.company_id !== id);
    return true;
  }
}
