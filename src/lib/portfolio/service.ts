import { timingSafeEqual } from "node:crypto";

import { z } from "zod";

import { encodeEmployeeCount, encodeRevenueRange } from "@/lib/portfolio/decoders";
import { BadRequestError, ForbiddenError, NotFoundError } from "@/lib/portfolio/errors";
import { toCompany } from "@/lib/portfolio/normalize";
import type { PortfolioRepository } from "@/lib/portfolio/repository";
import { canonicalStatus } from "@/lib/portfolio/status";
import type {
  Company,
  CompanyFacet,
  CompanyFirmLink,
  CompanyQuery,
  CompanyStatus,
  CompanyUpdate,
  Firm,
  FirmRecord,
  PortfolioStats,
} from "@/types/company";

const nullableText = z
  .string()
  .nullable()
  .transform((value) => (value === null || value.trim() === "" ? null : value.trim()));

export const companyUpdateSchema = z.object({
  name: z.string().trim().min(1).optional(),
  sector: nullableText.optional(),
  industry: nullableText.optional(),
  industry_category: nullableText.optional(),
  headquarters: nullableText.optional(),
  website: nullableText.optional(),
  linkedin_url: nullableText.optional(),
  description: nullableText.optional(),
  summary: nullableText.optional(),
  status: z.string().optional(),
  exit_type: nullableText.optional(),
  exit_info: nullableText.optional(),
  investment_year: nullableText.optional(),
  revenue_range: z.string().nullable().optional(),
  employee_count: z.string().nullable().optional(),
  is_public: z.boolean().optional(),
  is_acquired: z.boolean().optional(),
  is_exited: z.boolean().optional(),
  stock_exchange: nullableText.optional(),
  ownership_status: nullableText.optional(),
});

export type CompanyUpdateInput = z.input<typeof companyUpdateSchema>;

/** Validates an admin edit body and turns labels back into stored codes. */
export function parseCompanyUpdate(body: unknown): CompanyUpdate {
  const { status, revenue_range, employee_count, ...rest } = companyUpdateSchema.parse(body);
  const update: CompanyUpdate = {};

  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) {
      Object.assign(update, { [key]: value });
    }
  }

  if (status !== undefined) {
    const canonical = canonicalStatus(status);
    if (!canonical) {
      throw new BadRequestError(`Unknown status "${status}". Expected Active or Exit.`);
    }
    update.status = canonical;
  }

  if (revenue_range !== undefined) {
    const code = encodeRevenueRange(revenue_range);
    if (code === undefined) {
      throw new BadRequestError(`Unknown revenue range "${revenue_range}".`);
    }
    update.revenue_range = code;
  }

  if (employee_count !== undefined) {
    const code = encodeEmployeeCount(employee_count);
    if (code === undefined) {
      throw new BadRequestError(`Unknown employee count "${employee_count}".`);
    }
    update.employee_count = code;
  }

  return update;
}

function distinctSorted(values: Array<string | null>): string[] {
  const unique = new Set(values.filter((value): value is string => typeof value === "string" && value.length > 0));
  return Array.from(unique).sort((a, b) => a.localeCompare(b));
}

export function summarizeFirms(firms: FirmRecord[], links: CompanyFirmLink[], facets: CompanyFacet[]): Firm[] {
  const statusById = new Map<number, CompanyStatus>(facets.map((facet) => [facet.id, facet.status]));

  return firms.map((firm) => {
    const companyIds = new Set(links.filter((link) => link.firm_id === firm.id).map((link) => link.company_id));
    const statuses = Array.from(companyIds)
      .map((id) => statusById.get(id))
      .filter((status) => status !== undefined);

    return {
      id: firm.id,
      name: firm.name,
      total_companies: statuses.length,
      current_portfolio_count: statuses.filter((status) => status === "Active").length,
      exited_portfolio_count: statuses.filter((status) => status === "Exit").length,
      last_scraped: firm.last_scraped,
    };
  });
}

export function computeStats(facets: CompanyFacet[], firmCount: number, links: CompanyFirmLink[]): PortfolioStats {
  const firmsPerCompany = new Map<number, Set<number>>();
  for (const link of links) {
    const firmIds = firmsPerCompany.get(link.company_id) ?? new Set<number>();
    firmIds.add(link.firm_id);
    firmsPerCompany.set(link.company_id, firmIds);
  }

  const knownIds = new Set(facets.map((facet) => facet.id));
  const coInvestments = Array.from(firmsPerCompany.entries()).filter(
    ([companyId, firmIds]) => knownIds.has(companyId) && firmIds.size > 1,
  ).length;

  const enriched = facets.filter((facet) => facet.linkedin_url !== null).length;
  const enrichmentRate = facets.length ? Math.round((enriched / facets.length) * 1000) / 10 : 0;

  return {
    total_companies: facets.length,
    total_pe_firms: firmCount,
    current_companies: facets.filter((facet) => facet.status === "Active").length,
    exited_companies: facets.filter((facet) => facet.status === "Exit").length,
    co_investments: coInvestments,
    enrichment_rate: enrichmentRate,
  };
}

function keysMatch(expected: string, provided: string): boolean {
  const expectedBuffer = Buffer.from(expected);
  const providedBuffer = Buffer.from(provided);
  return expectedBuffer.length === providedBuffer.length && timingSafeEqual(expectedBuffer, providedBuffer);
}

export interface PortfolioServiceOptions {
  repository: PortfolioRepository;
  adminApiKey: string;
}

export class PortfolioService {
  private readonly repository: PortfolioRepository;
  private readonly adminApiKey: string;

  constructor(options: PortfolioServiceOptions) {
    this.repository = options.repository;
    this.adminApiKey = options.adminApiKey;
  }

  authorizeAdmin(providedKey: string | null | undefined): void {
    if (!providedKey || !this.adminApiKey || !keysMatch(this.adminApiKey, providedKey)) {
      throw new ForbiddenError();
    }
  }

  async listCompanies(query: CompanyQuery): Promise<Company[]> {
    let status: ReturnType<typeof canonicalStatus> | undefined = undefined;
    if (query.status !== undefined) {
      status = canonicalStatus(query.status);
      if (!status) {
        return [];
      }
    }

    const records = await this.repository.findCompanies({ ...query, status });
    return records.map(toCompany);
  }

  async getCompany(id: number): Promise<Company> {
    const record = await this.repository.findCompanyById(id);
    if (!record) {
      throw new NotFoundError("Company not found");
    }
    return toCompany(record);
  }

  async listFirmCompanies(firmName: string, limit: number): Promise<Company[]> {
    const firm = await this.repository.findFirmByName(firmName);
    if (!firm) {
      throw new NotFoundError("PE firm not found");
    }

    const records = await this.repository.findCompaniesByFirm(firm.id, limit);
    return records.map(toCompany);
  }

  async listFirms(): Promise<Firm[]> {
    const [firms, links, facets] = await Promise.all([
      this.repository.listFirms(),
      this.repository.listFirmLinks(),
      this.repository.listCompanyFacets(),
    ]);
    return summarizeFirms(firms, links, facets);
  }

  async listSectors(): Promise<string[]> {
    const facets = await this.repository.listCompanyFacets();
    return distinctSorted(facets.map((facet) => facet.sector));
  }

  async listStatuses(): Promise<string[]> {
    const facets = await this.repository.listCompanyFacets();
    return distinctSorted(facets.map((facet) => facet.status));
  }

  async listIndustries(): Promise<string[]> {
    const facets = await this.repository.listCompanyFacets();
    return distinctSorted(facets.map((facet) => facet.industry));
  }

  async getStats(): Promise<PortfolioStats> {
    const [facets, firms, links] = await Promise.all([
      this.repository.listCompanyFacets(),
      this.repository.listFirms(),
      this.repository.listFirmLinks(),
    ]);
    return computeStats(facets, firms.length, links);
  }

  /** Checks the key before looking at the body, and the body before touching the store. */
  async updateCompany(id: number, body: unknown, providedKey: string | null): Promise<Company> {
    this.authorizeAdmin(providedKey);
    const update = parseCompanyUpdate(body);

    const existing = await this.repository.findCompanyById(id);
    if (!existing) {
      throw new NotFoundError("Company not found");
    }

    if (!Object.keys(update).length) {
      return toCompany(existing);
    }

    const updated = await this.repository.updateCompany(id, update);
    if (!updated) {
      throw new NotFoundError("Company not found");
    }

    console.info(`[portfolio] updated company ${id} fields=${Object.keys(update).join(",")}`);
    return toCompany(updated);
  }

  async deleteCompany(id: number, providedKey: string | null): Promise<{ deleted: true; id: number }> {
    this.authorizeAdmin(providedKey);

    const deleted = await this.repository.deleteCompany(id);
    if (!deleted) {
      throw new NotFoundError("Company not found");
    }

    console.info(`[portfolio] deleted company ${id}`);
    return { deleted: true, id };
  }
}
