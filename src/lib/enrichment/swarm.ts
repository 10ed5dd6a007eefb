import { z } from "zod";

import { compactUpdate, ProviderRequestError, REQUEST_TIMEOUT_MS, type EnrichmentProvider } from "@/lib/enrichment/types";
import type { CompanyRecord, CompanyUpdate } from "@/types/company";

export const SWARM_BASE_URL = "https://bee.theswarm.com";

const searchSchema = z.object({
  ids: z.array(z.union([z.string(), z.number()])).default([]),
  totalCount: z.number().default(0),
});

const amount = z.number().nullish();
const text = z.string().nullish();

const companyInfoSchema = z.object({
  description: text,
  summary: text,
  website: text,
  industry: text,
  founded: text,
  locations: z.array(z.object({ name: text, is_primary: z.boolean().nullish() })).nullish(),
  size: z.object({ class: text }).nullish(),
  workforce: z.object({ headcount: amount }).nullish(),
  funding: z
    .object({
      total_funding_usd: amount,
      last_round: z.object({ last_round_type: text, last_round_amount_usd: amount }).nullish(),
    })
    .nullish(),
  business_data: z
    .object({
      ownership_status: text,
      ownership_status_detailed: text,
      is_acquired: z.boolean().nullish(),
      is_exited: z.boolean().nullish(),
      customer_types: z.array(z.string()).nullish(),
      stock_exchange: text,
      financing_profile: z.object({ market_cap: amount, ipo_date: text }).nullish(),
    })
    .nullish(),
});

const fetchSchema = z.object({
  results: z.array(z.object({ company_info: companyInfoSchema.nullish() })).default([]),
});

export type SwarmCompanyInfo = z.infer<typeof companyInfoSchema>;

export interface SwarmCompany {
  headquarters: string | null;
  foundedYear: string | null;
  description: string | null;
  summary: string | null;
  website: string | null;
  industry: string | null;
  headcount: number | null;
  sizeClass: string | null;
  totalFundingUsd: number | null;
  lastRoundType: string | null;
  lastRoundAmountUsd: number | null;
  marketCap: number | null;
  ipoDate: string | null;
  ipoYear: number | null;
  ownershipStatus: string | null;
  isPublic: boolean;
  isAcquired: boolean;
  isExited: boolean;
  customerTypes: string | null;
  stockExchange: string | null;
}

export interface SwarmClientOptions {
  apiKey: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

export function toSwarmCompany(info: SwarmCompanyInfo): SwarmCompany {
  const locations = info.locations ?? [];
  const primary = locations.find((location) => location.is_primary) ?? locations[0];
  const business = info.business_data;
  const financing = business?.financing_profile;
  const ownershipDetail = business?.ownership_status_detailed?.toLowerCase() ?? "";
  const ipoDate = financing?.ipo_date ?? null;
  const ipoYear = ipoDate && ipoDate.length >= 4 ? Number(ipoDate.slice(0, 4)) : null;
  const customerTypes = business?.customer_types ?? [];

  return {
    headquarters: primary?.name ?? null,
    foundedYear: info.founded && info.founded.length >= 4 ? info.founded.slice(0, 4) : null,
    description: info.description ?? null,
    summary: info.summary ?? null,
    website: info.website ?? null,
    industry: info.industry ?? null,
    headcount: info.workforce?.headcount ?? null,
    sizeClass: info.size?.class ?? null,
    totalFundingUsd: info.funding?.total_funding_usd ?? null,
    lastRoundType: info.funding?.last_round?.last_round_type ?? null,
    lastRoundAmountUsd: info.funding?.last_round?.last_round_amount_usd ?? null,
    marketCap: financing?.market_cap ?? null,
    ipoDate,
    ipoYear: ipoYear !== null && Number.isInteger(ipoYear) ? ipoYear : null,
    ownershipStatus: business?.ownership_status ?? null,
    isPublic: ownershipDetail.includes("ipo") || ownershipDetail.includes("public"),
    isAcquired: business?.is_acquired ?? false,
    isExited: business?.is_exited ?? false,
    customerTypes: customerTypes.length ? customerTypes.join(", ") : null,
    stockExchange: business?.stock_exchange ?? null,
  };
}

export class SwarmClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SwarmClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? SWARM_BASE_URL;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  private async postJson(path: string, body: unknown): Promise<unknown> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new ProviderRequestError(`Swarm ${path} responded ${response.status}`, response.status);
    }
    return response.json();
  }

  async searchCompany(name: string): Promise<string | null> {
    const payload = searchSchema.parse(
      await this.postJson("/companies/search", { query: { match: { "company_info.name": name } } }),
    );
    const [first] = payload.ids;
    return payload.totalCount > 0 && first !== undefined ? String(first) : null;
  }

  async getCompany(id: string): Promise<SwarmCompany | null> {
    const payload = fetchSchema.parse(await this.postJson("/companies/fetch", { ids: [id] }));
    const info = payload.results[0]?.company_info;
    return info ? toSwarmCompany(info) : null;
  }
}

export function swarmUpdate(company: SwarmCompany): CompanyUpdate {
  const update = compactUpdate({
    headquarters: company.headquarters,
    description: company.description,
    summary: company.summary,
    website: company.website,
    industry: company.industry,
    swarm_headcount: company.headcount,
    size_class: company.sizeClass,
    total_funding_usd: company.totalFundingUsd,
    last_round_type: company.lastRoundType,
    last_round_amount_usd: company.lastRoundAmountUsd,
    market_cap: company.marketCap,
    ipo_date: company.ipoDate,
    ipo_year: company.ipoYear,
    ownership_status: company.ownershipStatus,
    customer_types: company.customerTypes,
    stock_exchange: company.stockExchange,
  });

  // Flags only ever get raised by enrichment.
  if (company.isPublic) update.is_public = true;
  if (company.isAcquired) update.is_acquired = true;
  if (company.isExited) update.is_exited = true;

  return update;
}

export function createSwarmProvider(client: SwarmClient): EnrichmentProvider {
  return {
    name: "swarm",
    async lookup(companyName: string): Promise<CompanyUpdate | null> {
      const id = await client.searchCompany(companyName);
      if (!id) {
        return null;
      }

      const company = await client.getCompany(id);
      return company ? swarmUpdate(company) : null;
    },
    hasData(company: CompanyRecord): boolean {
      return company.swarm_headcount !== null || company.size_class !== null;
    },
  };
}
