import { z } from "zod";

import { compactUpdate, ProviderRequestError, REQUEST_TIMEOUT_MS, type EnrichmentProvider } from "@/lib/enrichment/types";
import { encodeEmployeeCount, encodeRevenueRange } from "@/lib/portfolio/decoders";
import type { CompanyRecord, CompanyUpdate } from "@/types/company";

export const CRUNCHBASE_BASE_URL = "https://api.crunchbase.com/v4/data";

const ORGANIZATION_FIELDS = "location_identifiers,founded_on,short_description,revenue_range,num_employees_enum";

const autocompleteSchema = z.object({
  entities: z
    .array(
      z.object({
        identifier: z.object({ permalink: z.string().optional() }).optional(),
      }),
    )
    .default([]),
});

const organizationSchema = z.object({
  properties: z
    .object({
      location_identifiers: z
        .array(z.object({ location_type: z.string().optional(), value: z.string().optional() }))
        .optional(),
      founded_on: z.object({ value: z.string().optional() }).nullish(),
      short_description: z.string().nullish(),
      revenue_range: z.string().nullish(),
      num_employees_enum: z.string().nullish(),
    })
    .default({}),
});

export interface CrunchbaseOrganization {
  headquarters: string | null;
  foundedYear: string | null;
  description: string | null;
  revenueRange: string | null;
  employeeCount: string | null;
}

export interface CrunchbaseClientOptions {
  apiKey: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

function formatHeadquarters(locations: Array<{ location_type?: string; value?: string }>): string | null {
  const city = locations.find((location) => location.location_type === "city")?.value;
  const region = locations.find((location) => location.location_type === "region")?.value;
  const parts = [city, region].filter((part): part is string => Boolean(part));
  return parts.length ? parts.join(", ") : null;
}

export class CrunchbaseClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: CrunchbaseClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? CRUNCHBASE_BASE_URL;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  private async getJson(path: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries({ ...params, user_key: this.apiKey })) {
      url.searchParams.set(key, value);
    }

    const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    if (!response.ok) {
      throw new ProviderRequestError(`Crunchbase ${path} responded ${response.status}`, response.status);
    }
    return response.json();
  }

  /** First organization permalink the autocomplete returns, if any. */
  async searchOrganization(name: string): Promise<string | null> {
    const payload = autocompleteSchema.parse(
      await this.getJson("/autocompletes", { query: name, collection_ids: "organizations" }),
    );
    return payload.entities[0]?.identifier?.permalink || null;
  }

  async getOrganization(permalink: string): Promise<CrunchbaseOrganization> {
    const { properties } = organizationSchema.parse(
      await this.getJson(`/entities/organizations/${encodeURIComponent(permalink)}`, { field_ids: ORGANIZATION_FIELDS }),
    );

    const founded = properties.founded_on?.value;
    return {
      headquarters: formatHeadquarters(properties.location_identifiers ?? []),
      foundedYear: founded && founded.length >= 4 ? founded.slice(0, 4) : null,
      description: properties.short_description ?? null,
      revenueRange: properties.revenue_range ?? null,
      employeeCount: properties.num_employees_enum ?? null,
    };
  }
}

export function crunchbaseUpdate(organization: CrunchbaseOrganization): CompanyUpdate {
  return compactUpdate({
    headquarters: organization.headquarters,
    description: organization.description,
    // Codes the decoder does not know are dropped rather than stored.
    revenue_range: encodeRevenueRange(organization.revenueRange) ?? null,
    employee_count: encodeEmployeeCount(organization.employeeCount) ?? null,
  });
}

export function createCrunchbaseProvider(client: CrunchbaseClient): EnrichmentProvider {
  return {
    name: "crunchbase",
    async lookup(companyName: string): Promise<CompanyUpdate | null> {
      const permalink = await client.searchOrganization(companyName);
      if (!permalink) {
        return null;
      }
      return crunchbaseUpdate(await client.getOrganization(permalink));
    },
    hasData(company: CompanyRecord): boolean {
      return company.revenue_range !== null && company.employee_count !== null;
    },
  };
}
