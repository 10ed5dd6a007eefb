import type { CompanyRecord, CompanyUpdate } from "@/types/company";

export type EnrichmentProviderName = "crunchbase" | "swarm";

export const ENRICHMENT_PROVIDERS: readonly EnrichmentProviderName[] = ["crunchbase", "swarm"];

export const REQUEST_TIMEOUT_MS = 10_000;

export class ProviderRequestError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "ProviderRequestError";
    this.status = status;
  }
}

export interface EnrichmentProvider {
  readonly name: EnrichmentProviderName;
  /** `null` when the provider has no match for the name. Throws on transport or HTTP failures. */
  lookup(companyName: string): Promise<CompanyUpdate | null>;
  /** Whether the company already carries what this provider would write. */
  hasData(company: CompanyRecord): boolean;
}

/** Drops empty strings, zero amounts and absent values so enrichment never blanks a column. */
export function compactUpdate(update: CompanyUpdate): CompanyUpdate {
  const compacted: CompanyUpdate = {};

  for (const [key, value] of Object.entries(update)) {
    if (value === null || value === undefined) continue;
    if (typeof value === "string" && value.trim() === "") continue;
    if (typeof value === "number" && (!Number.isFinite(value) || value === 0)) continue;
    Object.assign(compacted, { [key]: value });
  }

  return compacted;
}
