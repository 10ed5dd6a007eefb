import { z } from "zod";

import { BadRequestError } from "@/lib/portfolio/errors";
import type { CompanyQuery } from "@/types/company";

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 1000;

const QUERY_KEYS = [
  "pe_firm",
  "status",
  "sector",
  "industry",
  "exit_type",
  "is_public",
  "search",
  "limit",
  "offset",
] as const;

const integerParam = z.coerce.number().int().optional();
// A page of zero or fewer rows is a caller error, not a request for one row.
const limitParam = z.coerce.number().int().min(1).optional();

const companyQuerySchema = z.object({
  pe_firm: z.string().optional(),
  status: z.string().optional(),
  sector: z.string().optional(),
  industry: z.string().optional(),
  exit_type: z.string().optional(),
  is_public: z.string().toLowerCase().pipe(z.enum(["true", "false"])).optional(),
  search: z.string().optional(),
  limit: limitParam,
  offset: integerParam,
});

function readParams(params: URLSearchParams, keys: readonly string[]): Record<string, string | undefined> {
  const raw: Record<string, string | undefined> = {};
  for (const key of keys) {
    const value = params.get(key)?.trim();
    raw[key] = value ? value : undefined;
  }
  return raw;
}

export function clampLimit(limit: number | undefined): number {
  return Math.min(limit ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
}

/** Throws `ZodError` when `limit`, `offset` or `is_public` cannot be coerced, or `limit` is below 1. */
export function parseCompanyQuery(params: URLSearchParams): CompanyQuery {
  const parsed = companyQuerySchema.parse(readParams(params, QUERY_KEYS));

  return {
    peFirm: parsed.pe_firm,
    status: parsed.status,
    sector: parsed.sector,
    industry: parsed.industry,
    exitType: parsed.exit_type,
    isPublic: parsed.is_public === undefined ? undefined : parsed.is_public === "true",
    search: parsed.search,
    limit: clampLimit(parsed.limit),
    offset: Math.max(parsed.offset ?? 0, 0),
  };
}

export function parseLimitParam(params: URLSearchParams): number {
  const { limit } = z.object({ limit: limitParam }).parse(readParams(params, ["limit"]));
  return clampLimit(limit);
}

export function parseCompanyId(raw: string): number {
  const parsed = z.coerce.number().int().positive().safeParse(raw);
  if (!parsed.success) {
    throw new BadRequestError(`Invalid company id "${raw}"`);
  }
  return parsed.data;
}
