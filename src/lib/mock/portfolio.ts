import { z } from "zod";

import type { PortfolioSeed } from "@/lib/portfolio/memory-repository";

import seed from "@/lib/mock/portfolio.json";

const seedSchema = z.object({
  firms: z.array(z.record(z.unknown())),
  companies: z.array(z.record(z.unknown())),
  company_firms: z.array(z.object({ company_id: z.number().int(), firm_id: z.number().int() })),
});

/** Sample portfolio served when `PORTFOLIO_DATA_SOURCE=mock`. */
export function loadMockPortfolio(): PortfolioSeed {
  return seedSchema.parse(seed);
}
