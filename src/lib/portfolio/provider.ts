import "server-only";

import { getServerEnv } from "@/lib/env";
import { loadMockPortfolio } from "@/lib/mock/portfolio";
import { InMemoryPortfolioRepository } from "@/lib/portfolio/memory-repository";
import type { PortfolioRepository } from "@/lib/portfolio/repository";
import { PortfolioService } from "@/lib/portfolio/service";
import { createSupabasePortfolioRepository } from "@/lib/portfolio/supabase-repository";
import { getSupabaseServerClient } from "@/lib/supabase/server";

let cachedRepository: PortfolioRepository | null = null;
let cachedService: PortfolioService | null = null;

export function getPortfolioRepository(): PortfolioRepository {
  if (cachedRepository) {
    return cachedRepository;
  }

  const env = getServerEnv();
  cachedRepository =
    env.PORTFOLIO_DATA_SOURCE === "mock"
      ? new InMemoryPortfolioRepository(loadMockPortfolio())
      : createSupabasePortfolioRepository(getSupabaseServerClient());

  console.info(`[portfolio] using ${env.PORTFOLIO_DATA_SOURCE} data source`);
  return cachedRepository;
}

export function getPortfolioService(): PortfolioService {
  if (cachedService) {
    return cachedService;
  }

  cachedService = new PortfolioService({
    repository: getPortfolioRepository(),
    adminApiKey: getServerEnv().ADMIN_API_KEY,
  });
  return cachedService;
}
