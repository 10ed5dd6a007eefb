// @vitest-environment node
import { describe, expect, it, vi } from "vitest";

import { enrichCompanies, type EnrichmentLogger } from "@/lib/enrichment/pipeline";
import type { EnrichmentProvider } from "@/lib/enrichment/types";
import { InMemoryPortfolioRepository } from "@/lib/portfolio/memory-repository";
import { buildSeed } from "@/test/portfolio-fixtures";
import type { CompanyUpdate } from "@/types/company";

function silentLogger(): EnrichmentLogger {
  return { info: vi.fn(), warn: vi.fn() };
}

function fakeProvider(results: Record<string, CompanyUpdate | null | Error>): EnrichmentProvider {
  return {
    name: "swarm",
    lookup: vi.fn(async (name: string) => {
      const result = results[name] ?? null;
      if (result instanceof Error) {
        throw result;
      }
      return result;
    }),
    hasData: (company) => company.size_class !== null,
  };
}

describe("enrichCompanies", () => {
  it("writes matches and counts every outcome", async () => {
    const repository = new InMemoryPortfolioRepository(buildSeed());
    const sleep = vi.fn(async (_ms: number) => {});
    const logger = silentLogger();
    const provider = fakeProvider({
      "Acme Robotics": { size_class: "51-200", swarm_headcount: 80 },
      "Birch Health": new Error("timeout"),
      "Cedar Cloud": {},
    });

    const summary = await enrichCompanies({ repository, provider, sleep, logger });

    expect(summary).toEqual({ processed: 4, enriched: 1, notFound: 2, failed: 1, skipped: 0 });
    const acme = await repository.findCompanyById(10);
    expect(acme?.size_class).toBe("51-200");
    expect(acme?.swarm_headcount).toBe(80);
    expect(sleep.mock.calls).toEqual([[500], [500], [500]]);
    expect(logger.warn).toHaveBeenCalledWith("Birch Health: lookup failed", expect.any(Error));
  });

  it("leaves the store untouched on a dry run", async () => {
    const repository = new InMemoryPortfolioRepository(buildSeed());
    const update = vi.spyOn(repository, "updateCompany");

    const summary = await enrichCompanies({
      repository,
      provider: fakeProvider({ "Acme Robotics": { size_class: "51-200" } }),
      dryRun: true,
      limit: 2,
      sleep: async () => {},
      logger: silentLogger(),
    });

    expect(summary).toMatchObject({ processed: 2, enriched: 1 });
    expect(update).not.toHaveBeenCalled();
  });

  it("skips companies that already have data when asked", async () => {
    const seed = buildSeed();
    seed.companies = seed.companies.map((company) =>
      company.id === 10 || company.id === 12 ? { ...company, size_class: "11-50" } : company,
    );
    const repository = new InMemoryPortfolioRepository(seed);
    const provider = fakeProvider({});

    const summary = await enrichCompanies({
      repository,
      provider,
      onlyMissing: true,
      sleep: async () => {},
      logger: silentLogger(),
    });

    expect(summary).toEqual({ processed: 2, enriched: 0, notFound: 2, failed: 0, skipped: 2 });
    expect(provider.lookup).toHaveBeenCalledTimes(2);
  });

  it("pauses longer after every tenth lookup", async () => {
    const seed = buildSeed();
    seed.companies = Array.from({ length: 12 }, (_, index) => ({ id: index + 1, name: `Company ${index + 1}` }));
    const sleep = vi.fn(async (_ms: number) => {});

    await enrichCompanies({
      repository: new InMemoryPortfolioRepository(seed),
      provider: fakeProvider({}),
      sleep,
      logger: silentLogger(),
    });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 500, 500, 500, 500, 500, 500, 500, 500, 2000, 500]);
  });
});
