import "dotenv/config";

import { parseEnrichArgs, type EnrichArgs } from "@/lib/enrichment/args";
import { createCrunchbaseProvider, CrunchbaseClient } from "@/lib/enrichment/crunchbase";
import { enrichCompanies } from "@/lib/enrichment/pipeline";
import { createSwarmProvider, SwarmClient } from "@/lib/enrichment/swarm";
import type { EnrichmentProvider } from "@/lib/enrichment/types";
import { getServerEnv } from "@/lib/env";
import { getPortfolioRepository } from "@/lib/portfolio/provider";

function buildProvider(name: EnrichArgs["provider"]): EnrichmentProvider {
  const env = getServerEnv();

  if (name === "crunchbase") {
    if (!env.CRUNCHBASE_API_KEY) {
      throw new Error("CRUNCHBASE_API_KEY is not set.");
    }
    return createCrunchbaseProvider(new CrunchbaseClient({ apiKey: env.CRUNCHBASE_API_KEY }));
  }

  if (!env.SWARM_API_KEY) {
    throw new Error("SWARM_API_KEY is not set.");
  }
  return createSwarmProvider(new SwarmClient({ apiKey: env.SWARM_API_KEY }));
}

async function main(): Promise<void> {
  const args = parseEnrichArgs(process.argv.slice(2));
  const summary = await enrichCompanies({
    repository: getPortfolioRepository(),
    provider: buildProvider(args.provider),
    limit: args.limit,
    dryRun: args.dryRun,
    onlyMissing: args.onlyMissing,
  });

  console.info(JSON.stringify(summary, null, 2));
}

main().catch((error: unknown) => {
  console.error("[enrich] Failed", error);
  process.exitCode = 1;
});
