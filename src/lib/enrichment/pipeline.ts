import type { EnrichmentProvider } from "@/lib/enrichment/types";
import type { PortfolioRepository } from "@/lib/portfolio/repository";

export const PAUSE_BETWEEN_COMPANIES_MS = 500;
export const PAUSE_EVERY_BATCH_MS = 2_000;
export const BATCH_SIZE = 10;

export interface EnrichmentSummary {
  processed: number;
  enriched: number;
  notFound: number;
  failed: number;
  skipped: number;
}

export interface EnrichmentLogger {
  info(message: string): void;
  warn(message: string, error?: unknown): void;
}

export interface EnrichCompaniesOptions {
  repository: PortfolioRepository;
  provider: EnrichmentProvider;
  limit?: number;
  dryRun?: boolean;
  onlyMissing?: boolean;
  sleep?: (ms: number) => Promise<void>;
  logger?: EnrichmentLogger;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function consoleLogger(scope: string): EnrichmentLogger {
  return {
    info: (message) => console.info(`[${scope}] ${message}`),
    warn: (message, error) => console.warn(`[${scope}] ${message}`, error ?? ""),
  };
}

/**
 * Looks every company up with one provider and writes back the fields it found.
 * Runs sequentially; a failure on one company is logged and counted, never thrown.
 */
export async function enrichCompanies(options: EnrichCompaniesOptions): Promise<EnrichmentSummary> {
  const { repository, provider, limit, dryRun = false, onlyMissing = false } = options;
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? consoleLogger(`enrich:${provider.name}`);

  const companies = await repository.listAllCompanies();
  const candidates = limit === undefined ? companies : companies.slice(0, Math.max(limit, 0));
  const summary: EnrichmentSummary = { processed: 0, enriched: 0, notFound: 0, failed: 0, skipped: 0 };

  logger.info(`Enriching ${candidates.length} of ${companies.length} companies${dryRun ? " (dry run)" : ""}`);

  for (const [index, company] of candidates.entries()) {
    if (onlyMissing && provider.hasData(company)) {
      summary.skipped += 1;
      continue;
    }

    summary.processed += 1;

    try {
      const update = await provider.lookup(company.name);
      const fields = update ? Object.keys(update) : [];

      if (!update || !fields.length) {
        summary.notFound += 1;
        logger.info(`${company.name}: no match`);
      } else {
        if (!dryRun) {
          await repository.updateCompany(company.id, update);
        }
        summary.enriched += 1;
        logger.info(`${company.name}: ${fields.join(", ")}`);
      }
    } catch (error) {
      summary.failed += 1;
      logger.warn(`${company.name}: lookup failed`, error);
    }

    if (index < candidates.length - 1) {
      await sleep(summary.processed % BATCH_SIZE === 0 ? PAUSE_EVERY_BATCH_MS : PAUSE_BETWEEN_COMPANIES_MS);
    }
  }

  logger.info(
    `Done: processed=${summary.processed} enriched=${summary.enriched} notFound=${summary.notFound} failed=${summary.failed} skipped=${summary.skipped}`,
  );
  return summary;
}
