import "dotenv/config";

import { parseDryRunFlag } from "@/lib/enrichment/args";
import { getPortfolioRepository } from "@/lib/portfolio/provider";
import { countStatuses, planStatusChanges } from "@/lib/portfolio/standardize";

const SAMPLE_SIZE = 10;

function printDistribution(title: string, statuses: Array<string | null>): void {
  console.info(`\n${title}`);
  for (const [status, count] of countStatuses(statuses)) {
    console.info(`  ${status.padEnd(50)} ${String(count).padStart(5)} companies`);
  }
}

async function main(): Promise<void> {
  const dryRun = parseDryRunFlag(process.argv.slice(2));
  const repository = getPortfolioRepository();
  const rows = await repository.listStatusRows();
  const changes = planStatusChanges(rows);
  const changedById = new Map<number, string>(changes.map((change) => [change.id, change.after]));

  console.info(`[standardize-statuses] ${rows.length} companies, ${changes.length} to change`);
  printDistribution("Before", rows.map((row) => row.status));
  printDistribution("After", rows.map((row) => changedById.get(row.id) ?? row.status));

  for (const change of changes.slice(0, SAMPLE_SIZE)) {
    console.info(`  ${change.name.padEnd(30)} ${String(change.before).padEnd(30)} -> ${change.after}`);
  }

  for (const change of changes.filter((candidate) => candidate.acquirer)) {
    console.info(`  ${change.name} acquired by ${change.acquirer}`);
  }

  if (dryRun) {
    console.info("[standardize-statuses] Dry run, nothing written.");
    return;
  }

  for (const change of changes) {
    await repository.updateCompany(change.id, change.update);
  }
  console.info(`[standardize-statuses] Updated ${changes.length} companies.`);
}

main().catch((error: unknown) => {
  console.error("[standardize-statuses] Failed", error);
  process.exitCode = 1;
});
