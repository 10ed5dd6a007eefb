import { parseArgs } from "node:util";

import { z } from "zod";

import { ENRICHMENT_PROVIDERS } from "@/lib/enrichment/types";

const enrichArgsSchema = z.object({
  provider: z.enum(["crunchbase", "swarm"], {
    errorMap: () => ({ message: `--provider must be one of ${ENRICHMENT_PROVIDERS.join(", ")}` }),
  }),
  limit: z.coerce.number().int().positive().optional(),
  dryRun: z.boolean(),
  onlyMissing: z.boolean(),
});

export type EnrichArgs = z.infer<typeof enrichArgsSchema>;

export function parseEnrichArgs(argv: string[]): EnrichArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      provider: { type: "string" },
      limit: { type: "string" },
      "dry-run": { type: "boolean", default: false },
      "only-missing": { type: "boolean", default: false },
    },
    strict: true,
  });

  return enrichArgsSchema.parse({
    provider: values.provider,
    limit: values.limit,
    dryRun: values["dry-run"],
    onlyMissing: values["only-missing"],
  });
}

export function parseDryRunFlag(argv: string[]): boolean {
  const { values } = parseArgs({
    args: argv,
    options: { "dry-run": { type: "boolean", default: false } },
    strict: true,
  });
  return values["dry-run"] ?? false;
}
