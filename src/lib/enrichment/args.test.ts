// @vitest-environment node
import { describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { parseDryRunFlag, parseEnrichArgs } from "@/lib/enrichment/args";

describe("parseEnrichArgs", () => {
  it("reads provider, limit and flags", () => {
    expect(parseEnrichArgs(["--provider", "swarm", "--limit", "25", "--dry-run", "--only-missing"])).toEqual({
      provider: "swarm",
      limit: 25,
      dryRun: true,
      onlyMissing: true,
    });
  });

  it("defaults the flags to off", () => {
    expect(parseEnrichArgs(["--provider=crunchbase"])).toEqual({
      provider: "crunchbase",
      dryRun: false,
      onlyMissing: false,
    });
  });

  it("rejects an unknown provider", () => {
    expect(() => parseEnrichArgs(["--provider", "clearbit"])).toThrow("--provider must be one of crunchbase, swarm");
  });

  it("rejects a non-positive limit", () => {
    expect(() => parseEnrichArgs(["--provider", "swarm", "--limit", "0"])).toThrow(ZodError);
  });

  it("rejects unknown options", () => {
    expect(() => parseEnrichArgs(["--provider", "swarm", "--force"])).toThrow();
  });
});

describe("parseDryRunFlag", () => {
  it("is false unless passed", () => {
    expect(parseDryRunFlag([])).toBe(false);
    expect(parseDryRunFlag(["--dry-run"])).toBe(true);
  });
});
