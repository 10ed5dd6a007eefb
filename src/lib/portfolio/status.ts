import type { CompanyStatus } from "@/types/company";

export const ACTIVE_MARKERS = ["active", "current", "portfolio"] as const;
export const ACQUISITION_MARKERS = ["acquired", "acquisition"] as const;

export function canonicalStatus(value: string | null | undefined): CompanyStatus | null {
  const lowered = value?.trim().toLowerCase();
  if (lowered === "active") return "Active";
  if (lowered === "exit") return "Exit";
  return null;
}

export interface StatusInput {
  rawStatus: string | null | undefined;
  exitType?: string | null;
  isPublic?: boolean | null;
}

/**
 * Collapses whatever a firm's website said into `Active` or `Exit`.
 * An IPO or a recorded exit type wins over the raw status text.
 */
export function normalizeStatus({ rawStatus, exitType, isPublic }: StatusInput): CompanyStatus {
  if (isPublic) {
    return "Exit";
  }

  if (exitType && exitType.trim() !== "" && exitType !== "None") {
    return "Exit";
  }

  const lowered = rawStatus?.toLowerCase() ?? "";
  if (ACQUISITION_MARKERS.some((marker) => lowered.includes(marker))) {
    return "Exit";
  }

  if (ACTIVE_MARKERS.some((marker) => lowered.includes(marker))) {
    return "Active";
  }

  return "Exit";
}

export function inferExitType(rawStatus: string | null | undefined, isPublic: boolean): string | null {
  if (isPublic) {
    return "IPO";
  }

  const lowered = rawStatus?.toLowerCase() ?? "";
  return ACQUISITION_MARKERS.some((marker) => lowered.includes(marker)) ? "Acquisition" : null;
}

export interface IpoInfo {
  ticker: string;
  exchange: string | null;
}

/** Parses `IPO: NYSE: ABC` or `IPO: ABC` out of free-form exit text. */
export function extractIpoInfo(exitInfo: string | null | undefined): IpoInfo | null {
  if (!exitInfo || !exitInfo.includes("IPO")) {
    return null;
  }

  const match = /IPO:\s*(?:([A-Z]+):\s*)?([A-Z]+)/.exec(exitInfo);
  if (!match?.[2]) {
    return null;
  }

  return { ticker: match[2], exchange: match[1] ?? null };
}
