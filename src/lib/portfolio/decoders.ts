export const NOT_AVAILABLE = "N/A";

export const REVENUE_RANGES: Readonly<Record<string, string>> = {
  r_00000000: "Less than $1M",
  r_00001000: "$1M - $10M",
  r_00010000: "$10M - $50M",
  r_00050000: "$50M - $100M",
  r_00100000: "$100M - $500M",
  r_00500000: "$500M - $1B",
  r_01000000: "$1B - $10B",
  r_10000000: "$10B+",
};

export const EMPLOYEE_RANGES: Readonly<Record<string, string>> = {
  c_00001_00010: "1-10",
  c_00011_00050: "11-50",
  c_00051_00100: "51-100",
  c_00101_00250: "101-250",
  c_00251_00500: "251-500",
  c_00501_01000: "501-1,000",
  c_01001_05000: "1,001-5,000",
  c_05001_10000: "5,001-10,000",
  c_10001_max: "10,001+",
};

export const REVENUE_RANGE_LABELS: readonly string[] = Object.values(REVENUE_RANGES);
export const EMPLOYEE_RANGE_LABELS: readonly string[] = Object.values(EMPLOYEE_RANGES);

function decodeWith(table: Readonly<Record<string, string>>, value: string | null | undefined): string {
  if (typeof value !== "string") {
    return NOT_AVAILABLE;
  }

  const key = value.trim();
  if (Object.hasOwn(table, key)) {
    return table[key] ?? NOT_AVAILABLE;
  }

  // Rows edited through the admin form before codes were enforced may hold labels.
  return Object.values(table).includes(key) ? key : NOT_AVAILABLE;
}

/**
 * Resolves a code or a label back to its code. Blank input clears the field (`null`);
 * anything unrecognized gives `undefined` so callers can reject it.
 */
function encodeWith(table: Readonly<Record<string, string>>, value: string | null | undefined): string | null | undefined {
  if (value === null || value === undefined || value.trim() === "") {
    return null;
  }

  const key = value.trim();
  if (Object.hasOwn(table, key)) {
    return key;
  }

  const match = Object.entries(table).find(([, label]) => label === key);
  return match ? match[0] : undefined;
}

export function decodeRevenueRange(code: string | null | undefined): string {
  return decodeWith(REVENUE_RANGES, code);
}

export function decodeEmployeeCount(code: string | null | undefined): string {
  return decodeWith(EMPLOYEE_RANGES, code);
}

export function encodeRevenueRange(value: string | null | undefined): string | null | undefined {
  return encodeWith(REVENUE_RANGES, value);
}

export function encodeEmployeeCount(value: string | null | undefined): string | null | undefined {
  return encodeWith(EMPLOYEE_RANGES, value);
}

/** Lower bound of a decoded employee range, `-1` for "N/A" so unknowns sort first. */
export function employeeRangeLowerBound(label: string): number {
  const index = EMPLOYEE_RANGE_LABELS.indexOf(label);
  if (index === -1) {
    return -1;
  }

  const digits = label.split("-")[0]?.replace(/[^0-9]/g, "") ?? "";
  return digits ? Number(digits) : -1;
}

export function revenueRangeRank(label: string): number {
  return REVENUE_RANGE_LABELS.indexOf(label);
}
