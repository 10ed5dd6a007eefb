import { describe, expect, it } from "vitest";

import { countStatuses, planStatusChanges } from "@/lib/portfolio/standardize";
import type { StatusRow } from "@/types/company";

function row(overrides: Partial<StatusRow>): StatusRow {
  return { id: 1, name: "Example", status: null, exit_type: null, is_public: false, is_acquired: false, ...overrides };
}

describe("planStatusChanges", () => {
  it("skips rows that already hold a consistent status", () => {
    expect(planStatusChanges([row({ status: "Active" }), row({ status: "Exit", exit_type: "IPO", is_public: true })])).toEqual(
      [],
    );
  });

  it("maps holding language to Active", () => {
    expect(planStatusChanges([row({ id: 4, name: "Delta", status: "Current Portfolio" })])).toEqual([
      { id: 4, name: "Delta", before: "Current Portfolio", after: "Active", acquirer: null, update: { status: "Active" } },
    ]);
  });

  it("records acquisitions with the acquirer", () => {
    const [change] = planStatusChanges([row({ id: 7, name: "Birch", status: "Realized - Acquired by Oakfield Group" })]);

    expect(change).toEqual({
      id: 7,
      name: "Birch",
      before: "Realized - Acquired by Oakfield Group",
      after: "Exit",
      acquirer: "Oakfield Group",
      update: { status: "Exit", exit_type: "Acquisition", is_acquired: true },
    });
  });

  it("treats public companies as IPO exits", () => {
    const [change] = planStatusChanges([row({ status: "Active", is_public: true })]);
    expect(change?.update).toEqual({ status: "Exit", exit_type: "IPO" });
  });

  it("keeps an existing exit type and only sets the missing flag", () => {
    const [change] = planStatusChanges([row({ status: "Exit", exit_type: "Acquisition" })]);
    expect(change?.update).toEqual({ is_acquired: true });
  });

  it("falls back to Exit for empty or unrecognized statuses", () => {
    const changes = planStatusChanges([row({ id: 1, status: null }), row({ id: 2, status: "Divested" })]);
    expect(changes.map((change) => [change.id, change.update])).toEqual([
      [1, { status: "Exit" }],
      [2, { status: "Exit" }],
    ]);
  });
});

describe("countStatuses", () => {
  it("orders by count then name and labels missing values", () => {
    expect(countStatuses(["Exit", null, "Active", "Exit", "Active", "current"])).toEqual([
      ["Active", 2],
      ["Exit", 2],
      ["current", 1],
      ["Unknown", 1],
    ]);
  });
});
