import { describe, expect, it } from "vitest";

import { DEFAULT_SORT, pageWindow, paginate, sortCompanies, toggleSort } from "@/lib/portfolio/table";
import { buildCompany } from "@/test/portfolio-fixtures";

const companies = [
  buildCompany({ id: 1, name: "Zephyr", employee_count: "1,001-5,000", revenue_range: "$10B+" }),
  buildCompany({ id: 2, name: "Acme", employee_count: "N/A", revenue_range: "$1M - $10M" }),
  buildCompany({ id: 3, name: "Birch", employee_count: "51-100", revenue_range: "N/A" }),
  buildCompany({ id: 4, name: "Acme", employee_count: "10,001+", revenue_range: "Less than $1M" }),
];

function ids(field: Parameters<typeof sortCompanies>[1]): number[] {
  return sortCompanies(companies, field).map((company) => company.id);
}

describe("sortCompanies", () => {
  it("sorts names with id as tie-break", () => {
    expect(ids(DEFAULT_SORT)).toEqual([2, 4, 3, 1]);
    expect(ids({ field: "name", direction: "desc" })).toEqual([1, 3, 2, 4]);
  });

  it("sorts employee ranges by lower bound with N/A first", () => {
    expect(ids({ field: "employee_count", direction: "asc" })).toEqual([2, 3, 1, 4]);
  });

  it("sorts revenue ranges by bracket", () => {
    expect(ids({ field: "revenue_range", direction: "desc" })).toEqual([1, 2, 4, 3]);
  });

  it("does not mutate its input", () => {
    sortCompanies(companies, { field: "name", direction: "desc" });
    expect(companies.map((company) => company.id)).toEqual([1, 2, 3, 4]);
  });
});

describe("toggleSort", () => {
  it("flips direction on the same field and resets on a new one", () => {
    expect(toggleSort(DEFAULT_SORT, "name")).toEqual({ field: "name", direction: "desc" });
    expect(toggleSort({ field: "name", direction: "desc" }, "status")).toEqual({ field: "status", direction: "asc" });
  });
});

describe("paginate", () => {
  const items = Array.from({ length: 250 }, (_, index) => index);

  it("returns the requested page with its bounds", () => {
    const page = paginate(items, 3);
    expect(page.rows).toHaveLength(50);
    expect(page).toMatchObject({ page: 3, totalPages: 3, start: 200, end: 250 });
  });

  it("clamps out-of-range pages", () => {
    expect(paginate(items, 9).page).toBe(3);
    expect(paginate(items, 0).page).toBe(1);
    expect(paginate([], 1)).toEqual({ rows: [], page: 1, totalPages: 1, start: 0, end: 0 });
  });
});

describe("pageWindow", () => {
  it("centres on the current page within bounds", () => {
    expect(pageWindow(1, 10)).toEqual([1, 2, 3, 4, 5]);
    expect(pageWindow(6, 10)).toEqual([4, 5, 6, 7, 8]);
    expect(pageWindow(10, 10)).toEqual([6, 7, 8, 9, 10]);
    expect(pageWindow(2, 3)).toEqual([1, 2, 3]);
  });
});
