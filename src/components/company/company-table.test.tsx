import { cleanup, render, screen, within } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { afterEach, describe, expect, it, vi } from "vitest";

import { CompanyTable } from "@/components/company/company-table";
import { buildCompany } from "@/test/portfolio-fixtures";

const companies = [
  buildCompany({ id: 1, name: "Cedar Cloud", status: "Exit", employee_count: "1,001-5,000" }),
  buildCompany({ id: 2, name: "Acme Robotics", pe_firms: ["Alpha Partners"], employee_count: "51-100" }),
  buildCompany({ id: 3, name: "Birch Health", employee_count: "N/A" }),
];

function bodyRowNames(): string[] {
  const [, ...rows] = screen.getAllByRole("row");
  return rows.map((row) => within(row).getAllByRole("cell")[0]?.textContent ?? "");
}

afterEach(() => {
  cleanup();
});

describe("CompanyTable", () => {
  it("starts sorted by name and toggles direction", async () => {
    const user = userEvent.setup();
    render(<CompanyTable companies={companies} onSelect={() => {}} />);

    expect(bodyRowNames()).toEqual(["Acme Robotics", "Birch Health", "Cedar Cloud"]);

    await user.click(screen.getByRole("button", { name: "Company" }));

    expect(bodyRowNames()).toEqual(["Cedar Cloud", "Birch Health", "Acme Robotics"]);
    expect(screen.getByRole("columnheader", { name: "Company" })).toHaveAttribute("aria-sort", "descending");
  });

  it("sorts employee ranges by size", async () => {
    const user = userEvent.setup();
    render(<CompanyTable companies={companies} onSelect={() => {}} />);

    await user.click(screen.getByRole("button", { name: "Employees" }));

    expect(bodyRowNames()).toEqual(["Birch Health", "Acme Robotics", "Cedar Cloud"]);
  });

  it("selects a company when its row is clicked", async () => {
    const user = userEvent.setup();
    const onSelect = vi.fn();
    render(<CompanyTable companies={companies} onSelect={onSelect} />);

    await user.click(screen.getByText("Birch Health"));

    expect(onSelect).toHaveBeenCalledWith(companies[2]);
  });

  it("exports the sorted rows as CSV", async () => {
    const user = userEvent.setup();
    const onExport = vi.fn();
    render(<CompanyTable companies={companies} onSelect={() => {}} onExport={onExport} />);

    await user.click(screen.getByRole("button", { name: "Export CSV" }));

    const [csv] = onExport.mock.calls[0] ?? [];
    expect(String(csv).split("\r\n").slice(1).map((line) => line.split(",")[0])).toEqual([
      "Acme Robotics",
      "Birch Health",
      "Cedar Cloud",
    ]);
  });

  it("pages through large result sets", async () => {
    const user = userEvent.setup();
    const many = Array.from({ length: 150 }, (_, index) =>
      buildCompany({ id: index + 1, name: `Company ${String(index + 1).padStart(3, "0")}` }),
    );
    render(<CompanyTable companies={many} onSelect={() => {}} />);

    expect(screen.getByText("Showing 1-100 of 150 companies")).toBeInTheDocument();

    await user.click(screen.getByRole("button", { name: "Next" }));

    expect(screen.getByText("Showing 101-150 of 150 companies")).toBeInTheDocument();
    expect(bodyRowNames()[0]).toBe("Company 101");
    expect(screen.getByRole("button", { name: "2" })).toHaveAttribute("aria-current", "page");
  });

  it("shows the empty state without companies", () => {
    render(<CompanyTable companies={[]} onSelect={() => {}} />);
    expect(screen.getByText("No companies match")).toBeInTheDocument();
  });
});
