"use client";

import { ArrowDown, ArrowUp, ArrowUpDown, ChevronLeft, ChevronRight, Download } from "lucide-react";
import { useMemo, useState } from "react";

import { Badge } from "@/components/ui/badge";
import { Button } from "@/components/ui/button";
import { EmptyState } from "@/components/ui/states";
import { companiesToCsv, csvFileName, downloadCsv } from "@/lib/portfolio/csv";
import {
  DEFAULT_SORT,
  pageWindow,
  paginate,
  sortCompanies,
  toggleSort,
  type SortField,
  type SortState,
} from "@/lib/portfolio/table";
import { cn } from "@/lib/utils";
import type { Company } from "@/types/company";

interface CompanyTableProps {
  companies: Company[];
  selectedId?: number | null;
  onSelect: (company: Company) => void;
  onExport?: (csv: string) => void;
}

const COLUMNS: Array<{ field: SortField; label: string }> = [
  { field: "name", label: "Company" },
  { field: "pe_firms", label: "PE Firms" },
  { field: "status", label: "Status" },
  { field: "industry", label: "Industry" },
  { field: "headquarters", label: "Headquarters" },
  { field: "employee_count", label: "Employees" },
  { field: "revenue_range", label: "Revenue" },
];

function SortIcon({ active, direction }: { active: boolean; direction: SortState["direction"] }): React.JSX.Element {
  if (!active) {
    return <ArrowUpDown className="h-3.5 w-3.5 text-[var(--text-tertiary)]" aria-hidden="true" />;
  }
  return direction === "asc" ? (
    <ArrowUp className="h-3.5 w-3.5 text-accent" aria-hidden="true" />
  ) : (
    <ArrowDown className="h-3.5 w-3.5 text-accent" aria-hidden="true" />
  );
}

function cellText(company: Company, field: SortField): string {
  switch (field) {
    case "pe_firms":
      return company.pe_firms.join(", ") || "N/A";
    case "industry":
      return company.industry ?? company.industry_category ?? "N/A";
    case "headquarters":
      return company.headquarters ?? "N/A";
    case "employee_count":
      return company.employee_count;
    case "revenue_range":
      return company.revenue_range;
    case "status":
      return company.status;
    case "name":
      return company.name;
  }
}

export function CompanyTable({ companies, selectedId = null, onSelect, onExport }: CompanyTableProps): React.JSX.Element {
  const [sort, setSort] = useState<SortState>(DEFAULT_SORT);
  const [page, setPage] = useState(1);

  const sorted = useMemo(() => sortCompanies(companies, sort), [companies, sort]);
  const current = paginate(sorted, page);

  if (!companies.length) {
    return <EmptyState />;
  }

  const handleExport = (): void => {
    const csv = companiesToCsv(sorted);
    if (onExport) {
      onExport(csv);
      return;
    }
    downloadCsv(csv, csvFileName(new Date()));
  };

  return (
    <div className="rounded-xl border border-border/60 bg-card">
      <div className="flex items-center justify-between gap-3 border-b border-border/60 px-5 py-3">
        <p className="text-sm text-[var(--text-secondary)]">
          Showing {current.start + 1}-{current.end} of {sorted.length.toLocaleString("en-US")} companies
        </p>
        <Button type="button" variant="outline" size="sm" onClick={handleExport}>
          <Download className="h-3.5 w-3.5" aria-hidden="true" />
          Export CSV
        </Button>
      </div>

      <div className="overflow-x-auto">
        <table className="w-full text-left text-sm">
          <thead>
            <tr className="border-b border-border/60">
              {COLUMNS.map((column) => {
                const active = sort.field === column.field;
                return (
                  <th
                    key={column.field}
                    scope="col"
                    aria-sort={active ? (sort.direction === "asc" ? "ascending" : "descending") : "none"}
                    className="px-5 py-3"
                  >
                    <button
                      type="button"
                      onClick={() => {
                        setSort((prev) => toggleSort(prev, column.field));
                        setPage(1);
                      }}
                      className="inline-flex items-center gap-1 text-xs font-semibold uppercase tracking-[0.5px] text-[var(--text-tertiary)] hover:text-[var(--text-primary)]"
                    >
                      {column.label}
                      <SortIcon active={active} direction={sort.direction} />
                    </button>
                  </th>
                );
              })}
            </tr>
          </thead>
          <tbody>
            {current.rows.map((company) => (
              <tr
                key={company.id}
                onClick={() => onSelect(company)}
                aria-selected={company.id === selectedId}
                className={cn(
                  "cursor-pointer border-b border-border/40 transition-colors hover:bg-muted/60",
                  company.id === selectedId ? "bg-muted" : "",
                )}
              >
                {COLUMNS.map((column) =>
                  column.field === "status" ? (
                    <td key={column.field} className="px-5 py-3">
                      <Badge variant={company.status === "Active" ? "success" : "neutral"}>{company.status}</Badge>
                    </td>
                  ) : (
                    <td
                      key={column.field}
                      className={cn(
                        "px-5 py-3 text-[var(--text-secondary)]",
                        column.field === "name" ? "font-medium text-[var(--text-primary)]" : "",
                      )}
                    >
                      {cellText(company, column.field)}
                    </td>
                  ),
                )}
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      {current.totalPages > 1 ? (
        <nav aria-label="Pagination" className="flex items-center justify-between px-5 py-3">
          <Button
            type="button"
            variant="ghost"
            size="sm"
            disabled={current.page === 1}
            onClick={() => setPage(current.page - 1)}
          >
            <ChevronLeft className="h-4 w-4" aria-hidden="true" />
            Previous
          </Button>
          <div className="flex items-center gap-1">
            {pageWindow(current.page, current.totalPages).map((number) => (
              <Button
                key={number}
                type="button"
                size="sm"
                variant={number === current.page ? "default" : "ghost"}
                aria-current={number === current.page ? "page" : undefined}
                onClick={() => setPage(number)}
              >
                {number}
              </Button>
            ))}
          </div>
          <Button
            type="button"
            variant="ghost"
            size="sm"
            disabled={current.page === current.totalPages}
            onClick={() => setPage(current.page + 1)}
          >
            Next
            <ChevronRight className="h-4 w-4" aria-hidden="true" />
          </Button>
        </nav>
      ) : null}
    </div>
  );
}
