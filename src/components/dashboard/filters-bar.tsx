"use client";

import { Filter, Search } from "lucide-react";
import { useState } from "react";

import { Button } from "@/components/ui/button";
import { Input, Select } from "@/components/ui/input";
import type { CompanyFilters, Firm } from "@/types/company";

const EXIT_TYPES = ["IPO", "Acquisition"];

interface FiltersBarProps {
  firms: Firm[];
  sectors: string[];
  onApply: (filters: CompanyFilters) => void;
}

export interface FilterDraft {
  search: string;
  firm: string;
  status: string;
  exitType: string;
  sector: string;
}

const EMPTY_DRAFT: FilterDraft = { search: "", firm: "", status: "", exitType: "", sector: "" };

export function toCompanyFilters(draft: FilterDraft): CompanyFilters {
  const filters: CompanyFilters = {};
  if (draft.search.trim()) filters.search = draft.search.trim();
  if (draft.firm) filters.pe_firm = draft.firm;
  if (draft.status) filters.status = draft.status;
  // Exit type only narrows exited companies.
  if (draft.status === "Exit" && draft.exitType) filters.exit_type = draft.exitType;
  if (draft.sector) filters.sector = draft.sector;
  return filters;
}

export function FiltersBar({ firms, sectors, onApply }: FiltersBarProps): React.JSX.Element {
  const [draft, setDraft] = useState<FilterDraft>(EMPTY_DRAFT);

  const update = (patch: Partial<FilterDraft>): void => setDraft((prev) => ({ ...prev, ...patch }));

  return (
    <form
      role="search"
      aria-label="Company filters"
      className="rounded-xl border border-border/60 bg-card p-5"
      onSubmit={(event) => {
        event.preventDefault();
        onApply(toCompanyFilters(draft));
      }}
    >
      <div className="mb-4 flex items-center gap-2">
        <Filter className="h-4 w-4 text-[var(--text-secondary)]" aria-hidden="true" />
        <p className="section-header">Filters</p>
      </div>

      <div className="grid grid-cols-1 gap-3 md:grid-cols-6">
        <div className="relative md:col-span-2">
          <Search
            className="pointer-events-none absolute left-3 top-1/2 h-4 w-4 -translate-y-1/2 text-[var(--text-tertiary)]"
            aria-hidden="true"
          />
          <Input
            aria-label="Search companies"
            placeholder="Search companies..."
            value={draft.search}
            onChange={(event) => update({ search: event.target.value })}
            className="pl-9"
          />
        </div>

        <Select aria-label="PE firm" value={draft.firm} onChange={(event) => update({ firm: event.target.value })}>
          <option value="">All PE firms</option>
          {firms.map((firm) => (
            <option key={firm.id} value={firm.name}>
              {firm.name} ({firm.total_companies})
            </option>
          ))}
        </Select>

        <Select
          aria-label="Status"
          value={draft.status}
          onChange={(event) => {
            const status = event.target.value;
            update(status === "Exit" ? { status } : { status, exitType: "" });
          }}
        >
          <option value="">All statuses</option>
          <option value="Active">Active</option>
          <option value="Exit">Exit</option>
        </Select>

        <Select
          aria-label="Exit type"
          value={draft.exitType}
          disabled={draft.status !== "Exit"}
          onChange={(event) => update({ exitType: event.target.value })}
        >
          <option value="">All exit types</option>
          {EXIT_TYPES.map((exitType) => (
            <option key={exitType} value={exitType}>
              {exitType}
            </option>
          ))}
        </Select>

        <Select aria-label="Sector" value={draft.sector} onChange={(event) => update({ sector: event.target.value })}>
          <option value="">All sectors</option>
          {sectors.map((sector) => (
            <option key={sector} value={sector}>
              {sector}
            </option>
          ))}
        </Select>
      </div>

      <div className="mt-4 flex justify-end gap-2">
        <Button
          type="button"
          variant="outline"
          onClick={() => {
            setDraft(EMPTY_DRAFT);
            onApply({});
          }}
        >
          Reset
        </Button>
        <Button type="submit">Apply</Button>
      </div>
    </form>
  );
}
