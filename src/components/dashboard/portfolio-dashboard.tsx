"use client";

import { Briefcase, Building2, LogOut, TrendingUp } from "lucide-react";
import Link from "next/link";
import { useState } from "react";

import { CompanyEditForm } from "@/components/company/company-edit-form";
import { CompanySidePanel } from "@/components/company/company-side-panel";
import { CompanyTable } from "@/components/company/company-table";
import { FiltersBar } from "@/components/dashboard/filters-bar";
import { StatCard } from "@/components/dashboard/stat-card";
import { ErrorState, LoadingState } from "@/components/ui/states";
import { useCompanies, usePortfolioOverview } from "@/hooks/use-portfolio";
import { formatCount, formatPercent, percentOf } from "@/lib/format";
import type { Company, CompanyFilters } from "@/types/company";

export function PortfolioDashboard(): React.JSX.Element {
  const [filters, setFilters] = useState<CompanyFilters>({});
  const [selected, setSelected] = useState<Company | null>(null);
  const [isEditing, setIsEditing] = useState(false);

  const overview = usePortfolioOverview();
  const companies = useCompanies(filters);
  const stats = overview.data?.stats;

  const closePanel = (): void => {
    setSelected(null);
    setIsEditing(false);
  };

  return (
    <div className="min-h-screen bg-background">
      <header className="border-b border-border/60">
        <div className="mx-auto flex max-w-7xl items-center justify-between px-6 py-4">
          <div className="flex items-center gap-3">
            <Briefcase className="h-6 w-6 text-accent" aria-hidden="true" />
            <h1 className="text-xl font-semibold text-[var(--text-primary)]">PE Portfolio Explorer</h1>
          </div>
          {stats ? (
            <p className="text-sm text-[var(--text-secondary)]">
              {formatCount(stats.total_companies)} companies · {formatCount(stats.total_pe_firms)} firms
            </p>
          ) : null}
        </div>
      </header>

      <main className="mx-auto max-w-7xl space-y-6 px-6 py-8">
        {overview.error ? <ErrorState description={overview.error} /> : null}

        {stats ? (
          <section aria-label="Portfolio statistics" className="grid grid-cols-1 gap-4 md:grid-cols-4">
            <StatCard
              title="Total Companies"
              value={formatCount(stats.total_companies)}
              icon={<Building2 className="h-5 w-5" aria-hidden="true" />}
            />
            <StatCard
              title="Active"
              value={formatCount(stats.current_companies)}
              icon={<TrendingUp className="h-5 w-5" aria-hidden="true" />}
              subtitle={formatPercent(percentOf(stats.current_companies, stats.total_companies))}
            />
            <StatCard
              title="Exited"
              value={formatCount(stats.exited_companies)}
              icon={<LogOut className="h-5 w-5" aria-hidden="true" />}
              subtitle={formatPercent(percentOf(stats.exited_companies, stats.total_companies))}
            />
            <StatCard
              title="Co-Investments"
              value={formatCount(stats.co_investments)}
              icon={<Briefcase className="h-5 w-5" aria-hidden="true" />}
              subtitle={`${formatPercent(stats.enrichment_rate)} enriched`}
            />
          </section>
        ) : null}

        <FiltersBar
          firms={overview.data?.firms ?? []}
          sectors={overview.data?.sectors ?? []}
          onApply={(next) => {
            setFilters(next);
            closePanel();
          }}
        />

        <div className="grid grid-cols-1 gap-6 lg:grid-cols-[minmax(0,1fr)_420px]">
          <div>
            {companies.isLoading && !companies.data ? <LoadingState /> : null}
            {companies.error ? <ErrorState description={companies.error} /> : null}
            {companies.data ? (
              <CompanyTable
                companies={companies.data}
                selectedId={selected?.id ?? null}
                onSelect={(company) => {
                  setSelected(company);
                  setIsEditing(false);
                }}
              />
            ) : null}
          </div>

          {selected ? (
            <div className="rounded-xl border border-border/60 bg-card lg:sticky lg:top-6 lg:max-h-[calc(100vh-3rem)] lg:overflow-y-auto">
              {isEditing ? (
                <CompanyEditForm
                  key={selected.id}
                  company={selected}
                  onCancel={() => setIsEditing(false)}
                  onSaved={(company) => {
                    setSelected(company);
                    setIsEditing(false);
                    companies.reload();
                    overview.reload();
                  }}
                  onDeleted={() => {
                    closePanel();
                    companies.reload();
                    overview.reload();
                  }}
                />
              ) : (
                <>
                  <CompanySidePanel company={selected} onClose={closePanel} onEdit={() => setIsEditing(true)} />
                  <div className="border-t border-border/60 px-8 py-4">
                    <Link href={`/companies/${selected.id}`} className="text-sm text-accent hover:text-[var(--accent-hover)]">
                      Open full page
                    </Link>
                  </div>
                </>
              )}
            </div>
          ) : null}
        </div>
      </main>
    </div>
  );
}
