import { ExternalLink, Pencil, X } from "lucide-react";

import { PropertyGrid, type PropertyRow } from "@/components/company/property-grid";
import { Button } from "@/components/ui/button";
import { TagPill } from "@/components/ui/tag-pill";
import { formatUsd } from "@/lib/format";
import { NOT_AVAILABLE } from "@/lib/portfolio/decoders";
import { extractIpoInfo } from "@/lib/portfolio/status";
import type { Company } from "@/types/company";

interface CompanySidePanelProps {
  company: Company | null;
  onClose?: () => void;
  onEdit?: (company: Company) => void;
}

function LinkAnchor({ url, label }: { url: string; label: string }): React.JSX.Element {
  return (
    <a
      href={url}
      target="_blank"
      rel="noreferrer"
      className="inline-flex items-center gap-1 text-sm text-accent hover:text-[var(--accent-hover)]"
    >
      {label}
      <ExternalLink className="h-3.5 w-3.5" aria-hidden="true" />
    </a>
  );
}

function SectionTitle({ children }: { children: React.ReactNode }): React.JSX.Element {
  return <p className="section-header mb-2">{children}</p>;
}

function hasValue(value: string | number | null | undefined): value is string | number {
  return value !== null && value !== undefined && String(value).trim().length > 0 && value !== NOT_AVAILABLE;
}

function pushRow(rows: PropertyRow[], label: string, value: string | number | null | undefined): void {
  if (hasValue(value)) {
    rows.push({ label, value: String(value) });
  }
}

function TextSection({ title, value }: { title: string; value: string | null }): React.JSX.Element | null {
  if (!hasValue(value)) {
    return null;
  }

  return (
    <section>
      <SectionTitle>{title}</SectionTitle>
      <p className="text-sm leading-6 text-[var(--text-secondary)]">{value}</p>
    </section>
  );
}

function flagLabels(company: Company): string[] {
  return [
    company.is_public ? "Public" : null,
    company.is_acquired ? "Acquired" : null,
    company.is_exited ? "Exited" : null,
  ].filter((label): label is string => label !== null);
}

export function CompanySidePanel({ company, onClose, onEdit }: CompanySidePanelProps): React.JSX.Element {
  if (!company) {
    return (
      <aside className="flex h-full items-center justify-center px-8 py-6">
        <p className="text-sm text-[var(--text-secondary)]">Select a company to view its full profile.</p>
      </aside>
    );
  }

  const ipo = extractIpoInfo(company.exit_info);

  const coreRows: PropertyRow[] = [];
  pushRow(coreRows, "Status", company.status);
  pushRow(coreRows, "Exit Type", company.exit_type);
  pushRow(coreRows, "Invested", company.investment_year);
  pushRow(coreRows, "Sector", company.sector);
  pushRow(coreRows, "Industry", company.industry);
  pushRow(coreRows, "Category", company.industry_category);
  pushRow(coreRows, "Headquarters", company.headquarters);
  pushRow(coreRows, "Employees", company.employee_count);
  pushRow(coreRows, "Revenue", company.revenue_range);
  pushRow(coreRows, "Headcount", company.swarm_headcount?.toLocaleString("en-US"));
  pushRow(coreRows, "Size", company.size_class);

  const financialRows: PropertyRow[] = [];
  if (company.total_funding_usd) pushRow(financialRows, "Total Funding", formatUsd(company.total_funding_usd));
  if (company.last_round_type || company.last_round_amount_usd) {
    const parts = [company.last_round_type, company.last_round_amount_usd ? formatUsd(company.last_round_amount_usd) : null];
    pushRow(financialRows, "Last Round", parts.filter(Boolean).join(" · "));
  }
  if (company.market_cap) pushRow(financialRows, "Market Cap", formatUsd(company.market_cap));
  pushRow(financialRows, "IPO Date", company.ipo_date);
  pushRow(financialRows, "Exchange", company.stock_exchange ?? ipo?.exchange);
  pushRow(financialRows, "Ticker", ipo?.ticker);
  pushRow(financialRows, "Ownership", company.ownership_status);
  if (company.predicted_revenue) pushRow(financialRows, "Predicted Revenue", formatUsd(company.predicted_revenue));

  const flags = flagLabels(company);

  return (
    <aside role="complementary" aria-label="Company details panel" className="h-full overflow-y-auto px-8 py-6">
      <header className="pb-4">
        <div className="mb-3 flex items-start justify-between gap-3">
          <p className="section-header">Company Details</p>
          <div className="flex items-center gap-1">
            {onEdit ? (
              <Button type="button" variant="ghost" size="sm" onClick={() => onEdit(company)}>
                <Pencil className="h-3.5 w-3.5" aria-hidden="true" />
                Edit
              </Button>
            ) : null}
            {onClose ? (
              <button
                type="button"
                onClick={onClose}
                className="rounded-sm p-1 text-[var(--text-tertiary)] transition-colors hover:text-[var(--text-primary)]"
                aria-label="Close company details"
              >
                <X className="h-5 w-5" aria-hidden="true" />
              </button>
            ) : null}
          </div>
        </div>

        <h2 className="text-2xl font-semibold text-[var(--text-primary)]">{company.name}</h2>

        <div className="mt-3 flex flex-wrap items-center gap-x-4 gap-y-2">
          {company.website ? <LinkAnchor url={company.website} label="Website" /> : null}
          {company.linkedin_url ? <LinkAnchor url={company.linkedin_url} label="LinkedIn" /> : null}
        </div>
      </header>

      <div className="space-y-8 border-t border-border/60 pt-5">
        {company.pe_firms.length ? (
          <section>
            <SectionTitle>{company.pe_firms.length > 1 ? "PE Firms (co-investment)" : "PE Firm"}</SectionTitle>
            <ul className="flex flex-wrap gap-2">
              {company.pe_firms.map((firm) => (
                <li key={firm}>
                  <TagPill label={firm} variant="accent" />
                </li>
              ))}
            </ul>
          </section>
        ) : null}

        {coreRows.length ? (
          <section>
            <SectionTitle>Core</SectionTitle>
            <PropertyGrid rows={coreRows} />
          </section>
        ) : null}

        {financialRows.length ? (
          <section>
            <SectionTitle>Financials</SectionTitle>
            <PropertyGrid rows={financialRows} />
          </section>
        ) : null}

        {flags.length ? (
          <section>
            <SectionTitle>Flags</SectionTitle>
            <div className="flex flex-wrap gap-2">
              {flags.map((flag) => (
                <TagPill key={flag} label={flag} />
              ))}
            </div>
          </section>
        ) : null}

        <TextSection title="Description" value={company.description} />
        <TextSection title="Summary" value={company.summary} />
        <TextSection title="Exit Details" value={company.exit_info} />
        <TextSection title="Customer Types" value={company.customer_types} />
      </div>
    </aside>
  );
}
