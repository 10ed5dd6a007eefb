"use client";

import { Loader2, Trash2 } from "lucide-react";
import { useState } from "react";

import { Button } from "@/components/ui/button";
import { Input, Select } from "@/components/ui/input";
import { Textarea } from "@/components/ui/textarea";
import { deleteCompany, updateCompany } from "@/lib/portfolio/api-client";
import { EMPLOYEE_RANGE_LABELS, NOT_AVAILABLE, REVENUE_RANGE_LABELS } from "@/lib/portfolio/decoders";
import { COMPANY_STATUSES, type Company } from "@/types/company";

type TextFieldKey =
  | "name"
  | "sector"
  | "industry"
  | "industry_category"
  | "headquarters"
  | "website"
  | "linkedin_url"
  | "investment_year"
  | "exit_type"
  | "exit_info"
  | "stock_exchange"
  | "ownership_status"
  | "description"
  | "summary";

type CodedFieldKey = "revenue_range" | "employee_count";
type FlagFieldKey = "is_public" | "is_acquired" | "is_exited";

const TEXT_FIELDS: Array<{ key: TextFieldKey; label: string; multiline?: boolean }> = [
  { key: "name", label: "Company name" },
  { key: "sector", label: "Sector" },
  { key: "industry", label: "Industry" },
  { key: "industry_category", label: "Industry category" },
  { key: "headquarters", label: "Headquarters" },
  { key: "website", label: "Website" },
  { key: "linkedin_url", label: "LinkedIn URL" },
  { key: "investment_year", label: "Investment year" },
  { key: "exit_type", label: "Exit type" },
  { key: "exit_info", label: "Exit details" },
  { key: "stock_exchange", label: "Stock exchange" },
  { key: "ownership_status", label: "Ownership status" },
  { key: "description", label: "Description", multiline: true },
  { key: "summary", label: "Summary", multiline: true },
];

const CODED_FIELDS: Array<{ key: CodedFieldKey; label: string; options: readonly string[] }> = [
  { key: "revenue_range", label: "Revenue range", options: REVENUE_RANGE_LABELS },
  { key: "employee_count", label: "Employee count", options: EMPLOYEE_RANGE_LABELS },
];

const FLAG_FIELDS: Array<{ key: FlagFieldKey; label: string }> = [
  { key: "is_public", label: "Public" },
  { key: "is_acquired", label: "Acquired" },
  { key: "is_exited", label: "Exited" },
];

export type CompanyFormState = Record<TextFieldKey | CodedFieldKey | "status", string> & Record<FlagFieldKey, boolean>;

export type CompanyChanges = Partial<Record<TextFieldKey | CodedFieldKey | "status", string | null>> &
  Partial<Record<FlagFieldKey, boolean>>;

function codedValue(label: string): string {
  return label === NOT_AVAILABLE ? "" : label;
}

export function buildFormState(company: Company): CompanyFormState {
  return {
    name: company.name,
    sector: company.sector ?? "",
    industry: company.industry ?? "",
    industry_category: company.industry_category ?? "",
    headquarters: company.headquarters ?? "",
    website: company.website ?? "",
    linkedin_url: company.linkedin_url ?? "",
    investment_year: company.investment_year ?? "",
    exit_type: company.exit_type ?? "",
    exit_info: company.exit_info ?? "",
    stock_exchange: company.stock_exchange ?? "",
    ownership_status: company.ownership_status ?? "",
    description: company.description ?? "",
    summary: company.summary ?? "",
    status: company.status,
    revenue_range: codedValue(company.revenue_range),
    employee_count: codedValue(company.employee_count),
    is_public: company.is_public,
    is_acquired: company.is_acquired,
    is_exited: company.is_exited,
  };
}

/** Only the fields that differ from the loaded company; cleared fields become `null`. */
export function diffCompanyForm(company: Company, state: CompanyFormState): CompanyChanges {
  const original = buildFormState(company);
  const changes: CompanyChanges = {};

  const stringKeys: Array<TextFieldKey | CodedFieldKey | "status"> = [
    ...TEXT_FIELDS.map((field) => field.key),
    ...CODED_FIELDS.map((field) => field.key),
    "status",
  ];

  for (const key of stringKeys) {
    const next = state[key].trim();
    if (next !== original[key].trim()) {
      changes[key] = next === "" && key !== "name" ? null : next;
    }
  }

  for (const { key } of FLAG_FIELDS) {
    if (state[key] !== original[key]) {
      changes[key] = state[key];
    }
  }

  return changes;
}

interface CompanyEditFormProps {
  company: Company;
  onSaved: (company: Company) => void;
  onDeleted: (id: number) => void;
  onCancel: () => void;
}

export function CompanyEditForm({ company, onSaved, onDeleted, onCancel }: CompanyEditFormProps): React.JSX.Element {
  const [state, setState] = useState<CompanyFormState>(() => buildFormState(company));
  const [adminKey, setAdminKey] = useState("");
  const [error, setError] = useState<string | null>(null);
  const [isSaving, setIsSaving] = useState(false);
  const [confirmingDelete, setConfirmingDelete] = useState(false);

  const run = async (action: () => Promise<void>): Promise<void> => {
    if (!adminKey.trim()) {
      setError("Enter the admin key to save changes.");
      return;
    }

    setIsSaving(true);
    setError(null);
    try {
      await action();
    } catch (caught) {
      setError(caught instanceof Error ? caught.message : "Request failed");
    } finally {
      setIsSaving(false);
    }
  };

  const handleSubmit = async (): Promise<void> => {
    const changes = diffCompanyForm(company, state);
    if (!Object.keys(changes).length) {
      onCancel();
      return;
    }

    await run(async () => {
      onSaved(await updateCompany(company.id, changes, adminKey.trim()));
    });
  };

  const handleDelete = async (): Promise<void> => {
    await run(async () => {
      await deleteCompany(company.id, adminKey.trim());
      onDeleted(company.id);
    });
  };

  return (
    <form
      aria-label={`Edit ${company.name}`}
      className="space-y-5 px-8 py-6"
      onSubmit={(event) => {
        event.preventDefault();
        void handleSubmit();
      }}
    >
      <div>
        <p className="section-header">Edit Company</p>
        <h2 className="mt-2 text-xl font-semibold text-[var(--text-primary)]">{company.name}</h2>
      </div>

      <div className="grid grid-cols-1 gap-4 md:grid-cols-2">
        {TEXT_FIELDS.map((field) => (
          <label key={field.key} className={field.multiline ? "block md:col-span-2" : "block"}>
            <span className="mb-1 block text-xs font-semibold text-[var(--text-tertiary)]">{field.label}</span>
            {field.multiline ? (
              <Textarea
                value={state[field.key]}
                onChange={(event) => setState((prev) => ({ ...prev, [field.key]: event.target.value }))}
              />
            ) : (
              <Input
                value={state[field.key]}
                required={field.key === "name"}
                onChange={(event) => setState((prev) => ({ ...prev, [field.key]: event.target.value }))}
              />
            )}
          </label>
        ))}

        <label className="block">
          <span className="mb-1 block text-xs font-semibold text-[var(--text-tertiary)]">Status</span>
          <Select value={state.status} onChange={(event) => setState((prev) => ({ ...prev, status: event.target.value }))}>
            {COMPANY_STATUSES.map((status) => (
              <option key={status} value={status}>
                {status}
              </option>
            ))}
          </Select>
        </label>

        {CODED_FIELDS.map((field) => (
          <label key={field.key} className="block">
            <span className="mb-1 block text-xs font-semibold text-[var(--text-tertiary)]">{field.label}</span>
            <Select
              value={state[field.key]}
              onChange={(event) => setState((prev) => ({ ...prev, [field.key]: event.target.value }))}
            >
              <option value="">{NOT_AVAILABLE}</option>
              {field.options.map((option) => (
                <option key={option} value={option}>
                  {option}
                </option>
              ))}
            </Select>
          </label>
        ))}
      </div>

      <fieldset className="flex flex-wrap gap-5">
        <legend className="mb-2 text-xs font-semibold text-[var(--text-tertiary)]">Flags</legend>
        {FLAG_FIELDS.map((field) => (
          <label key={field.key} className="inline-flex items-center gap-2 text-sm text-[var(--text-secondary)]">
            <input
              type="checkbox"
              checked={state[field.key]}
              onChange={(event) => setState((prev) => ({ ...prev, [field.key]: event.target.checked }))}
            />
            {field.label}
          </label>
        ))}
      </fieldset>

      <label className="block">
        <span className="mb-1 block text-xs font-semibold text-[var(--text-tertiary)]">Admin key</span>
        <Input type="password" autoComplete="off" value={adminKey} onChange={(event) => setAdminKey(event.target.value)} />
      </label>

      {error ? (
        <p role="alert" className="text-sm text-red-400">
          {error}
        </p>
      ) : null}

      <div className="flex items-center justify-between gap-3 border-t border-border/60 pt-4">
        {confirmingDelete ? (
          <div className="flex items-center gap-2">
            <span className="text-sm text-[var(--text-secondary)]">Delete this company?</span>
            <Button type="button" variant="destructive" size="sm" disabled={isSaving} onClick={() => void handleDelete()}>
              Confirm delete
            </Button>
            <Button type="button" variant="ghost" size="sm" onClick={() => setConfirmingDelete(false)}>
              Keep
            </Button>
          </div>
        ) : (
          <Button type="button" variant="ghost" size="sm" onClick={() => setConfirmingDelete(true)}>
            <Trash2 className="h-3.5 w-3.5" aria-hidden="true" />
            Delete
          </Button>
        )}

        <div className="flex gap-2">
          <Button type="button" variant="outline" onClick={onCancel}>
            Cancel
          </Button>
          <Button type="submit" disabled={isSaving}>
            {isSaving ? <Loader2 className="h-4 w-4 animate-spin" aria-hidden="true" /> : null}
            Save
          </Button>
        </div>
      </div>
    </form>
  );
}
