"use client";

import { ArrowLeft } from "lucide-react";
import Link from "next/link";
import { useRouter } from "next/navigation";
import { useState } from "react";

import { CompanyEditForm } from "@/components/company/company-edit-form";
import { CompanySidePanel } from "@/components/company/company-side-panel";
import { ErrorState, LoadingState } from "@/components/ui/states";
import { useCompany } from "@/hooks/use-portfolio";

interface CompanyDetailProps {
  companyId: number;
}

export function CompanyDetail({ companyId }: CompanyDetailProps): React.JSX.Element {
  const router = useRouter();
  const { data: company, isLoading, error, setData } = useCompany(companyId);
  const [isEditing, setIsEditing] = useState(false);

  return (
    <main className="mx-auto min-h-screen max-w-4xl bg-background px-6 py-8">
      <Link href="/" className="inline-flex items-center gap-1 text-sm text-accent hover:text-[var(--accent-hover)]">
        <ArrowLeft className="h-4 w-4" aria-hidden="true" />
        Back to portfolio
      </Link>

      <div className="mt-6 rounded-xl border border-border/60 bg-card">
        {isLoading && !company ? <LoadingState title="Loading company" description="Fetching the company profile..." /> : null}
        {error ? <ErrorState title="Company unavailable" description={error} /> : null}
        {company && isEditing ? (
          <CompanyEditForm
            company={company}
            onCancel={() => setIsEditing(false)}
            onSaved={(updated) => {
              setData(updated);
              setIsEditing(false);
            }}
            onDeleted={() => router.push("/")}
          />
        ) : null}
        {company && !isEditing ? <CompanySidePanel company={company} onEdit={() => setIsEditing(true)} /> : null}
      </div>
    </main>
  );
}
