import Papa from "papaparse";

import type { Company } from "@/types/company";

export const CSV_COLUMNS = [
  "Name",
  "PE Firms",
  "Status",
  "Exit Type",
  "Sector",
  "Industry",
  "Headquarters",
  "Employees",
  "Revenue",
  "Website",
  "LinkedIn",
] as const;

export function companiesToCsv(companies: Company[]): string {
  return Papa.unparse({
    fields: [...CSV_COLUMNS],
    data: companies.map((company) => [
      company.name,
      company.pe_firms.join("; "),
      company.status,
      company.exit_type ?? "",
      company.sector ?? "",
      company.industry ?? company.industry_category ?? "",
      company.headquarters ?? "",
      company.employee_count,
      company.revenue_range,
      company.website ?? "",
      company.linkedin_url ?? "",
    ]),
  });
}

export function csvFileName(date: Date): string {
  return `portfolio-companies-${date.toISOString().slice(0, 10)}.csv`;
}

export function downloadCsv(csv: string, fileName: string): void {
  const url = URL.createObjectURL(new Blob([csv], { type: "text/csv;charset=utf-8" }));
  const anchor = document.createElement("a");
  anchor.href = url;
  anchor.download = fileName;
  anchor.click();
  URL.revokeObjectURL(url);
}
