import { z } from "zod";

import type { Company, CompanyFilters, Firm, PortfolioStats } from "@/types/company";

export const API_BASE_URL = "/api";
export const ADMIN_KEY_HEADER = "X-Admin-Key";

const errorBodySchema = z.object({ detail: z.string() });

export class ApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ApiError";
    this.status = status;
  }
}

export function buildCompaniesUrl(filters: CompanyFilters): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(filters)) {
    if (value === undefined || value === "") continue;
    params.set(key, String(value));
  }

  const query = params.toString();
  return `${API_BASE_URL}/companies${query ? `?${query}` : ""}`;
}

interface RequestOptions {
  method?: "GET" | "PUT" | "DELETE";
  headers?: Record<string, string>;
  body?: string;
}

async function request<T>(url: string, options: RequestOptions = {}): Promise<T> {
  const response = await fetch(url, {
    method: options.method ?? "GET",
    headers: { "Content-Type": "application/json", ...options.headers },
    body: options.body,
  });

  if (!response.ok) {
    const body: unknown = await response.json().catch(() => null);
    const parsed = errorBodySchema.safeParse(body);
    throw new ApiError(parsed.success ? parsed.data.detail : `Request failed with status ${response.status}`, response.status);
  }

  const payload: T = await response.json();
  return payload;
}

export function fetchCompanies(filters: CompanyFilters = {}): Promise<Company[]> {
  return request<Company[]>(buildCompaniesUrl(filters));
}

export function fetchCompany(id: number): Promise<Company> {
  return request<Company>(`${API_BASE_URL}/companies/${id}`);
}

export function fetchFirms(): Promise<Firm[]> {
  return request<Firm[]>(`${API_BASE_URL}/firms`);
}

export function fetchStats(): Promise<PortfolioStats> {
  return request<PortfolioStats>(`${API_BASE_URL}/stats`);
}

export async function fetchSectors(): Promise<string[]> {
  const { sectors } = await request<{ sectors: string[] }>(`${API_BASE_URL}/sectors`);
  return sectors;
}

export async function fetchIndustries(): Promise<string[]> {
  const { industries } = await request<{ industries: string[] }>(`${API_BASE_URL}/industries`);
  return industries;
}

export function updateCompany(id: number, changes: Record<string, unknown>, adminKey: string): Promise<Company> {
  return request<Company>(`${API_BASE_URL}/companies/${id}`, {
    method: "PUT",
    headers: { [ADMIN_KEY_HEADER]: adminKey },
    body: JSON.stringify(changes),
  });
}

export function deleteCompany(id: number, adminKey: string): Promise<{ deleted: true; id: number }> {
  return request<{ deleted: true; id: number }>(`${API_BASE_URL}/companies/${id}`, {
    method: "DELETE",
    headers: { [ADMIN_KEY_HEADER]: adminKey },
  });
}
