export type CompanyStatus = "Active" | "Exit";

export const COMPANY_STATUSES: readonly CompanyStatus[] = ["Active", "Exit"];

/**
 * A company row as it lives in the store, after normalization. Coded fields
 * (`revenue_range`, `employee_count`) still hold provider codes here.
 */
export interface CompanyRecord {
  id: number;
  name: string;
  pe_firms: string[];
  sector: string | null;
  industry: string | null;
  industry_category: string | null;
  headquarters: string | null;
  website: string | null;
  linkedin_url: string | null;
  description: string | null;
  summary: string | null;
  status: CompanyStatus;
  exit_type: string | null;
  exit_info: string | null;
  investment_year: string | null;
  revenue_range: string | null;
  employee_count: string | null;
  swarm_headcount: number | null;
  size_class: string | null;
  total_funding_usd: number | null;
  last_round_type: string | null;
  last_round_amount_usd: number | null;
  market_cap: number | null;
  ipo_date: string | null;
  ipo_year: number | null;
  stock_exchange: string | null;
  ownership_status: string | null;
  customer_types: string | null;
  is_public: boolean;
  is_acquired: boolean;
  is_exited: boolean;
  predicted_revenue: number | null;
  created_at: string | null;
  updated_at: string | null;
}

/** What the API returns: coded fields are decoded to labels or "N/A". */
export type Company = Omit<CompanyRecord, "revenue_range" | "employee_count"> & {
  revenue_range: string;
  employee_count: string;
};

export interface Firm {
  id: number;
  name: string;
  total_companies: number;
  current_portfolio_count: number;
  exited_portfolio_count: number;
  last_scraped: string | null;
}

export interface FirmRecord {
  id: number;
  name: string;
  last_scraped: string | null;
}

export interface CompanyFirmLink {
  company_id: number;
  firm_id: number;
}

/** The columns aggregate endpoints need, read for every company at once. */
export interface CompanyFacet {
  id: number;
  sector: string | null;
  industry: string | null;
  industry_category: string | null;
  status: CompanyStatus;
  linkedin_url: string | null;
}

export interface PortfolioStats {
  total_companies: number;
  total_pe_firms: number;
  current_companies: number;
  exited_companies: number;
  co_investments: number;
  enrichment_rate: number;
}

export interface CompanyQuery {
  peFirm?: string;
  status?: string;
  sector?: string;
  industry?: string;
  exitType?: string;
  isPublic?: boolean;
  search?: string;
  limit: number;
  offset: number;
}

export type CompanyUpdate = Partial<
  Pick<
    CompanyRecord,
    | "name"
    | "sector"
    | "industry"
    | "industry_category"
    | "headquarters"
    | "website"
    | "linkedin_url"
    | "description"
    | "summary"
    | "status"
    | "exit_type"
    | "exit_info"
    | "investment_year"
    | "revenue_range"
    | "employee_count"
    | "swarm_headcount"
    | "size_class"
    | "total_funding_usd"
    | "last_round_type"
    | "last_round_amount_usd"
    | "market_cap"
    | "ipo_date"
    | "ipo_year"
    | "stock_exchange"
    | "ownership_status"
    | "customer_types"
    | "is_public"
    | "is_acquired"
    | "is_exited"
  >
>;

/** Lifecycle columns as stored, before status normalization. */
export interface StatusRow {
  id: number;
  name: string;
  status: string | null;
  exit_type: string | null;
  is_public: boolean;
  is_acquired: boolean;
}

/** Query parameters the dashboard sends to `GET /api/companies`. */
export interface CompanyFilters {
  pe_firm?: string;
  status?: string;
  sector?: string;
  industry?: string;
  exit_type?: string;
  is_public?: boolean;
  search?: string;
  limit?: number;
  offset?: number;
}
