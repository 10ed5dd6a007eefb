"use client";

import { useCallback, useEffect, useRef, useState } from "react";

import { fetchCompanies, fetchCompany, fetchFirms, fetchSectors, fetchStats } from "@/lib/portfolio/api-client";
import type { Company, CompanyFilters, Firm, PortfolioStats } from "@/types/company";

export const DASHBOARD_FETCH_LIMIT = 1000;

interface ResourceState<T> {
  data: T | null;
  isLoading: boolean;
  error: string | null;
}

export interface UseResourceResult<T> extends ResourceState<T> {
  reload: () => void;
  setData: (data: T) => void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unexpected error";
}

/** Runs `load` whenever `key` changes and drops responses that arrive after a newer request. */
function useResource<T>(key: string, load: () => Promise<T>): UseResourceResult<T> {
  const [state, setState] = useState<ResourceState<T>>({ data: null, isLoading: true, error: null });
  const [reloadCount, setReloadCount] = useState(0);
  const requestIdRef = useRef(0);
  const loadRef = useRef(load);
  loadRef.current = load;

  useEffect(() => {
    const requestId = ++requestIdRef.current;
    setState((prev) => ({ ...prev, isLoading: true, error: null }));

    loadRef
      .current()
      .then((data) => {
        if (requestId === requestIdRef.current) {
          setState({ data, isLoading: false, error: null });
        }
      })
      .catch((error: unknown) => {
        if (requestId === requestIdRef.current) {
          setState((prev) => ({ ...prev, isLoading: false, error: errorMessage(error) }));
        }
      });

    return () => {
      // Invalidate the in-flight request on unmount or key change.
      requestIdRef.current += 1;
    };
  }, [key, reloadCount]);

  const reload = useCallback(() => setReloadCount((count) => count + 1), []);
  const setData = useCallback((data: T) => setState({ data, isLoading: false, error: null }), []);

  return { ...state, reload, setData };
}

export interface PortfolioOverview {
  stats: PortfolioStats;
  firms: Firm[];
  sectors: string[];
}

export function usePortfolioOverview(): UseResourceResult<PortfolioOverview> {
  return useResource("overview", async () => {
    const [stats, firms, sectors] = await Promise.all([fetchStats(), fetchFirms(), fetchSectors()]);
    return { stats, firms, sectors };
  });
}

export function useCompanies(filters: CompanyFilters): UseResourceResult<Company[]> {
  const request: CompanyFilters = { limit: DASHBOARD_FETCH_LIMIT, ...filters };
  return useResource(`companies:${JSON.stringify(request)}`, () => fetchCompanies(request));
}

export function useCompany(id: number): UseResourceResult<Company> {
  return useResource(`company:${id}`, () => fetchCompany(id));
}
