// @vitest-environment node
import { createClient } from "@supabase/supabase-js";
import { describe, expect, it, vi } from "vitest";

import {
  anyColumnContains,
  containsPattern,
  createSupabasePortfolioRepository,
  escapeLikePattern,
  quoteFilterValue,
  statusFilter,
} from "@/lib/portfolio/supabase-repository";

type Responder = (url: URL) => Response;

const ACTIVE_FILTER =
  'status.ilike.active,and(is_public.not.is.true,or(exit_type.is.null,exit_type.in.("",None)),' +
  'status.not.ilike."%acquired%",status.not.ilike."%acquisition%",' +
  'or(status.ilike."%active%",status.ilike."%current%",status.ilike."%portfolio%"))';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function createRepository(responder: Responder) {
  const requests: URL[] = [];
  const fetchImpl = vi.fn(async (input: RequestInfo | URL): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    requests.push(url);
    return responder(url);
  });

  const client = createClient("http://localhost:54321", "test-secret", {
    auth: { autoRefreshToken: false, persistSession: false },
    global: { fetch: fetchImpl },
  });

  return { repository: createSupabasePortfolioRepository(client), requests };
}

describe("filter helpers", () => {
  it("escapes LIKE wildcards", () => {
    expect(escapeLikePattern("50%_off\\")).toBe("50\\%\\_off\\\\");
    expect(containsPattern("care")).toBe("%care%");
  });

  it("quotes reserved characters for or-filters", () => {
    expect(quoteFilterValue('a,"b"')).toBe('"a,\\"b\\""');
    expect(anyColumnContains(["name", "description"], "ai, ml")).toBe(
      'name.ilike."%ai, ml%",description.ilike."%ai, ml%"',
    );
  });
});

describe("statusFilter", () => {
  it("infers Active from the same markers the normalizer reads", () => {
    expect(statusFilter("Active")).toBe(ACTIVE_FILTER);
  });

  it("selects Exit as the complement, null statuses included", () => {
    expect(statusFilter("Exit")).toBe(`status.is.null,not.or(${ACTIVE_FILTER})`);
  });
});

describe("createSupabasePortfolioRepository", () => {
  it("matches a legacy status by the value it reads back as", async () => {
    const { repository, requests } = createRepository(() =>
      jsonResponse([{ id: 8, name: "Holdover", status: "Current Portfolio", exit_type: null, is_public: false }]),
    );

    const companies = await repository.findCompanies({ status: "Active", limit: 10, offset: 0 });

    expect(companies.map((company) => [company.id, company.status])).toEqual([[8, "Active"]]);
    const [url] = requests;
    expect(url?.searchParams.get("status")).toBeNull();
    expect(url?.searchParams.get("or")).toBe(`(${ACTIVE_FILTER})`);
  });


  it("translates a company query into PostgREST filters", async () => {
    const { repository, requests } = createRepository(() =>
      jsonResponse([{ id: 7, name: "Acme", status: "Active", company_firms: [{ firms: { name: "Alpha" } }] }]),
    );

    const companies = await repository.findCompanies({
      peFirm: "alpha",
      status: "Active",
      industry: "robot",
      isPublic: false,
      limit: 25,
      offset: 50,
    });

    expect(companies.map((company) => [company.id, company.pe_firms])).toEqual([[7, ["Alpha"]]]);

    const [url] = requests;
    expect(url?.pathname).toBe("/rest/v1/companies");
    expect(url?.searchParams.get("firm_filter.firms.name")).toBe("ilike.%alpha%");
    expect(url?.searchParams.get("status")).toBeNull();
    expect(url?.searchParams.get("is_public")).toBe("eq.false");
    expect(url?.searchParams.getAll("or")).toEqual([
      `(${ACTIVE_FILTER})`,
      '(industry.ilike."%robot%",industry_category.ilike."%robot%")',
    ]);
    expect(url?.searchParams.get("order")).toBe("name.asc,id.asc");
    expect(url?.searchParams.get("offset")).toBe("50");
    expect(url?.searchParams.get("limit")).toBe("25");
  });

  it("reads firm links in chunks until a short page", async () => {
    const fullPage = Array.from({ length: 1000 }, (_, index) => ({ company_id: index, firm_id: 1 }));
    const { repository, requests } = createRepository((url) =>
      url.searchParams.get("offset") === "0" ? jsonResponse(fullPage) : jsonResponse([{ company_id: 5000, firm_id: 2 }]),
    );

    const links = await repository.listFirmLinks();

    expect(links).toHaveLength(1001);
    expect(links[1000]).toEqual({ company_id: 5000, firm_id: 2 });
    expect(requests.map((url) => url.searchParams.get("offset"))).toEqual(["0", "1000"]);
  });

  it("treats an unsatisfiable range as the end of the data", async () => {
    const { repository } = createRepository(() =>
      jsonResponse({ code: "PGRST103", message: "Requested range not satisfiable" }, 416),
    );

    await expect(repository.findCompanies({ limit: 10, offset: 5000 })).resolves.toEqual([]);
  });

  it("surfaces other database errors", async () => {
    const { repository } = createRepository(() => jsonResponse({ code: "42P01", message: "relation missing" }, 400));

    await expect(repository.listFirms()).rejects.toThrow("listFirms failed: relation missing");
  });

  it("reports a delete of a missing row as false", async () => {
    const { repository, requests } = createRepository(() => jsonResponse([]));

    await expect(repository.deleteCompany(42)).resolves.toBe(false);
    expect(requests[0]?.searchParams.get("id")).toBe("eq.42");
  });
});
