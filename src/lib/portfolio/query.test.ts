// @vitest-environment node
import { describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { BadRequestError } from "@/lib/portfolio/errors";
import { parseCompanyId, parseCompanyQuery, parseLimitParam } from "@/lib/portfolio/query";

describe("parseCompanyQuery", () => {
  it("applies defaults", () => {
    expect(parseCompanyQuery(new URLSearchParams())).toEqual({
      peFirm: undefined,
      status: undefined,
      sector: undefined,
      industry: undefined,
      exitType: undefined,
      isPublic: undefined,
      search: undefined,
      limit: 100,
      offset: 0,
    });
  });

  it("maps every filter", () => {
    const query = parseCompanyQuery(
      new URLSearchParams(
        "pe_firm=Alpha&status=Exit&sector=Tech&industry=Soft&exit_type=IPO&is_public=TRUE&search=cloud&limit=5&offset=10",
      ),
    );

    expect(query).toEqual({
      peFirm: "Alpha",
      status: "Exit",
      sector: "Tech",
      industry: "Soft",
      exitType: "IPO",
      isPublic: true,
      search: "cloud",
      limit: 5,
      offset: 10,
    });
  });

  it("caps limit and floors offset", () => {
    expect(parseCompanyQuery(new URLSearchParams("limit=5000")).limit).toBe(1000);
    expect(parseCompanyQuery(new URLSearchParams("limit=1")).limit).toBe(1);
    expect(parseCompanyQuery(new URLSearchParams("offset=-4")).offset).toBe(0);
  });

  it.each(["0", "-3"])("rejects limit=%s", (limit) => {
    expect(() => parseCompanyQuery(new URLSearchParams({ limit }))).toThrow(ZodError);
  });

  it("ignores blank parameters", () => {
    const query = parseCompanyQuery(new URLSearchParams("status=&search=%20%20&limit="));
    expect(query.status).toBeUndefined();
    expect(query.search).toBeUndefined();
    expect(query.limit).toBe(100);
  });

  it("rejects values that cannot be coerced", () => {
    expect(() => parseCompanyQuery(new URLSearchParams("limit=ten"))).toThrow(ZodError);
    expect(() => parseCompanyQuery(new URLSearchParams("offset=1.5"))).toThrow(ZodError);
    expect(() => parseCompanyQuery(new URLSearchParams("is_public=maybe"))).toThrow(ZodError);
  });
});

describe("parseLimitParam", () => {
  it("defaults and clamps", () => {
    expect(parseLimitParam(new URLSearchParams())).toBe(100);
    expect(parseLimitParam(new URLSearchParams("limit=20"))).toBe(20);
    expect(parseLimitParam(new URLSearchParams("limit=2000"))).toBe(1000);
  });

  it("rejects a limit below one", () => {
    expect(() => parseLimitParam(new URLSearchParams("limit=0"))).toThrow(ZodError);
  });
});

describe("parseCompanyId", () => {
  it("accepts positive integers", () => {
    expect(parseCompanyId("42")).toBe(42);
  });

  it("rejects anything else", () => {
    expect(() => parseCompanyId("abc")).toThrow(BadRequestError);
    expect(() => parseCompanyId("0")).toThrow(BadRequestError);
    expect(() => parseCompanyId("2.5")).toThrow(BadRequestError);
  });
});
