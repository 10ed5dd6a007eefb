// @vitest-environment node
import { describe, expect, it, vi } from "vitest";

import { CrunchbaseClient, createCrunchbaseProvider, crunchbaseUpdate } from "@/lib/enrichment/crunchbase";
import { ProviderRequestError } from "@/lib/enrichment/types";

function requestUrl(input: RequestInfo | URL): URL {
  return new URL(input instanceof Request ? input.url : String(input));
}

function createClient(route: (url: URL) => Response) {
  const fetchImpl = vi.fn<typeof fetch>(async (input) => route(requestUrl(input)));
  return { client: new CrunchbaseClient({ apiKey: "test-secret", fetchImpl }), fetchImpl };
}

const organization = {
  properties: {
    location_identifiers: [
      { location_type: "city", value: "Austin" },
      { location_type: "region", value: "Texas" },
      { location_type: "country", value: "United States" },
    ],
    founded_on: { value: "2014-06-01" },
    short_description: "Warehouse robots",
    revenue_range: "r_00010000",
    num_employees_enum: "c_00051_00100",
  },
};

describe("CrunchbaseClient", () => {
  it("searches organizations with the user key", async () => {
    const { client, fetchImpl } = createClient(() =>
      Response.json({ entities: [{ identifier: { permalink: "acme-robotics" } }, { identifier: { permalink: "acme-2" } }] }),
    );

    await expect(client.searchOrganization("Acme Robotics")).resolves.toBe("acme-robotics");

    const url = requestUrl(fetchImpl.mock.calls[0]?.[0] ?? "");
    expect(url.pathname).toBe("/v4/data/autocompletes");
    expect(url.searchParams.get("query")).toBe("Acme Robotics");
    expect(url.searchParams.get("collection_ids")).toBe("organizations");
    expect(url.searchParams.get("user_key")).toBe("test-secret");
  });

  it("returns null when nothing matches", async () => {
    const { client } = createClient(() => Response.json({ entities: [] }));
    await expect(client.searchOrganization("Nobody")).resolves.toBeNull();
  });

  it("maps organization properties", async () => {
    const { client } = createClient(() => Response.json(organization));

    await expect(client.getOrganization("acme-robotics")).resolves.toEqual({
      headquarters: "Austin, Texas",
      foundedYear: "2014",
      description: "Warehouse robots",
      revenueRange: "r_00010000",
      employeeCount: "c_00051_00100",
    });
  });

  it("raises on HTTP errors", async () => {
    const { client } = createClient(() => new Response("rate limited", { status: 429 }));

    const error = await client.searchOrganization("Acme").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ProviderRequestError);
    expect(error).toMatchObject({ status: 429, message: "Crunchbase /autocompletes responded 429" });
  });
});

describe("crunchbaseUpdate", () => {
  it("drops unknown codes and empty values", () => {
    expect(
      crunchbaseUpdate({
        headquarters: null,
        foundedYear: null,
        description: "",
        revenueRange: "r_99999999",
        employeeCount: "c_00011_00050",
      }),
    ).toEqual({ employee_count: "c_00011_00050" });
  });
});

describe("createCrunchbaseProvider", () => {
  it("looks up then fetches the organization", async () => {
    const { client } = createClient((url) =>
      url.pathname.endsWith("/autocompletes")
        ? Response.json({ entities: [{ identifier: { permalink: "acme-robotics" } }] })
        : Response.json(organization),
    );
    const provider = createCrunchbaseProvider(client);

    await expect(provider.lookup("Acme Robotics")).resolves.toEqual({
      headquarters: "Austin, Texas",
      description: "Warehouse robots",
      revenue_range: "r_00010000",
      employee_count: "c_00051_00100",
    });
  });
});
