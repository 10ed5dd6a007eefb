import { NextResponse } from "next/server";

import { toErrorResponse } from "@/lib/portfolio/errors";
import { getPortfolioService } from "@/lib/portfolio/provider";
import { parseCompanyQuery } from "@/lib/portfolio/query";

export const runtime = "nodejs";

export async function GET(request: Request): Promise<Response> {
  try {
    const query = parseCompanyQuery(new URL(request.url).searchParams);
    const companies = await getPortfolioService().listCompanies(query);
    return NextResponse.json(companies);
  } catch (error) {
    return toErrorResponse(error, "api/companies");
  }
}
