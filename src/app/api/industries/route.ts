import { NextResponse } from "next/server";

import { toErrorResponse } from "@/lib/portfolio/errors";
import { getPortfolioService } from "@/lib/portfolio/provider";

export const runtime = "nodejs";

export async function GET(): Promise<Response> {
  try {
    const industries = await getPortfolioService().listIndustries();
    return NextResponse.json({ industries });
  } catch (error) {
    return toErrorResponse(error, "api/industries");
  }
}
