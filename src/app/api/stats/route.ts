import { NextResponse } from "next/server";

import { toErrorResponse } from "@/lib/portfolio/errors";
import { getPortfolioService } from "@/lib/portfolio/provider";

export const runtime = "nodejs";

export async function GET(): Promise<Response> {
  try {
    return NextResponse.json(await getPortfolioService().getStats());
  } catch (error) {
    return toErrorResponse(error, "api/stats");
  }
}
