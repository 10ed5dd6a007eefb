import { NextResponse } from "next/server";

export const runtime = "nodejs";

const ENDPOINTS = {
  companies: "/api/companies",
  company: "/api/companies/{id}",
  firms: "/api/firms",
  firm_companies: "/api/firms/{name}/companies",
  sectors: "/api/sectors",
  statuses: "/api/statuses",
  industries: "/api/industries",
  stats: "/api/stats",
} as const;

export function GET(): NextResponse {
  return NextResponse.json({
    name: "Portfolio Explorer API",
    version: "1.0.0",
    endpoints: ENDPOINTS,
  });
}
