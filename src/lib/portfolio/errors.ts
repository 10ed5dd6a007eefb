import { NextResponse } from "next/server";
import { z } from "zod";

export class PortfolioError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "PortfolioError";
    this.status = status;
  }
}

export class NotFoundError extends PortfolioError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

export class ForbiddenError extends PortfolioError {
  constructor(message = "Invalid or missing admin key") {
    super(message, 403);
    this.name = "ForbiddenError";
  }
}

export class BadRequestError extends PortfolioError {
  constructor(message: string) {
    super(message, 400);
    this.name = "BadRequestError";
  }
}

export interface ErrorBody {
  detail: string;
  issues?: Array<{ path: string; message: string }>;
}

export function toErrorResponse(error: unknown, scope: string): NextResponse<ErrorBody> {
  if (error instanceof PortfolioError) {
    return NextResponse.json({ detail: error.message }, { status: error.status });
  }

  if (error instanceof z.ZodError) {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    return NextResponse.json({ detail: "Invalid request", issues }, { status: 400 });
  }

  console.error(`[${scope}] Unhandled error`, error);
  return NextResponse.json({ detail: "Internal server error" }, { status: 500 });
}
