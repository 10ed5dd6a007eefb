import "server-only";
import { z } from "zod";

// `.env` files leave unset keys as empty strings.
const blankAsUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankAsUndefined, z.string().optional());

const serverEnvSchema = z
  .object({
    PORTFOLIO_DATA_SOURCE: z.preprocess(blankAsUndefined, z.enum(["supabase", "mock"]).default("supabase")),
    SUPABASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    ADMIN_API_KEY: z.string().min(1),
    CRUNCHBASE_API_KEY: optionalString,
    SWARM_API_KEY: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.PORTFOLIO_DATA_SOURCE !== "supabase") {
      return;
    }

    for (const key of ["SUPABASE_URL", "SUPABASE_SERVICE_ROLE_KEY"] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when PORTFOLIO_DATA_SOURCE is supabase`,
        });
      }
    }
  });

export type ServerEnv = z.infer<typeof serverEnvSchema>;

let cachedEnv: ServerEnv | null = null;

export function getServerEnv(): ServerEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  const parsed = serverEnvSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error("[env] Invalid server env", parsed.error.flatten());
    throw new Error("Invalid server environment configuration.");
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}
