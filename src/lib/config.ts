import { z } from "zod";

export const DEFAULT_CORS_ALLOWED_ORIGINS = [
  "https://csvtool.netlify.app",
  "http://localhost:5173",
] as const;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const originListSchema = z
  .string()
  .optional()
  .transform((raw) =>
    (raw ?? "")
      .split(",")
      .map((origin) => origin.trim().replace(/\/$/, ""))
      .filter(Boolean)
  )
  .pipe(z.array(z.string().url()));

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  CORS_ALLOWED_ORIGINS: originListSchema,
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface AppConfig {
  corsAllowedOrigins: string[];
  logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const { NODE_ENV, CORS_ALLOWED_ORIGINS, LOG_LEVEL } = parsed.data;
  return {
    corsAllowedOrigins:
      CORS_ALLOWED_ORIGINS.length > 0 ? CORS_ALLOWED_ORIGINS : [...DEFAULT_CORS_ALLOWED_ORIGINS],
    logLevel: LOG_LEVEL ?? (NODE_ENV === "production" ? "info" : "debug"),
  };
}

export const appConfig = loadConfig();
