import dotenv from "dotenv";
import { existsSync } from "fs";
import { resolve as pathResolve } from "path";
import { z } from "zod";

// Runtime configuration
// - .env is loaded from deterministic locations so startup cwd does not matter.
// - Variables are validated once per read; modules call readEnv() lazily.

export function loadEnvFile(): string | undefined {
  const envPathCandidates = [
    pathResolve(__dirname, "..", ".env"),
    pathResolve(__dirname, "..", "..", ".env"),
    pathResolve(process.cwd(), ".env"),
  ];

  const resolvedEnvPath = envPathCandidates.find((p) => existsSync(p));
  if (resolvedEnvPath) {
    dotenv.config({ path: resolvedEnvPath });
  } else {
    dotenv.config();
  }
  return resolvedEnvPath;
}

// Empty strings in .env files mean "unset".
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const optionalString = z.preprocess(blankToUndefined, z.string().optional());
const flag = z.preprocess(blankToUndefined, z.string().optional()).transform((v) => v === "true");

const EnvSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(3001)),
  NODE_ENV: z.preprocess(blankToUndefined, z.string().default("development")),
  CORS_ORIGINS: optionalString,

  DATABASE_URL: optionalString,
  DB_POOL_MAX: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(20)),
  DB_IDLE_TIMEOUT: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(30000)),
  DB_CONNECT_TIMEOUT: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(5000)),
  DB_SSL: z.preprocess(blankToUndefined, z.string().default("true")).transform((v) => v !== "false"),
  DB_SSL_REJECT_UNAUTHORIZED: z.preprocess(blankToUndefined, z.string().default("true")).transform((v) => v !== "false"),

  BANNER_SOURCE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  BANNER_SOURCE_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(5000)),
  BANNER_DISPLAY_CONFIG: optionalString,

  JWT_SECRET: z.preprocess(blankToUndefined, z.string().default("banners-dev-secret-change-in-production")),
  DISABLE_AUTH: flag,
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function readEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${detail}`);
  }
  return result.data;
}

export const DEFAULT_CORS_ORIGINS: readonly string[] = [
  "http://localhost:3000",
  "http://localhost:3001",
  "http://localhost:5173",
  "http://127.0.0.1:5173",
];

export function resolveCorsOrigins(env: AppEnv): string[] {
  return env.CORS_ORIGINS
    ? env.CORS_ORIGINS.split(",").map((s) => s.trim()).filter(Boolean)
    : [...DEFAULT_CORS_ORIGINS];
}
