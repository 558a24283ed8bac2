import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

// z.coerce.boolean() treats "false" as true, so flags are parsed explicitly.
const booleanFlagDefaultTrue = z.preprocess((value) => {
  if (typeof value !== "string") {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "") {
    return undefined;
  }
  return normalized === "true" || normalized === "1" || normalized === "yes";
}, z.boolean().default(true));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  VERIFY_CART_ON_HEADER_MATCH: booleanFlagDefaultTrue,
  LOG_LEVEL: z.string().min(1).default("info")
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  return EnvSchema.parse(env);
}

export const config: AppConfig = parseConfig(process.env);
