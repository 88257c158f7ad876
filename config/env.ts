import * as dotenv from "dotenv";
import { z } from "zod";
import { API_BASE_URLS } from "../info/api-reference";
import type { Credentials } from "../services/kaiterra-auth";
import { ConfigError } from "../services/errors";

const EnvSchema = z.object({
  KAITERRA_API_BASE_URL: z.string().url().default(API_BASE_URLS.global),
  KAITERRA_AUTH_METHOD: z.enum(["url", "hmac"]).default("url"),

  // "url" auth
  KAITERRA_API_KEY: z.string().min(1).optional(),

  // "hmac" auth
  KAITERRA_CLIENT_ID: z.string().min(1).optional(),
  KAITERRA_HMAC_SECRET_KEY: z
    .string()
    .regex(/^(?:[0-9a-fA-F]{2})+$/, "must be an even-length hex string")
    .optional(),

  KAITERRA_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CORS_ORIGINS: z.string().default("*"),
  PORT: z.coerce.number().int().positive().default(3001),
  POSTMAN_COLLECTION_URL: z.string().url().optional(),
});

export interface AppConfig {
  apiBaseUrl: string;
  credentials: Credentials;
  timeoutMs: number;
  corsOrigins: string[];
  port: number;
  postmanCollectionUrl?: string;
}

// Reads .env into process.env; variables already set take precedence
export function loadEnvFile() {
  const result = dotenv.config();
  if (result.error) {
    console.log("No .env file loaded, using process environment only");
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    console.error("Invalid environment configuration:", fieldErrors);
    throw new ConfigError(
      "Invalid environment configuration",
      Object.keys(fieldErrors)
    );
  }
  const data = parsed.data;

  return {
    apiBaseUrl: data.KAITERRA_API_BASE_URL,
    credentials: buildCredentials(data),
    timeoutMs: data.KAITERRA_TIMEOUT_MS,
    corsOrigins: data.CORS_ORIGINS.split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    port: data.PORT,
    postmanCollectionUrl: data.POSTMAN_COLLECTION_URL,
  };
}

function buildCredentials(data: z.infer<typeof EnvSchema>): Credentials {
  if (data.KAITERRA_AUTH_METHOD === "url") {
    if (!data.KAITERRA_API_KEY) {
      throw new ConfigError(
        "KAITERRA_API_KEY is required when KAITERRA_AUTH_METHOD is 'url'",
        ["KAITERRA_API_KEY"]
      );
    }
    return { method: "url", apiKey: data.KAITERRA_API_KEY };
  }

  const missing: string[] = [];
  if (!data.KAITERRA_CLIENT_ID) missing.push("KAITERRA_CLIENT_ID");
  if (!data.KAITERRA_HMAC_SECRET_KEY) missing.push("KAITERRA_HMAC_SECRET_KEY");
  if (!data.KAITERRA_CLIENT_ID || !data.KAITERRA_HMAC_SECRET_KEY) {
    throw new ConfigError(
      `${missing.join(" and ")} required when KAITERRA_AUTH_METHOD is 'hmac'`,
      missing
    );
  }
  return {
    method: "hmac",
    clientId: data.KAITERRA_CLIENT_ID,
    secretKeyHex: data.KAITERRA_HMAC_SECRET_KEY,
  };
}

// First few characters and the length, enough to tell keys apart in logs
export function maskSecret(secret: string): string {
  return `${secret.substring(0, 5)}... (${secret.length} chars)`;
}
