import { z } from "zod";
import { formatIssues } from "./utils";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const booleanString = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

const configSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default("127.0.0.1"),
  COUNTRIES_FILE: z.string().min(1).optional(),
  LOG_REQUESTS: booleanString.default("true"),
  API_VERSION: z.string().min(1).default("1.0.0"),
});

export interface AppConfig {
  port: number;
  host: string;
  countriesFile?: string;
  logRequests: boolean;
  apiVersion: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid environment configuration: ${formatIssues(result.error)}`);
  }

  const { PORT, HOST, COUNTRIES_FILE, LOG_REQUESTS, API_VERSION } = result.data;
  return {
    port: PORT,
    host: HOST,
    countriesFile: COUNTRIES_FILE,
    logRequests: LOG_REQUESTS,
    apiVersion: API_VERSION,
  };
}
