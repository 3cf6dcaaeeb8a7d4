import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const milliseconds = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  CORS_ORIGINS: z.string().optional(),
  FLIGHT_SEARCH_URL: z.string().url().default("https://www.budgetticket.in"),
  FLIGHT_SEARCH_USE_MOCK: booleanFlag.default("false"),
  CHROME_EXECUTABLE_PATH: z.string().min(1).optional(),
  BROWSER_HEADLESS: booleanFlag.default("true"),
  PAGE_LOAD_TIMEOUT_MS: milliseconds(60_000),
  PAGE_SETTLE_MS: milliseconds(2_000),
  FIELD_PAUSE_MS: milliseconds(500),
  RESULTS_SETTLE_MS: milliseconds(5_000),
  SUMMARY_API_KEY: z.string().min(1).optional(),
  SUMMARY_BASE_URL: z.string().url().default("https://api.cerebras.ai/v1"),
  SUMMARY_MODEL: z.string().min(1).default("llama3.1-8b"),
  SUMMARY_MAX_CHARS: z.coerce.number().int().positive().default(5_000),
});

export interface SearchTimings {
  pageLoadTimeoutMs: number;
  pageSettleMs: number;
  fieldPauseMs: number;
  resultsSettleMs: number;
}

export interface AppConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  flightSearch: {
    targetUrl: string;
    useMock: boolean;
    timings: SearchTimings;
  };
  browser: {
    executablePath?: string;
    headless: boolean;
  };
  summary: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    maxChars: number;
  };
}

export const parseOrigins = (value?: string | null): string[] =>
  value
    ?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean) ?? [];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    host: values.HOST,
    corsOrigins: parseOrigins(values.CORS_ORIGINS),
    flightSearch: {
      targetUrl: values.FLIGHT_SEARCH_URL,
      useMock: values.FLIGHT_SEARCH_USE_MOCK,
      timings: {
        pageLoadTimeoutMs: values.PAGE_LOAD_TIMEOUT_MS,
        pageSettleMs: values.PAGE_SETTLE_MS,
        fieldPauseMs: values.FIELD_PAUSE_MS,
        resultsSettleMs: values.RESULTS_SETTLE_MS,
      },
    },
    browser: {
      executablePath: values.CHROME_EXECUTABLE_PATH,
      headless: values.BROWSER_HEADLESS,
    },
    summary: {
      apiKey: values.SUMMARY_API_KEY,
      baseUrl: values.SUMMARY_BASE_URL,
      model: values.SUMMARY_MODEL,
      maxChars: values.SUMMARY_MAX_CHARS,
    },
  };
}
