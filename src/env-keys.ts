export const ENV_KEYS = {
  ENV_REPORT_DEBUG: "ENV_REPORT_DEBUG",
} as const;

/** Variables the report checks, in display order. */
export const REPORTED_ENV_KEYS = [
  "DATABASE_URL",
  "API_KEY",
  "DEBUG",
  "PORT",
  "ENABLE_CACHE",
  "CACHE_TTL",
  "OVERRIDE_TEST",
] as const;

export type ReportedEnvKey = (typeof REPORTED_ENV_KEYS)[number];

export const NOT_SET = "<not set>";
