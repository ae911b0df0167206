import { z } from "zod";

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DATABASE_SSL_MODE: z.enum(["require", "disable"]).default("require"),
  DATABASE_PREPARE: z.enum(["true", "false"]).default("false"),
  CATALOG_SITE_URL: z.string().url().default("https://nsk-mahaon.ru"),
  SCRAPER_USER_AGENT: z.string().default("CatalogCrawler/1.0"),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().positive().max(5).default(2),
  CRAWL_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  STORAGE_FAILURE_ESCALATION_THRESHOLD: z.coerce.number().int().nonnegative().default(3),
  RESEND_API_KEY: z.string().optional(),
  ALERT_FROM_EMAIL: z.string().email().optional(),
  ALERT_TO_EMAIL: z.string().email().optional()
});

export const env = envSchema.parse({
  DATABASE_URL: process.env.DATABASE_URL,
  DATABASE_SSL_MODE: process.env.DATABASE_SSL_MODE,
  DATABASE_PREPARE: process.env.DATABASE_PREPARE,
  CATALOG_SITE_URL: process.env.CATALOG_SITE_URL,
  SCRAPER_USER_AGENT: process.env.SCRAPER_USER_AGENT,
  FETCH_TIMEOUT_MS: process.env.FETCH_TIMEOUT_MS,
  FETCH_MAX_ATTEMPTS: process.env.FETCH_MAX_ATTEMPTS,
  CRAWL_REQUEST_DELAY_MS: process.env.CRAWL_REQUEST_DELAY_MS,
  STORAGE_FAILURE_ESCALATION_THRESHOLD: process.env.STORAGE_FAILURE_ESCALATION_THRESHOLD,
  RESEND_API_KEY: process.env.RESEND_API_KEY,
  ALERT_FROM_EMAIL: process.env.ALERT_FROM_EMAIL,
  ALERT_TO_EMAIL: process.env.ALERT_TO_EMAIL
});
