import { z } from 'zod';

import { locatorOverridesSchema } from './locator.js';

// ── Portal block ────────────────────────────────────────────

export const portalConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  loginUrl: z.string().url().optional(),
  reportUrl: z.string().url().optional(),
});

export type PortalConfig = z.infer<typeof portalConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  headless: z.boolean().optional(),
  stealth: z.boolean().optional(),
  intervalHours: z.number().positive().optional(),
  maxPages: z.number().int().positive().optional(),
  screenshotDir: z.string().min(1).optional(),
  portal: portalConfigSchema.optional(),
  locators: locatorOverridesSchema.optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Environment ─────────────────────────────────────────────
// Blank variables are treated as unset.

const optionalEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema.optional());

export const envConfigSchema = z.object({
  MONGODB_URI: optionalEnv(z.string()),
  DATABASE_NAME: optionalEnv(z.string()),
  PORTAL_EMAIL: optionalEnv(z.string()),
  PORTAL_PASSWORD: optionalEnv(z.string()),
  PORTAL_BASE_URL: optionalEnv(z.string().url()),
  PORTAL_LOGIN_URL: optionalEnv(z.string().url()),
  PORTAL_REPORT_URL: optionalEnv(z.string().url()),
  PORTAL_SCREENSHOT_DIR: optionalEnv(z.string()),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;
