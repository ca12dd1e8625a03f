import { z } from 'zod';

export const sessionCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string().optional(),
});

export type SessionCookie = z.infer<typeof sessionCookieSchema>;

export const storageScopeSchema = z.enum(['local', 'session']);

export type StorageScope = z.infer<typeof storageScopeSchema>;

export const storageSnapshotSchema = z.record(z.string(), z.string());

export type StorageSnapshot = z.infer<typeof storageSnapshotSchema>;

// ── AuthenticatedSession ──────────────────────────────────────
// Best-effort bundle read after login. Every field may be empty:
// the pipeline relies on the browser's own cookie jar, not on this.

export const authenticatedSessionSchema = z.object({
  cookies: z.array(sessionCookieSchema),
  token: z.string().optional(),
  sessionId: z.string().optional(),
  localStorage: storageSnapshotSchema,
  sessionStorage: storageSnapshotSchema,
});

export type AuthenticatedSession = z.infer<typeof authenticatedSessionSchema>;

export const credentialsSchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
});

export type Credentials = z.infer<typeof credentialsSchema>;
