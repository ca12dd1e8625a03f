import { z } from 'zod';

// ── LocatorHint ───────────────────────────────────────────────

export const locatorStrategySchema = z.enum([
  'css',
  'xpath',
  'text',
  'id',
  'name',
  'placeholder',
  'testid',
]);

export type LocatorStrategy = z.infer<typeof locatorStrategySchema>;

export const locatorHintSchema = z.object({
  strategy: locatorStrategySchema,
  value: z.string().min(1),
});

export type LocatorHint = z.infer<typeof locatorHintSchema>;

/** Ordered fallback chain: most specific first. */
export const locatorChainSchema = z.array(locatorHintSchema).min(1);

export type LocatorChain = z.infer<typeof locatorChainSchema>;

// ── Logical targets ───────────────────────────────────────────

export const locatorSetSchema = z.object({
  emailInput: locatorChainSchema,
  passwordInput: locatorChainSchema,
  loginEntry: locatorChainSchema,
  submitButton: locatorChainSchema,
  loginIndicator: locatorChainSchema,
  reportNav: locatorChainSchema,
  dataTable: locatorChainSchema,
  tableRow: locatorChainSchema,
  tableCell: locatorChainSchema,
  nextPage: locatorChainSchema,
  activePage: locatorChainSchema,
  pageLink: locatorChainSchema,
});

export type LocatorSet = z.infer<typeof locatorSetSchema>;

export type LocatorTarget = keyof LocatorSet;

export const LOCATOR_TARGETS = locatorSetSchema.keyof().options;

/** Per-target overrides accepted from the config file. */
export const locatorOverridesSchema = locatorSetSchema.partial();

export type LocatorOverrides = z.infer<typeof locatorOverridesSchema>;
