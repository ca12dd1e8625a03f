import { TIMEOUTS } from '../config/defaults.js';
import type { PaceRange } from '../config/defaults.js';
import type { LocatorChain, LocatorHint } from '../schema/index.js';
import * as log from '../utils/logger.js';
import type { ElementState, PortalElement, PortalPage } from './driver.js';
import { hoverBriefly } from './humanize.js';
import type { RandomSource } from './humanize.js';

// ── Outcomes ──────────────────────────────────────────────────
// Not finding an element is an ordinary result, never an exception.

export type ResolveOutcome =
  | {
      found: true;
      target: string;
      element: PortalElement;
      hint: LocatorHint;
      index: number;
    }
  | { found: false; target: string; tried: readonly string[] };

export type ResolveAllOutcome =
  | {
      found: true;
      target: string;
      elements: PortalElement[];
      hint: LocatorHint;
      index: number;
    }
  | { found: false; target: string; tried: readonly string[] };

export interface ResolveOptions {
  /** Per-attempt timeout in ms. */
  timeout?: number | undefined;
  state?: ElementState | undefined;
  /** Search inside this element instead of the whole page. */
  within?: PortalElement | undefined;
}

export interface ElementResolverOptions {
  /** Per-attempt timeout in ms when a call does not set one. */
  timeout?: number | undefined;
  /** Settle time between hovering a control and clicking it. */
  afterHover?: PaceRange | undefined;
  random?: RandomSource | undefined;
}

// ── Selector translation ──────────────────────────────────────

/**
 * Maps a LocatorHint to a Playwright selector string.
 *
 *   css         → value as-is
 *   xpath       → xpath=value
 *   text        → text=value
 *   id          → [id="value"]
 *   name        → [name="value"]
 *   placeholder → [placeholder*="value" i]
 *   testid      → [data-testid="value"]
 */
export function toSelector(hint: LocatorHint): string {
  switch (hint.strategy) {
    case 'css':
      return hint.value;
    case 'xpath':
      return `xpath=${hint.value}`;
    case 'text':
      return `text=${hint.value}`;
    case 'id':
      return `[id="${escapeAttr(hint.value)}"]`;
    case 'name':
      return `[name="${escapeAttr(hint.value)}"]`;
    case 'placeholder':
      return `[placeholder*="${escapeAttr(hint.value)}" i]`;
    case 'testid':
      return `[data-testid="${escapeAttr(hint.value)}"]`;
  }
}

/** Human-readable one-liner describing the locator for logs. */
export function describeLocator(hint: LocatorHint): string {
  return `${hint.strategy}:${hint.value}`;
}

/** Substitute `{name}` placeholders in every hint of a chain. */
export function instantiateChain(
  chain: LocatorChain,
  params: Readonly<Record<string, string>>,
): LocatorChain {
  return chain.map((hint) => ({
    strategy: hint.strategy,
    value: hint.value.replace(/\{(\w+)\}/g, (whole, key: string) => params[key] ?? whole),
  }));
}

function escapeAttr(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

// ── Resolver ──────────────────────────────────────────────────

/**
 * Resolves logical UI targets through ordered fallback chains.
 * Each strategy gets a short wait; the first match wins.
 */
export class ElementResolver {
  private readonly defaultTimeout: number;
  private readonly afterHover: PaceRange;
  private readonly random: RandomSource | undefined;

  constructor(
    private readonly page: PortalPage,
    options: ElementResolverOptions = {},
  ) {
    this.defaultTimeout = options.timeout ?? TIMEOUTS.RESOLVE_ATTEMPT;
    this.afterHover = options.afterHover ?? [0, 0];
    this.random = options.random;
  }

  async resolve(
    target: string,
    chain: LocatorChain,
    options: ResolveOptions = {},
  ): Promise<ResolveOutcome> {
    const timeout = options.timeout ?? this.defaultTimeout;
    const state = options.state ?? 'attached';
    const tried: string[] = [];

    for (const [index, hint] of chain.entries()) {
      const element = this.scope(options.within, hint).first();
      try {
        await element.waitFor({ state, timeout });
        log.detail(`${target}: matched ${describeLocator(hint)}`);
        return { found: true, target, element, hint, index };
      } catch {
        tried.push(describeLocator(hint));
      }
    }

    log.detail(`${target}: not found (${String(tried.length)} strategies tried)`);
    return { found: false, target, tried };
  }

  /**
   * Resolve every element matched by the first strategy that yields a
   * non-empty set. Counts without waiting; callers wait on a parent first.
   */
  async resolveAll(
    target: string,
    chain: LocatorChain,
    options: ResolveOptions = {},
  ): Promise<ResolveAllOutcome> {
    const tried: string[] = [];

    for (const [index, hint] of chain.entries()) {
      const locator = this.scope(options.within, hint);
      let count = 0;
      try {
        count = await locator.count();
      } catch (err) {
        log.detail(`${target}: ${describeLocator(hint)} rejected (${String(err)})`);
      }
      if (count > 0) {
        const elements = Array.from({ length: count }, (_, i) => locator.nth(i));
        return { found: true, target, elements, hint, index };
      }
      tried.push(describeLocator(hint));
    }

    return { found: false, target, tried };
  }

  /**
   * Resolve a visible element and click it. A strategy whose element
   * matches but refuses the click falls through to the next one.
   */
  async resolveAndClick(
    target: string,
    chain: LocatorChain,
    options: ResolveOptions = {},
  ): Promise<ResolveOutcome> {
    const timeout = options.timeout ?? this.defaultTimeout;
    const tried: string[] = [];

    for (const [index, hint] of chain.entries()) {
      const outcome = await this.resolve(target, [hint], {
        ...options,
        state: 'visible',
      });
      if (!outcome.found) {
        tried.push(describeLocator(hint));
        continue;
      }
      try {
        await hoverBriefly(this.page, outcome.element, this.afterHover, this.random);
        await outcome.element.click({ timeout });
        return { ...outcome, index };
      } catch (err) {
        log.detail(`${target}: click on ${describeLocator(hint)} failed (${String(err)})`);
        tried.push(describeLocator(hint));
      }
    }

    return { found: false, target, tried };
  }

  private scope(within: PortalElement | undefined, hint: LocatorHint): PortalElement {
    const selector = toSelector(hint);
    return within !== undefined ? within.locator(selector) : this.page.locator(selector);
  }
}
