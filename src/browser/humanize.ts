import { TIMEOUTS } from '../config/defaults.js';
import type { PaceRange, Pacing } from '../config/defaults.js';
import { errorMessage } from '../errors.js';
import * as log from '../utils/logger.js';
import type { PortalElement, PortalPage } from './driver.js';

export type RandomSource = () => number;

export type TypingPace = Pick<Pacing, 'keystroke' | 'afterHover'>;

/** Uniform integer in [min, max]. */
export function randomBetween(range: PaceRange, random: RandomSource = Math.random): number {
  const [min, max] = range;
  if (max <= min) return min;
  return Math.round(min + random() * (max - min));
}

export async function pause(
  page: PortalPage,
  range: PaceRange,
  random: RandomSource = Math.random,
): Promise<void> {
  const ms = randomBetween(range, random);
  if (ms > 0) await page.waitForTimeout(ms);
}

/**
 * Move the pointer onto `element` and settle for `afterHover`.
 * A hover that fails is skipped; the caller still acts on the element.
 */
export async function hoverBriefly(
  page: PortalPage,
  element: PortalElement,
  afterHover: PaceRange,
  random: RandomSource = Math.random,
): Promise<void> {
  try {
    await element.hover({ timeout: TIMEOUTS.ACTION_TIMEOUT });
  } catch (err) {
    log.detail(`Hover skipped: ${errorMessage(err)}`);
    return;
  }
  await pause(page, afterHover, random);
}

/**
 * Type `text` into `element` one character at a time with a random
 * delay after each keystroke. The field is hovered and cleared first.
 */
export async function humanType(
  page: PortalPage,
  element: PortalElement,
  text: string,
  pace: TypingPace,
  random: RandomSource = Math.random,
): Promise<void> {
  const timeout = TIMEOUTS.ACTION_TIMEOUT;
  await hoverBriefly(page, element, pace.afterHover, random);
  await element.fill('', { timeout });

  for (const char of text) {
    await element.pressSequentially(char, { timeout });
    await pause(page, pace.keystroke, random);
  }
}
