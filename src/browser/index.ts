/**
 * Browser module.
 * Everything that touches the portal UI: launch and release, locator
 * chains, login, and report extraction.
 */

export { wrapPage, wrapLocator, captureScreenshot } from './driver.js';
export type { PortalPage, PortalElement, ElementState, Timed } from './driver.js';
export { ShutdownCoordinator } from './shutdown.js';
export type { ManagedResource, ShutdownSignal } from './shutdown.js';
export { BrowserLifecycle, playwrightLauncher, withBrowser } from './lifecycle.js';
export type { BrowserLauncher, LaunchedBrowser, LaunchOptions } from './lifecycle.js';
export {
  ElementResolver,
  toSelector,
  describeLocator,
  instantiateChain,
} from './resolver.js';
export type {
  ElementResolverOptions,
  ResolveOutcome,
  ResolveAllOutcome,
  ResolveOptions,
} from './resolver.js';
export { hoverBriefly, humanType, pause, randomBetween } from './humanize.js';
export type { RandomSource, TypingPace } from './humanize.js';
export { CredentialSession } from './auth.js';
export type { CredentialSessionOptions, LoginState } from './auth.js';
export { TableExtractor, sliceRow } from './table.js';
export type { ExtractionResult, TableExtractorOptions } from './table.js';
