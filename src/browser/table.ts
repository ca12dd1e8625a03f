import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import type { Pacing } from '../config/defaults.js';
import { ExtractionFailure, NavigationFailure, RowValidationError, errorMessage } from '../errors.js';
import { RAW_ROW_FIELDS, REQUIRED_ROW_FIELDS } from '../schema/index.js';
import type { LocatorSet, RawAccountRow, StopReason } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { captureScreenshot } from './driver.js';
import type { PortalElement, PortalPage } from './driver.js';
import { pause } from './humanize.js';
import type { RandomSource } from './humanize.js';
import { ElementResolver, instantiateChain } from './resolver.js';

// ── Public types ─────────────────────────────────────────────

export interface TableExtractorOptions {
  reportUrl: string;
  locators: LocatorSet;
  pacing: Pacing;
  maxPages?: number | undefined;
  maxStalePages?: number | undefined;
  screenshotDir?: string | undefined;
  random?: RandomSource | undefined;
}

export interface ExtractionResult {
  rows: RawAccountRow[];
  pagesVisited: number;
  rowsRejected: number;
  stoppedBy: StopReason;
}

// ── Row slicing ──────────────────────────────────────────────

/**
 * Map ordinal cell texts onto the fixed report columns.
 * Returns a RowValidationError for short rows or blank required fields.
 */
export function sliceRow(cells: readonly string[]): RawAccountRow | RowValidationError {
  if (cells.length < RAW_ROW_FIELDS.length) {
    return new RowValidationError(
      `Row has ${String(cells.length)} cells, expected ${String(RAW_ROW_FIELDS.length)}`,
    );
  }

  const cell = (i: number): string => (cells[i] ?? '').trim();
  const row: RawAccountRow = {
    date: cell(0),
    user_id: cell(1),
    account_number: cell(2),
    name: cell(3),
    email: cell(4),
    campaign_source: cell(5),
    id_status: cell(6),
    poa_status: cell(7),
  };

  for (const field of REQUIRED_ROW_FIELDS) {
    if (row[field] === '') {
      return new RowValidationError(`Row is missing ${field}`, field);
    }
  }
  return row;
}

// ── Extractor ────────────────────────────────────────────────

/**
 * Walks the paginated account report. Rows come out in page-then-row
 * order, one per account number. Pagination stops at the last page, at
 * `maxPages`, or after `maxStalePages` consecutive pages that add no new
 * account numbers.
 */
export class TableExtractor {
  private readonly resolver: ElementResolver;

  constructor(
    private readonly page: PortalPage,
    private readonly options: TableExtractorOptions,
  ) {
    this.resolver = new ElementResolver(page, {
      afterHover: options.pacing.afterHover,
      random: options.random,
    });
  }

  /** Open the report view, falling back to its direct URL. */
  async openReport(): Promise<void> {
    const { locators, pacing, random, reportUrl } = this.options;

    const nav = await this.resolver.resolveAndClick('report navigation', locators.reportNav, {
      timeout: TIMEOUTS.LOGIN_ENTRY_ATTEMPT,
    });
    if (nav.found) {
      await pause(this.page, pacing.afterNavigation, random);
      const table = await this.resolver.resolve('data table', locators.dataTable);
      if (table.found) {
        log.info('Opened report via navigation');
        return;
      }
      log.warn('Report navigation did not show a table; using direct URL');
    } else {
      log.info('No report navigation control found; using direct URL');
    }

    try {
      await this.page.goto(reportUrl, { timeout: TIMEOUTS.NAVIGATION_TIMEOUT });
    } catch (err) {
      throw new NavigationFailure(reportUrl, `Could not open report at ${reportUrl}: ${errorMessage(err)}`, err);
    }
    await pause(this.page, pacing.afterNavigation, random);
  }

  /**
   * Pages that add no new account number are treated as repeats: their
   * rows and rejections are dropped and they do not count as visited.
   */
  async extractAll(): Promise<ExtractionResult> {
    const maxPages = this.options.maxPages ?? LIMITS.MAX_PAGES;
    const maxStalePages = this.options.maxStalePages ?? LIMITS.MAX_STALE_PAGES;

    const rows: RawAccountRow[] = [];
    const seen = new Set<string>();
    let rowsRejected = 0;
    let stalePages = 0;
    let pagesVisited = 0;
    let pageNumber = 0;

    const result = (stoppedBy: StopReason): ExtractionResult => ({
      rows,
      pagesVisited,
      rowsRejected,
      stoppedBy,
    });

    for (;;) {
      pageNumber++;
      const pageRows = await this.extractPage(pageNumber);
      const fresh = pageRows.accepted.filter((row) => !seen.has(row.account_number));

      if (fresh.length === 0) {
        stalePages++;
        log.detail(`Page ${String(pageNumber)} added no new accounts; its rows are ignored`);
      } else {
        stalePages = 0;
        pagesVisited++;
        for (const row of fresh) {
          if (seen.has(row.account_number)) continue;
          seen.add(row.account_number);
          rows.push(row);
        }
        rowsRejected += pageRows.rejected;
        log.page(pageNumber, fresh.length, pageRows.rejected);
      }

      if (stalePages >= maxStalePages) {
        log.warn(`Stopping: ${String(stalePages)} consecutive pages added no new accounts`);
        return result('stale_pages');
      }
      if (pageNumber >= maxPages) {
        log.warn(`Stopping: reached the page limit (${String(maxPages)})`);
        return result('page_limit');
      }
      if (!(await this.advance())) {
        log.info(`Last page reached after ${String(pageNumber)} page(s)`);
        return result('last_page');
      }
    }
  }

  // ── Per-page ───────────────────────────────────────────────

  private async extractPage(
    pageNumber: number,
  ): Promise<{ accepted: RawAccountRow[]; rejected: number }> {
    const { locators } = this.options;

    const table = await this.resolver.resolve('data table', locators.dataTable, {
      timeout: TIMEOUTS.TABLE_WAIT,
    });
    if (!table.found) {
      await captureScreenshot(this.page, this.options.screenshotDir, `no-table-page-${String(pageNumber)}`);
      throw new ExtractionFailure(`Data table not found on page ${String(pageNumber)}`);
    }

    const found = await this.resolver.resolveAll('table rows', locators.tableRow, {
      within: table.element,
    });
    if (!found.found) {
      if (pageNumber === 1) {
        throw new ExtractionFailure('Data table has no rows');
      }
      return { accepted: [], rejected: 0 };
    }

    const accepted: RawAccountRow[] = [];
    let rejected = 0;

    for (const [index, rowElement] of found.elements.entries()) {
      try {
        const cells = await this.readCells(rowElement);
        const row = sliceRow(cells);
        if (row instanceof RowValidationError) {
          rejected++;
          log.warn(`Page ${String(pageNumber)} row ${String(index + 1)} skipped: ${row.message}`);
          continue;
        }
        accepted.push(row);
      } catch (err) {
        rejected++;
        log.warn(`Page ${String(pageNumber)} row ${String(index + 1)} unreadable: ${errorMessage(err)}`);
      }
    }

    return { accepted, rejected };
  }

  private async readCells(row: PortalElement): Promise<string[]> {
    const cells = await this.resolver.resolveAll('table cells', this.options.locators.tableCell, {
      within: row,
    });
    if (!cells.found) return [];

    const texts: string[] = [];
    for (const cell of cells.elements) {
      texts.push(await cell.innerText({ timeout: TIMEOUTS.ACTION_TIMEOUT }));
    }
    return texts;
  }

  // ── Pagination ─────────────────────────────────────────────

  /** Move to the next page. Returns false when there is none. */
  private async advance(): Promise<boolean> {
    const { locators, pacing, random } = this.options;

    const next = await this.resolver.resolve('next page', locators.nextPage);
    if (next.found && (await isActionable(next.element))) {
      await next.element.click({ timeout: TIMEOUTS.ACTION_TIMEOUT });
      await pause(this.page, pacing.pageTurn, random);
      return true;
    }

    const active = await this.resolver.resolve('active page', locators.activePage);
    if (!active.found) return false;

    const current = Number.parseInt(
      (await active.element.innerText({ timeout: TIMEOUTS.ACTION_TIMEOUT })).trim(),
      10,
    );
    if (Number.isNaN(current)) return false;

    const link = await this.resolver.resolveAndClick(
      'page link',
      instantiateChain(locators.pageLink, { page: String(current + 1) }),
    );
    if (!link.found) return false;

    log.detail(`Opened page ${String(current + 1)} via numeric link`);
    await pause(this.page, pacing.pageTurn, random);
    return true;
  }
}

async function isActionable(element: PortalElement): Promise<boolean> {
  const timeout = TIMEOUTS.ACTION_TIMEOUT;
  const [enabled, disabledAttr, ariaDisabled, className] = await Promise.all([
    element.isEnabled({ timeout }),
    element.getAttribute('disabled', { timeout }),
    element.getAttribute('aria-disabled', { timeout }),
    element.getAttribute('class', { timeout }),
  ]);
  return (
    enabled &&
    disabledAttr === null &&
    ariaDisabled !== 'true' &&
    !(className ?? '').toLowerCase().includes('disabled')
  );
}
