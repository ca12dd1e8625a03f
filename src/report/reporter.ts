import type {
  HealthReport,
  StatsReport,
  StopReason,
  StoredAccount,
  SyncResult,
} from '../schema/index.js';

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.
// Dates are already ISO strings by the time the replacer sees them.

export function serializeJSON(output: unknown): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries: [string, unknown][] = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

// ── Sync result ──────────────────────────────────────────────

const STOP_LABELS: Record<StopReason, string> = {
  last_page: 'last page',
  page_limit: 'page limit reached (report may be incomplete)',
  stale_pages: 'pages stopped changing (report may be incomplete)',
};

export function formatSyncResult(result: SyncResult): string {
  const lines: string[] = [];

  lines.push(`--- Sync ${result.status === 'success' ? 'succeeded' : 'FAILED'} ---`);
  lines.push(`Type:      ${result.syncType}`);
  lines.push(`Started:   ${result.startedAt}`);
  if (result.cutoff !== undefined) {
    lines.push(`Cutoff:    ${result.cutoff}`);
  }
  lines.push(`Pages:     ${String(result.pagesVisited)}`);
  if (result.stoppedBy !== undefined) {
    lines.push(`Stopped:   ${STOP_LABELS[result.stoppedBy]}`);
  }
  lines.push(
    `Rows:      ${String(result.recordsScraped)} scraped, ${String(result.rowsRejected)} rejected, ${String(result.invalidDates)} without date`,
  );
  lines.push(
    `Stored:    ${String(result.inserted)} inserted, ${String(result.updated)} updated (${String(result.recordsProcessed)} processed)`,
  );
  lines.push(`Time:      ${formatDuration(result.durationMs)}`);
  if (!result.logRecorded) {
    lines.push('Log:       not recorded');
  }
  if (result.errorMessage !== undefined) {
    lines.push(`Error:     ${result.errorMessage}`);
  }

  return lines.join('\n');
}

// ── Read model ───────────────────────────────────────────────

export function formatHealth(report: HealthReport): string {
  const lines = [
    `Status:       ${report.status}`,
    `Database:     ${report.databaseConnected ? 'connected' : 'unreachable'}`,
    `Accounts:     ${String(report.totalAccounts)}`,
    `Last sync:    ${report.latestSync.time ?? 'never'} (${String(report.latestSync.recordsProcessed)} processed)`,
  ];
  if (report.error !== undefined) {
    lines.push(`Error:        ${report.error}`);
  }
  return lines.join('\n');
}

export function formatStats(report: StatsReport): string {
  const { accountStats: a, syncStats: s } = report;
  return [
    'Accounts',
    `  total:        ${String(a.totalAccounts)}`,
    `  today:        ${String(a.accountsToday)}`,
    `  last 7 days:  ${String(a.accountsThisWeek)}`,
    `  last 30 days: ${String(a.accountsThisMonth)}`,
    'Syncs',
    `  total:        ${String(s.totalSyncs)}`,
    `  successful:   ${String(s.successfulSyncs)}`,
    `  failed:       ${String(s.failedSyncs)}`,
    `  success rate: ${s.successRate.toFixed(2)}%`,
  ].join('\n');
}

/** Markdown table, one row per account, in the order given. */
export function formatAccountsTable(accounts: readonly StoredAccount[]): string {
  const lines: string[] = [];
  lines.push('| Account | User ID | Name | Email | Date | Source | ID | POA |');
  lines.push('|---------|---------|------|-------|------|--------|----|-----|');

  for (const a of accounts) {
    const cells = [
      a.account_number,
      a.user_id,
      a.name,
      a.email,
      a.date_string,
      a.campaign_source,
      a.id_status,
      a.poa_status,
    ].map(escapeMarkdownCell);
    lines.push(`| ${cells.join(' | ')} |`);
  }

  lines.push('');
  lines.push(`${String(accounts.length)} account(s)`);
  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
