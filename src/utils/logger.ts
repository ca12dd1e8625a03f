/**
 * Live execution logger for portal-sync.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * Emoji prefixes give instant visual context in the terminal.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(`[${new Date().toISOString()}] ${message}\n`);
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function login(message: string): void {
  write(`🔐 ${message}`);
}

export function page(pageNumber: number, accepted: number, rejected: number): void {
  write(
    `📄 Page ${String(pageNumber)}: ${String(accepted)} rows accepted, ${String(rejected)} rejected`,
  );
}

export function sync(message: string): void {
  write(`🔄 ${message}`);
}

export function schedule(message: string): void {
  write(`⏰ ${message}`);
}
