import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import { ZodError } from 'zod';

import { BrowserLifecycle, ShutdownCoordinator, playwrightLauncher } from '../browser/index.js';
import {
  ConfigError,
  loadDefaultLocators,
  loadEnvConfig,
  loadOptionalConfigFile,
  resolveStoreSettings,
  resolveSyncSettings,
} from '../config/index.js';
import type { CliOverrides, SyncSettings } from '../config/index.js';
import { Scheduler, SyncOrchestrator } from '../core/index.js';
import type { SyncResult } from '../schema/index.js';
import {
  MongoSyncStore,
  checkHealth,
  computeStats,
  createMemoryStore,
  listAccounts,
} from '../store/index.js';
import type { SyncStore } from '../store/index.js';
import {
  formatAccountsTable,
  formatHealth,
  formatStats,
  formatSyncResult,
  serializeJSON,
} from '../report/index.js';
import { errorMessage } from '../errors.js';
import * as log from '../utils/logger.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILED: 1,
  USAGE: 4,
} as const;

const DEFAULT_CONFIG_PATH = '.portalsync.yaml';

// ── Option parsing ───────────────────────────────────────────

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return n;
}

export interface SyncCommandOptions {
  config: string;
  headless?: true;
  stealth: boolean;
  dryRun?: true;
  json?: true;
  maxPages?: number;
  screenshotDir?: string;
  interval?: number;
}

/**
 * Only flags the user actually typed become overrides. `--no-stealth`
 * makes commander default `stealth` to true, which must not mask the
 * config file.
 */
export function toCliOverrides(opts: SyncCommandOptions, command: Command): CliOverrides {
  return {
    headless: opts.headless,
    stealth: command.getOptionValueSource('stealth') === 'cli' ? opts.stealth : undefined,
    maxPages: opts.maxPages,
    screenshotDir: opts.screenshotDir,
    intervalHours: opts.interval,
  };
}

export function exitCodeFor(result: SyncResult): number {
  return result.status === 'success' ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILED;
}

function isConfigProblem(err: unknown): boolean {
  return err instanceof ConfigError || err instanceof ZodError || isYamlError(err);
}

function isYamlError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'YAMLParseError' || err.name === 'SyntaxError');
}

function describeConfigProblem(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
  }
  return errorMessage(err);
}

// ── Shared setup ─────────────────────────────────────────────

interface Prepared {
  settings: SyncSettings;
  store: SyncStore;
}

async function prepare(opts: SyncCommandOptions, command: Command): Promise<Prepared> {
  const file = await loadOptionalConfigFile(opts.config);
  const env = loadEnvConfig();
  const locators = await loadDefaultLocators();
  const settings = resolveSyncSettings(toCliOverrides(opts, command), file, env, locators);

  if (opts.dryRun) {
    log.warn('Dry run: records go to an in-memory store and are discarded on exit');
  }
  const store = opts.dryRun ? createMemoryStore() : new MongoSyncStore(resolveStoreSettings(env));
  return { settings, store };
}

/**
 * Runs a command body with signal handling in place. Returns the exit
 * code; configuration problems map to USAGE.
 */
async function runGuarded(
  body: (coordinator: ShutdownCoordinator) => Promise<number>,
): Promise<number> {
  const coordinator = new ShutdownCoordinator();
  const dispose = coordinator.installSignalHandlers((exitCode) => {
    process.exit(exitCode);
  });

  try {
    return await body(coordinator);
  } catch (err) {
    if (isConfigProblem(err)) {
      log.error(`Config error: ${describeConfigProblem(err)}`);
      return EXIT_CODES.USAGE;
    }
    log.error(errorMessage(err));
    return EXIT_CODES.FAILED;
  } finally {
    await coordinator.shutdown('command finished');
    dispose();
  }
}

function emitResult(result: SyncResult, json: boolean): void {
  if (json) {
    process.stdout.write(serializeJSON(result) + '\n');
  }
  process.stderr.write(`\n${formatSyncResult(result)}\n\n`);
}

export function addSyncOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--headless', 'Run browser headless')
    .option('--no-stealth', 'Disable anti-detection launch settings')
    .option('--dry-run', 'Write to an in-memory store instead of MongoDB')
    .option('--json', 'Output JSON to stdout')
    .option('--max-pages <n>', 'Stop after this many report pages', parsePositiveInt)
    .option('--screenshot-dir <dir>', 'Save debug screenshots here');
}

// ── Sync commands ────────────────────────────────────────────

export function registerSyncCommands(program: Command): void {
  for (const mode of ['full', 'incremental'] as const) {
    addSyncOptions(
      program
        .command(mode)
        .description(
          mode === 'full'
            ? 'Scrape every account and upsert it'
            : 'Scrape and upsert accounts registered since the last successful sync',
        ),
    ).action(async (opts: SyncCommandOptions, command: Command) => {
      process.exitCode = await runGuarded(async (coordinator) => {
        const { settings, store } = await prepare(opts, command);
        const orchestrator = new SyncOrchestrator({
          settings,
          store,
          lifecycle: new BrowserLifecycle(playwrightLauncher, coordinator),
        });
        const result =
          mode === 'full' ? await orchestrator.runFull() : await orchestrator.runIncremental();
        emitResult(result, opts.json === true);
        return exitCodeFor(result);
      });
    });
  }

  addSyncOptions(
    program
      .command('schedule')
      .description('Run incremental syncs on a fixed interval until interrupted')
      .option('--interval <hours>', 'Hours between runs', parsePositiveNumber),
  ).action(async (opts: SyncCommandOptions, command: Command) => {
    process.exitCode = await runGuarded(async (coordinator) => {
      const { settings, store } = await prepare(opts, command);
      const orchestrator = new SyncOrchestrator({
        settings,
        store,
        lifecycle: new BrowserLifecycle(playwrightLauncher, coordinator),
      });
      const scheduler = new Scheduler({
        intervalMs: settings.intervalHours * 3_600_000,
        coordinator,
        run: async () => {
          const result = await orchestrator.runIncremental();
          emitResult(result, opts.json === true);
          return result;
        },
      });
      await scheduler.start();
      return EXIT_CODES.SUCCESS;
    });
  });
}

// ── Read commands ────────────────────────────────────────────

interface ReadCommandOptions {
  json?: true;
}

function openStore(): SyncStore {
  return new MongoSyncStore(resolveStoreSettings(loadEnvConfig()));
}

export function registerReadCommands(program: Command): void {
  program
    .command('accounts')
    .description('List stored accounts, newest first')
    .option('--json', 'Output JSON to stdout')
    .action(async (opts: ReadCommandOptions) => {
      process.exitCode = await runGuarded(async () => {
        const accounts = await listAccounts(openStore());
        process.stdout.write(
          (opts.json ? serializeJSON(accounts) : formatAccountsTable(accounts)) + '\n',
        );
        return EXIT_CODES.SUCCESS;
      });
    });

  program
    .command('health')
    .description('Check store connectivity and the latest successful sync')
    .option('--json', 'Output JSON to stdout')
    .action(async (opts: ReadCommandOptions) => {
      process.exitCode = await runGuarded(async () => {
        const report = await checkHealth(openStore());
        process.stdout.write((opts.json ? serializeJSON(report) : formatHealth(report)) + '\n');
        return report.status === 'healthy' ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILED;
      });
    });

  program
    .command('stats')
    .description('Account registration counts and sync success rate')
    .option('--json', 'Output JSON to stdout')
    .action(async (opts: ReadCommandOptions) => {
      process.exitCode = await runGuarded(async () => {
        const report = await computeStats(openStore());
        process.stdout.write((opts.json ? serializeJSON(report) : formatStats(report)) + '\n');
        return EXIT_CODES.SUCCESS;
      });
    });
}
