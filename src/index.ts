#!/usr/bin/env node

/**
 * Main entry point for the Megaplan → OpenProject migration
 */

import { Command } from 'commander';
import * as schedule from 'node-schedule';
import { Config, displayConfig, loadConfig } from './config';
import { CONSTANTS } from './constants';
import { ConfigError, StorageError, describeError } from './errors';
import { SyncLock, lockPathFor } from './lock';
import { logger } from './logger';
import { MappingStore } from './mappingStore';
import { MegaplanIntegration } from './megaplan';
import { OpenProjectIntegration } from './openproject';
import { SyncEngine } from './syncEngine';
import { exitCodeFor, formatProjectTable, parseSince, printReports } from './output';
import { MappingKind, ProjectSummary, ProjectSyncReport, SyncStatus } from './types';

interface GlobalOptions {
  config: string;
  dryRun?: boolean;
  verbose: number;
}

type RunMode = { mode: 'full' } | { mode: 'incremental'; since?: Date };

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export class SyncRunner {
  private readonly config: Config;
  private readonly store: MappingStore;
  private readonly source: MegaplanIntegration;
  private readonly sink: OpenProjectIntegration;
  private readonly engine: SyncEngine;
  private readonly lock: SyncLock;
  private running: boolean = false;
  private syncInProgress: boolean = false;
  private scheduleJob?: schedule.Job;
  private isCleanedUp: boolean = false;

  constructor(config: Config) {
    this.config = config;

    logger.debug('Initializing sync components...');
    this.store = new MappingStore(config.stateDb, config.sync.dryRun);
    this.lock = new SyncLock(lockPathFor(config.stateDb));
    this.source = new MegaplanIntegration(config.megaplan, {
      pageSize: config.sync.pageSize,
      withAttachments: config.sync.attachments,
    });
    this.sink = new OpenProjectIntegration(config.openproject, {
      defaultUserId: config.openproject.defaultUserId,
      allowUserCreation: config.openproject.allowUserCreation,
    });
    this.engine = new SyncEngine({
      config,
      store: this.store,
      source: this.source,
      sink: this.sink,
    });
  }

  /**
   * One pass over every configured project. Live runs hold the lock file;
   * dry runs write nothing and skip it. Returns null when the lock is taken.
   */
  async runOnce(run: RunMode): Promise<ProjectSyncReport[] | null> {
    const dryRun = this.config.sync.dryRun;
    if (!dryRun && !this.lock.acquire()) {
      logger.info('This sync will be skipped and retried in the next cycle.');
      return null;
    }

    this.syncInProgress = true;
    try {
      logger.banner(`${dryRun ? '[DRY-RUN] ' : ''}Starting ${run.mode} sync at ${new Date().toISOString()}`);
      const reports = run.mode === 'full'
        ? await this.engine.fullSync()
        : await this.engine.incrementalSync(run.since);
      logger.banner(`Sync completed at ${new Date().toISOString()}`);
      return reports;
    } finally {
      this.syncInProgress = false;
      this.lock.release();
    }
  }

  /**
   * Incremental sync now, then on every tick of the cron rule
   */
  async runContinuous(): Promise<void> {
    const rule = this.config.sync.watchCron;
    logger.info(`\nStarting continuous sync (cron: ${rule})`);
    logger.info('Press Ctrl+C to stop\n');

    this.running = true;
    process.on('SIGINT', () => this.handleShutdown());
    process.on('SIGTERM', () => this.handleShutdown());

    await this.tick();

    this.scheduleJob = schedule.scheduleJob(rule, () => {
      if (this.running && !this.syncInProgress) {
        this.tick().catch(error => logger.error(`Scheduled sync failed: ${describeError(error)}`));
      }
    });

    await new Promise<void>((resolve) => {
      const checkInterval = setInterval(() => {
        if (!this.running && !this.syncInProgress) {
          clearInterval(checkInterval);
          resolve();
        }
      }, 1000);
    });
  }

  private async tick(): Promise<void> {
    const reports = await this.runOnce({ mode: 'incremental' });
    if (reports) printReports(reports);
  }

  /**
   * Both trackers answer with the configured credentials
   */
  async verify(): Promise<boolean> {
    let ok = true;

    try {
      const projects = await this.source.listProjects();
      logger.info(`✓ Megaplan reachable (${projects.length} projects)`);
      reportMissingProjects('Megaplan', projects, this.config.projects.map(p => p.megaplanId));
    } catch (error) {
      ok = false;
      logger.error(`✗ Megaplan: ${describeError(error)}`);
    }

    try {
      await this.sink.ping();
      const projects = await this.sink.listProjects();
      logger.info(`✓ OpenProject reachable (${projects.length} projects)`);
      reportMissingProjects('OpenProject', projects, this.config.projects.map(p => p.openprojectId));
    } catch (error) {
      ok = false;
      logger.error(`✗ OpenProject: ${describeError(error)}`);
    }

    return ok;
  }

  async listProjects(which: 'megaplan' | 'openproject' | 'both'): Promise<void> {
    if (which !== 'openproject') {
      console.log(formatProjectTable('Megaplan', await this.source.listProjects()));
    }
    if (which !== 'megaplan') {
      console.log(formatProjectTable('OpenProject', await this.sink.listProjects()));
    }
  }

  showStatus(limit: number = 10): void {
    console.log('\n' + '='.repeat(60));
    console.log('SYNC STATUS');
    console.log('='.repeat(60));

    const kinds: MappingKind[] = ['task', 'comment', 'attachment'];
    for (const kind of kinds) {
      const counts = this.store.countByStatus(kind);
      console.log(
        `  ${kind.padEnd(10)} synced ${counts[SyncStatus.SYNCED]}, pending ${counts[SyncStatus.PENDING]}, ` +
        `skipped ${counts[SyncStatus.SKIPPED]}, failed ${counts[SyncStatus.FAILED]}`
      );
    }

    console.log('\nLast sync per project:');
    for (const project of this.config.projects) {
      const lastSync = this.store.getLastSync(project.megaplanId);
      console.log(`  ${project.megaplanId} → ${project.openprojectId}: ${lastSync ? lastSync.toISOString() : 'never'}`);
    }

    console.log('\nRecent Sync Operations:');
    for (const log of this.store.recentLogs(limit)) {
      const statusIcon = log.status === 'success' ? '✓' : log.status === 'error' ? '✗' : '⚠';
      const suffix = log.errorMessage ? `: ${log.errorMessage}` : '';
      console.log(`  ${statusIcon} ${log.timestamp} - ${log.operation} ${log.entityType} ${log.entityId ?? ''}${suffix}`);
    }
    console.log('='.repeat(60) + '\n');
  }

  private handleShutdown(): void {
    logger.info('\nReceived shutdown signal, shutting down gracefully...');
    this.running = false;
    if (this.scheduleJob) {
      this.scheduleJob.cancel();
    }
  }

  cleanup(): void {
    if (this.isCleanedUp) return;
    this.isCleanedUp = true;

    this.lock.release();
    try {
      this.store.close();
      logger.debug('Database connection closed');
    } catch (error) {
      logger.error(`Error closing database: ${describeError(error)}`);
    }
  }
}

function reportMissingProjects(tracker: string, available: ProjectSummary[], configured: string[]): void {
  const ids = new Set(available.map(project => project.id));
  for (const id of configured) {
    if (!ids.has(id)) logger.warn(`${tracker} project ${id} from the configuration is not visible`);
  }
}

async function withRunner<T>(globals: GlobalOptions, fn: (runner: SyncRunner) => Promise<T>): Promise<T> {
  logger.setVerbosity(globals.verbose);
  const config = loadConfig(globals.config, globals.dryRun ? { dryRun: true } : {});
  if (globals.verbose > 0) displayConfig(config);

  const runner = new SyncRunner(config);
  try {
    return await fn(runner);
  } finally {
    runner.cleanup();
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mp-op-sync')
    .description('Migrate and keep in sync Megaplan tasks in OpenProject')
    .option('-c, --config <path>', 'YAML configuration file', CONSTANTS.CONFIG_PATH)
    .option('--dry-run', 'log every write instead of performing it')
    .option('-v, --verbose', 'more output (repeatable)', increaseVerbosity, 0);

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command('verify')
    .description('check credentials and project visibility on both trackers')
    .action(async () => {
      const ok = await withRunner(globals(), runner => runner.verify());
      process.exitCode = ok ? 0 : 1;
    });

  program
    .command('initial-sync')
    .description('full pass over every configured project')
    .action(async () => {
      const reports = await withRunner(globals(), runner => runner.runOnce({ mode: 'full' }));
      if (reports) {
        printReports(reports);
        process.exitCode = exitCodeFor(reports);
      }
    });

  program
    .command('sync-updates')
    .description('incremental pass over tasks changed since the last sync')
    .option('--since <iso8601>', 'override the stored last sync time', parseSince)
    .action(async (options: { since?: Date }) => {
      const reports = await withRunner(globals(), runner =>
        runner.runOnce({ mode: 'incremental', since: options.since })
      );
      if (reports) {
        printReports(reports);
        process.exitCode = exitCodeFor(reports);
      }
    });

  program
    .command('watch')
    .description('incremental sync on the configured cron rule until interrupted')
    .action(async () => {
      await withRunner(globals(), runner => runner.runContinuous());
    });

  program
    .command('status')
    .description('mapping counts, last sync times and recent operations')
    .option('-n, --limit <count>', 'number of log entries', value => Number.parseInt(value, 10), 10)
    .action(async (options: { limit: number }) => {
      await withRunner(globals(), async runner => runner.showStatus(options.limit));
    });

  program
    .command('list-projects')
    .description('print project ids and names from the trackers')
    .option('--source <tracker>', 'megaplan, openproject or both', 'both')
    .action(async (options: { source: string }) => {
      const which = options.source;
      if (which !== 'megaplan' && which !== 'openproject' && which !== 'both') {
        throw new ConfigError(`Unknown tracker "${which}"`);
      }
      await withRunner(globals(), runner => runner.listProjects(which));
    });

  return program;
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`Configuration error: ${error.message}`);
    } else if (error instanceof StorageError) {
      logger.error(`Storage error: ${error.message}`);
    } else {
      logger.error(`Fatal error: ${describeError(error)}`);
    }
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
