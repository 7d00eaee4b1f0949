/**
 * Mapping database admin CLI tool
 *
 * Usage: npm run db:admin -- <command> [args]
 * The database is `SYNC_STATE_DB` or `.sync_state.sqlite`.
 */

import { CONSTANTS } from './constants';
import { describeError } from './errors';
import { MappingStore, mappingKeyString } from './mappingStore';
import { Mapping, MappingKind, SyncStatus } from './types';

const KINDS: MappingKind[] = ['task', 'comment', 'attachment'];
const STATUSES = Object.values(SyncStatus);

function displayJSON(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

function isKind(value: string): value is MappingKind {
  return KINDS.some(kind => kind === value);
}

function parseStatuses(value: string | undefined): SyncStatus[] {
  if (!value) return STATUSES;
  const status = STATUSES.find(candidate => candidate === value);
  if (!status) {
    throw new Error(`Unknown status "${value}" (expected one of ${STATUSES.join(', ')})`);
  }
  return [status];
}

function summarize(mapping: Mapping): Record<string, unknown> {
  return {
    key: mappingKeyString(mapping.key),
    targetId: mapping.targetId,
    status: mapping.syncStatus,
    sourceUpdatedAt: mapping.sourceUpdatedAt,
    lastSyncedAt: mapping.lastSyncedAt,
    reason: mapping.reason,
  };
}

export function listMappings(store: MappingStore, kind: MappingKind, status?: string): Record<string, unknown>[] {
  return store.listByStatus(kind, parseStatuses(status)).map(summarize);
}

/** Every failed record, across kinds, with its reason */
export function listFailures(store: MappingStore): Record<string, unknown>[] {
  return KINDS.flatMap(kind => store.listByStatus(kind, [SyncStatus.FAILED]).map(summarize));
}

export function counts(store: MappingStore): Record<MappingKind, Record<SyncStatus, number>> {
  return {
    task: store.countByStatus('task'),
    comment: store.countByStatus('comment'),
    attachment: store.countByStatus('attachment'),
  };
}

function usage(): void {
  console.error('\nAvailable commands:');
  console.error('  counts                          - Mapping counts per kind and status');
  console.error('  mappings <kind> [status]        - List task|comment|attachment mappings');
  console.error('  failed                          - List every failed record with its reason');
  console.error('  logs [limit]                    - Show recent sync log entries');
}

function main(argv: string[]): number {
  const [command, arg, extra] = argv;
  const store = new MappingStore(process.env.SYNC_STATE_DB || CONSTANTS.STATE_DB_PATH);

  try {
    switch (command) {
      case 'counts':
        displayJSON(counts(store));
        break;

      case 'mappings': {
        if (!arg || !isKind(arg)) {
          console.error(`Unknown mapping kind: ${arg ?? '(none)'}`);
          usage();
          return 1;
        }
        const rows = listMappings(store, arg, extra);
        console.log(`\nFound ${rows.length} ${arg} mappings${extra ? ` with status ${extra}` : ''}\n`);
        displayJSON(rows);
        break;
      }

      case 'failed': {
        const rows = listFailures(store);
        console.log(`\nFound ${rows.length} failed records\n`);
        displayJSON(rows);
        break;
      }

      case 'logs':
        displayJSON(store.recentLogs(arg ? Number.parseInt(arg, 10) : 20));
        break;

      default:
        console.error('Unknown command:', command);
        usage();
        return 1;
    }
    return 0;
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    return 1;
  } finally {
    store.close();
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
