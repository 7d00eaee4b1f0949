/**
 * Application constants and defaults
 */

export const CONSTANTS = {
  /**
   * Tag that excludes a Megaplan task from migration (configurable)
   */
  NOSYNC_TAG: 'nosync',

  /**
   * Default location of the YAML configuration
   */
  CONFIG_PATH: 'config.yaml',

  /**
   * Default mapping database file
   */
  STATE_DB_PATH: '.sync_state.sqlite',

  /**
   * Page size when listing Megaplan tasks
   */
  PAGE_SIZE: 100,

  /**
   * Attachments larger than this are recorded as skipped
   */
  ATTACHMENT_MAX_MB: 200,

  /**
   * HTTP timeout for both trackers in milliseconds
   */
  HTTP_TIMEOUT_MS: 30_000,

  /**
   * A lock file older than this is considered abandoned
   */
  STALE_LOCK_MS: 30 * 60 * 1000,

  /**
   * Cron rule for `watch`: every 15 minutes
   */
  WATCH_CRON: '*/15 * * * *',

  /**
   * Prefix of identifiers handed out while dry-running
   */
  DRY_RUN_ID_PREFIX: 'dry-run:',

  USER_AGENT: 'megaplan-openproject-sync/0.1',
} as const;
