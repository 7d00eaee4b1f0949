/**
 * Configuration management
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { CONSTANTS } from './constants';
import { ConfigError, describeError } from './errors';

dotenv.config();

const idSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

const credentialsSchema = z.object({
  baseUrl: z.string().url(),
  username: z.string().default(''),
  password: z.string().default(''),
});

const openProjectSchema = credentialsSchema.extend({
  defaultUserId: idSchema.nullable().default(null),
  allowUserCreation: z.boolean().default(false),
});

const projectSchema = z.object({
  megaplanId: idSchema,
  openprojectId: idSchema,
});

const fieldPolicySchema = z.enum(['fail', 'default']);

const syncSchema = z.object({
  pageSize: z.number().int().positive().default(CONSTANTS.PAGE_SIZE),
  attachmentMaxMb: z.number().positive().default(CONSTANTS.ATTACHMENT_MAX_MB),
  comments: z.boolean().default(true),
  attachments: z.boolean().default(true),
  dryRun: z.boolean().default(false),
  excludeTag: z.string().min(1).default(CONSTANTS.NOSYNC_TAG),
  projectConcurrency: z.number().int().positive().default(1),
  watchCron: z.string().default(CONSTANTS.WATCH_CRON),
});

const mappingSchema = z.object({
  statuses: z.record(z.string(), idSchema).default({}),
  types: z.record(z.string(), idSchema).default({}),
  users: z.record(z.string(), idSchema).default({}),
  customFields: z.record(z.string(), z.string()).default({}),
  defaults: z
    .object({
      status: idSchema.optional(),
      type: idSchema.optional(),
    })
    .default({}),
  onUnmapped: z
    .object({
      status: fieldPolicySchema.default('default'),
      type: fieldPolicySchema.default('default'),
      user: fieldPolicySchema.default('default'),
    })
    .default({}),
});

export const configSchema = z.object({
  megaplan: credentialsSchema,
  openproject: openProjectSchema,
  projects: z.array(projectSchema).min(1),
  sync: syncSchema.default({}),
  mapping: mappingSchema.default({}),
  stateDb: z.string().default(CONSTANTS.STATE_DB_PATH),
});

export type AppConfig = z.infer<typeof configSchema>;
export type ProjectMapping = z.infer<typeof projectSchema>;
export type SyncOptions = z.infer<typeof syncSchema>;
export type FieldMappingConfig = z.infer<typeof mappingSchema>;
export type FieldPolicy = z.infer<typeof fieldPolicySchema>;

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type Config = DeepReadonly<AppConfig>;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Environment overrides for secrets, so credentials can live in .env
 * instead of the YAML file.
 */
function applyEnv(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const section = (name: string): Record<string, unknown> => {
    const value = raw[name];
    return value && typeof value === 'object' && !Array.isArray(value) ? { ...value } : {};
  };

  const megaplan = section('megaplan');
  const openproject = section('openproject');
  if (env.MEGAPLAN_USERNAME) megaplan.username = env.MEGAPLAN_USERNAME;
  if (env.MEGAPLAN_PASSWORD) megaplan.password = env.MEGAPLAN_PASSWORD;
  if (env.OPENPROJECT_USERNAME) openproject.username = env.OPENPROJECT_USERNAME;
  if (env.OPENPROJECT_PASSWORD) openproject.password = env.OPENPROJECT_PASSWORD;

  const result: Record<string, unknown> = { ...raw, megaplan, openproject };
  if (env.SYNC_STATE_DB) result.stateDb = env.SYNC_STATE_DB;
  return result;
}

export function parseConfig(text: string, source: string, env: NodeJS.ProcessEnv = process.env): Config {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigError(`Configuration ${source} is not valid YAML: ${describeError(error)}`);
  }
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Configuration ${source} must be a YAML mapping`);
  }

  const result = configSchema.safeParse(applyEnv({ ...raw }, env));
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Configuration ${source} is invalid:\n${issues}`);
  }

  const missing: string[] = [];
  if (!result.data.megaplan.username) missing.push('megaplan.username (MEGAPLAN_USERNAME)');
  if (!result.data.megaplan.password) missing.push('megaplan.password (MEGAPLAN_PASSWORD)');
  if (!result.data.openproject.password) missing.push('openproject.password (OPENPROJECT_PASSWORD)');
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing credentials in ${source}: ${missing.join(', ')}\n` +
      'Set them in the YAML file or in your .env file.'
    );
  }

  return deepFreeze(result.data);
}

export function loadConfig(configPath: string = CONSTANTS.CONFIG_PATH, overrides: { dryRun?: boolean } = {}): Config {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Configuration file not found: ${resolved}`);
  }

  const config = parseConfig(fs.readFileSync(resolved, 'utf-8'), resolved);
  if (overrides.dryRun === undefined || overrides.dryRun === config.sync.dryRun) {
    return config;
  }
  return withDryRun(config, overrides.dryRun);
}

export function withDryRun(config: Config, dryRun: boolean): Config {
  return deepFreeze({ ...config, sync: { ...config.sync, dryRun } });
}

export function attachmentLimitBytes(config: Config): number {
  return Math.floor(config.sync.attachmentMaxMb * 1024 * 1024);
}

export function displayConfig(config: Config): void {
  console.log('\nConfiguration:');
  console.log(`  Mapping database: ${config.stateDb}`);
  console.log(`  Megaplan: ${config.megaplan.baseUrl}`);
  console.log(`  OpenProject: ${config.openproject.baseUrl}`);
  console.log(`  Projects: ${config.projects.map(p => `${p.megaplanId} → ${p.openprojectId}`).join(', ')}`);
  console.log(`  Attachment limit: ${config.sync.attachmentMaxMb} MB`);
  console.log(`  Comments: ${config.sync.comments}, attachments: ${config.sync.attachments}`);
  console.log(`  Dry run: ${config.sync.dryRun}`);
}
