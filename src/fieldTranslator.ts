/**
 * Field translation strategies
 */

import { FieldMappingConfig, DeepReadonly } from './config';
import { SourceTask } from './types';

/**
 * Capability object consulted by TaskMapper and SyncEngine. A null result
 * means "no target equivalent"; defaults and policies are applied by the
 * caller.
 */
export interface FieldTranslator {
  translateStatus(sourceStatus: string): string | null;
  translateType(sourceType: string | null): string | null;
  translateUser(sourceUserId: string): string | null;
  translateCustomFields(task: SourceTask): Record<string, string>;
}

/**
 * Lookup-table translator built from the `mapping` section of the YAML file.
 */
export class ConfiguredFieldTranslator implements FieldTranslator {
  constructor(private readonly mapping: DeepReadonly<FieldMappingConfig>) {}

  translateStatus(sourceStatus: string): string | null {
    return this.mapping.statuses[sourceStatus] ?? null;
  }

  translateType(sourceType: string | null): string | null {
    if (sourceType === null) return null;
    return this.mapping.types[sourceType] ?? null;
  }

  translateUser(sourceUserId: string): string | null {
    return this.mapping.users[sourceUserId] ?? null;
  }

  translateCustomFields(task: SourceTask): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [sourceField, value] of Object.entries(task.customFields)) {
      const targetField = this.mapping.customFields[sourceField];
      if (targetField && value !== '') {
        result[targetField] = value;
      }
    }
    return result;
  }
}
