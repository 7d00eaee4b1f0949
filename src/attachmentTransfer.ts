/**
 * Copies attachment payloads from Megaplan to OpenProject under a size ceiling
 */

import { Readable } from 'stream';
import { AttachmentDescriptor, TaskSink, TaskSource } from './types';
import { logger } from './logger';

export type TransferResult =
  | { kind: 'transferred'; targetId: string }
  | { kind: 'skipped-too-large'; size: number; reason: string };

export function tooLargeReason(size: number, maxSizeBytes: number): string {
  return `size ${size} bytes exceeds limit of ${maxSizeBytes} bytes`;
}

export class AttachmentTransfer {
  constructor(
    private readonly source: TaskSource,
    private readonly sink: TaskSink,
    private readonly dryRun: boolean = false,
  ) {}

  /**
   * The descriptor's size is checked before anything is downloaded. The
   * size reported by the download itself is checked again, and the stream is
   * discarded if it turns out larger.
   */
  async transfer(
    descriptor: AttachmentDescriptor,
    maxSizeBytes: number,
    targetTaskId: string,
  ): Promise<TransferResult> {
    if (descriptor.size > maxSizeBytes) {
      return { kind: 'skipped-too-large', size: descriptor.size, reason: tooLargeReason(descriptor.size, maxSizeBytes) };
    }

    if (this.dryRun) {
      // The dry-run sink needs no bytes; skip the download entirely
      logger.info(`  [DRY-RUN] Would upload ${descriptor.filename} (${descriptor.size} bytes) to #${targetTaskId}`);
      const targetId = await this.sink.createAttachment(targetTaskId, emptyStream(), descriptor.filename);
      return { kind: 'transferred', targetId };
    }

    const content = await this.source.fetchAttachment(descriptor.id);
    if (content.size > maxSizeBytes) {
      content.stream.destroy();
      return { kind: 'skipped-too-large', size: content.size, reason: tooLargeReason(content.size, maxSizeBytes) };
    }

    logger.debug(`Uploading ${content.filename} (${content.size} bytes) to #${targetTaskId}`);
    const targetId = await this.sink.createAttachment(targetTaskId, content.stream, descriptor.filename || content.filename);
    return { kind: 'transferred', targetId };
  }
}

function emptyStream(): Readable {
  return Readable.from([]);
}
