import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Readable } from 'stream';
import { AttachmentTransfer, tooLargeReason } from '../src/attachmentTransfer';
import { DryRunSink } from '../src/dryRunSink';
import { FakeSink, FakeSource } from './helpers';

vi.mock('../src/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('AttachmentTransfer', () => {
  let source: FakeSource;
  let sink: FakeSink;

  beforeEach(() => {
    source = new FakeSource();
    sink = new FakeSink();
    source.files.set('f1', Buffer.from('0123456789'));
  });

  it('should upload a file exactly at the limit', async () => {
    const transfer = new AttachmentTransfer(source, sink);

    const result = await transfer.transfer({ id: 'f1', filename: 'digits.txt', size: 10 }, 10, 'wp-1');

    expect(result).toEqual({ kind: 'transferred', targetId: 'att-1' });
    expect(sink.attachments).toEqual([{ id: 'att-1', targetTaskId: 'wp-1', filename: 'digits.txt', size: 10 }]);
  });

  it('should skip a file over the limit without downloading it', async () => {
    const transfer = new AttachmentTransfer(source, sink);

    const result = await transfer.transfer({ id: 'f1', filename: 'digits.txt', size: 11 }, 10, 'wp-1');

    expect(result).toEqual({ kind: 'skipped-too-large', size: 11, reason: 'size 11 bytes exceeds limit of 10 bytes' });
    expect(source.fetched).toEqual([]);
    expect(sink.attachments).toEqual([]);
  });

  it('should skip when the download turns out larger than announced', async () => {
    const transfer = new AttachmentTransfer(source, sink);

    const result = await transfer.transfer({ id: 'f1', filename: 'digits.txt', size: 4 }, 8, 'wp-1');

    expect(result).toEqual({ kind: 'skipped-too-large', size: 10, reason: tooLargeReason(10, 8) });
    expect(source.fetched).toEqual(['f1']);
    expect(sink.attachments).toEqual([]);
  });

  it('should neither download nor upload in dry-run mode', async () => {
    const transfer = new AttachmentTransfer(source, new DryRunSink(sink), true);

    const result = await transfer.transfer({ id: 'f1', filename: 'digits.txt', size: 10 }, 10, 'wp-1');

    expect(result).toEqual({ kind: 'transferred', targetId: 'dry-run:attachment:1' });
    expect(source.fetched).toEqual([]);
    expect(sink.attachments).toEqual([]);
  });
});

describe('DryRunSink', () => {
  it('should hand out sequential placeholder ids and forward nothing', async () => {
    const inner = new FakeSink();
    const dry = new DryRunSink(inner);

    const task = await dry.createTask({ projectId: 'op-1', subject: 'A', description: '' });
    await dry.updateTask(task, { projectId: 'op-1', subject: 'A', description: 'changed' });
    const comment = await dry.createComment(task, { body: 'hi' });
    const attachment = await dry.createAttachment(task, Readable.from([Buffer.from('x')]), 'x.txt');

    expect([task, comment, attachment]).toEqual(['dry-run:task:1', 'dry-run:comment:2', 'dry-run:attachment:3']);
    expect(inner.writes).toBe(0);
  });

  describe('ensureUser', () => {
    const known = { id: 'u1', login: 'known', email: 'known@example.test', firstName: null, lastName: null };
    const unknown = { id: 'u2', login: 'newbie', email: 'newbie@example.test', firstName: null, lastName: null };

    it('should return an existing target user without creating anything', async () => {
      const inner = new FakeSink();
      inner.userIds.set('u1', '42');
      const dry = new DryRunSink(inner);

      expect(await dry.ensureUser(known)).toBe('42');
      expect(inner.ensuredUsers).toEqual([]);
    });

    it('should fall back to the default user when creation is off', async () => {
      const inner = new FakeSink();
      const dry = new DryRunSink(inner, { defaultUserId: '1', allowUserCreation: false });

      expect(await dry.ensureUser(unknown)).toBe('1');
      expect(await new DryRunSink(inner).ensureUser(unknown)).toBeNull();
      expect(inner.ensuredUsers).toEqual([]);
    });

    it('should hand out a placeholder for a user it would create', async () => {
      const dry = new DryRunSink(new FakeSink(), { defaultUserId: '1', allowUserCreation: true });

      expect(await dry.ensureUser(unknown)).toBe('dry-run:user:u2');
    });
  });

  it('should delegate read calls to the wrapped sink', async () => {
    const dry = new DryRunSink(new FakeSink());
    expect(await dry.listProjects()).toEqual([{ id: 'op-1', name: 'Target' }]);
  });
});
