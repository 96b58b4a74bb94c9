/**
 * Write Queue and attachment path tests
 */

import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { WriteQueue } from '../write-queue.js';
import { attachmentPath, safeFilename } from '../attachment-files.js';

describe('WriteQueue', () => {
  it('should run tasks one at a time in enqueue order', async () => {
    const queue = new WriteQueue();
    const events: string[] = [];

    const slow = queue.enqueue(async () => {
      events.push('slow:start');
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push('slow:end');
    });
    const fast = queue.enqueue(() => {
      events.push('fast');
    });

    expect(queue.size).toBe(2);
    await Promise.all([slow, fast]);

    expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
    expect(queue.size).toBe(0);
  });

  it('should reject only the failing task', async () => {
    const queue = new WriteQueue();

    const failing = queue.enqueue(() => {
      throw new Error('disk full');
    });
    const next = queue.enqueue(() => 'written');

    await expect(failing).rejects.toThrow('disk full');
    await expect(next).resolves.toBe('written');
    await expect(queue.drain()).resolves.toBeUndefined();
  });
});

describe('attachment files', () => {
  it('should reduce filenames to a portable character set', () => {
    expect(safeFilename('screen shot (1).png')).toBe('screen_shot_1_.png');
    expect(safeFilename('../../etc/passwd')).toBe('etc_passwd');
    expect(safeFilename('???')).toBe('attachment');
  });

  it('should place files per run and attachment', () => {
    expect(attachmentPath('/staging', 'run_1', '42', 'log.txt')).toBe(join('/staging', 'run_1', '42-log.txt'));
  });
});
