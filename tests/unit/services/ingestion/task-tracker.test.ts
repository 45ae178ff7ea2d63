/**
 * Unit tests for TaskTracker
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TaskTracker, InMemoryTaskStore, type BatchResult } from '../../../../src/services/ingestion/index.js';

function batch(total: number): BatchResult {
  return { total, successful: total, failed: 0, skipped: 0, files: [], errors: [] };
}

/** Clock that advances one second per reading */
function steppingClock(start = Date.parse('2026-01-01T00:00:00.000Z')): () => Date {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}

describe('TaskTracker', () => {
  let tracker: TaskTracker;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    tracker = new TaskTracker(new InMemoryTaskStore(), steppingClock());
  });

  it('should create a processing task', () => {
    const task = tracker.create('manuscripts');

    expect(task).toMatchObject({
      status: 'processing',
      documentType: 'manuscripts',
      current: 0,
      total: 0,
      currentFile: '',
      startedAt: '2026-01-01T00:00:00.000Z',
      errors: [],
      processedFiles: [],
    });
    expect(task.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should raise TASK_NOT_FOUND for an unknown id', () => {
    expect(() => tracker.get('00000000-0000-4000-8000-000000000000')).toThrow(
      'Task not found: 00000000-0000-4000-8000-000000000000. Use task_list to see known tasks.'
    );
  });

  it('should apply progress events', () => {
    const { id } = tracker.create('abstracts');

    tracker.update(id, { current: 1, total: 2, filename: 'a.pdf', status: 'success' });
    const task = tracker.update(id, { current: 2, total: 2, filename: 'b.pdf', status: 'failed', error: 'boom' });

    expect(task.current).toBe(2);
    expect(task.total).toBe(2);
    expect(task.currentFile).toBe('b.pdf');
    expect(task.processedFiles).toEqual([
      { filename: 'a.pdf', status: 'success' },
      { filename: 'b.pdf', status: 'failed', detail: 'boom' },
    ]);
    expect(task.errors).toEqual(['b.pdf: boom']);
  });

  it('should complete with current equal to total', () => {
    const { id } = tracker.create('abstracts');

    const task = tracker.complete(id, batch(4));

    expect(task.status).toBe('completed');
    expect(task.current).toBe(4);
    expect(task.total).toBe(4);
    expect(task.completedAt).toBe('2026-01-01T00:00:01.000Z');
  });

  it('should ignore updates to a finished task', () => {
    const { id } = tracker.create('abstracts');
    tracker.complete(id, batch(1));

    const task = tracker.fail(id, 'late failure');

    expect(task.status).toBe('completed');
    expect(task.error).toBeUndefined();
    expect(console.warn).toHaveBeenCalledWith(`[TaskTracker] Ignoring fail for completed task ${id}`);
  });

  it('should hand out copies', () => {
    const { id } = tracker.create('abstracts');

    const copy = tracker.get(id);
    copy.errors.push('tampered');

    expect(tracker.get(id).errors).toEqual([]);
  });

  it('should list newest first', () => {
    const first = tracker.create('abstracts');
    const second = tracker.create('manuscripts');

    expect(tracker.list().map((t) => t.id)).toEqual([second.id, first.id]);
  });

  it('should keep creation order reversed for equal start times', () => {
    const fixed = new TaskTracker(new InMemoryTaskStore(), () => new Date('2026-01-01T00:00:00.000Z'));
    const a = fixed.create('abstracts');
    const b = fixed.create('abstracts');
    const c = fixed.create('abstracts');

    expect(fixed.list().map((t) => t.id)).toEqual([c.id, b.id, a.id]);
  });

  describe('runInBackground', () => {
    it('should complete the task with the job result', async () => {
      const { id } = tracker.create('abstracts');

      const task = await tracker.runInBackground(id, async () => batch(2));

      expect(task.status).toBe('completed');
      expect(task.result).toEqual(batch(2));
    });

    it('should record a job failure instead of rejecting', async () => {
      const { id } = tracker.create('abstracts');

      const task = await tracker.runInBackground(id, async () => {
        throw new Error('store unavailable');
      });

      expect(task.status).toBe('failed');
      expect(task.error).toBe('store unavailable');
      expect(tracker.get(id).status).toBe('failed');
    });
  });
});
