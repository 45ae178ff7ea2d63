/**
 * TaskTracker - progress records for background folder ingestion.
 *
 * Each task has a single writer (the job driving it) and any number of
 * pollers. The store hands out copies, so a poller never sees an update
 * half applied. Tasks live in process memory only.
 *
 * @module services/ingestion/task-tracker
 */

import { v4 as uuidv4 } from 'uuid';
import { errorMessage, taskNotFoundError } from '../../server/errors.js';
import type { DocumentType } from '../../server/types.js';
import type { BatchResult, ProcessedFile, ProgressEvent } from './bulk-orchestrator.js';

export type TaskStatus = 'processing' | 'completed' | 'failed';

export interface Task {
  id: string;
  status: TaskStatus;
  documentType: DocumentType;
  current: number;
  total: number;
  currentFile: string;
  startedAt: string;
  completedAt?: string;
  errors: string[];
  processedFiles: ProcessedFile[];
  result?: BatchResult;
  error?: string;
}

/**
 * Key-value persistence for tasks
 */
export interface TaskStore {
  get(taskId: string): Task | undefined;
  set(task: Task): void;
  values(): Task[];
}

function cloneTask(task: Task): Task {
  return structuredClone(task);
}

export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, Task>();

  get(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    return task ? cloneTask(task) : undefined;
  }

  set(task: Task): void {
    this.tasks.set(task.id, cloneTask(task));
  }

  values(): Task[] {
    return [...this.tasks.values()].map(cloneTask);
  }
}

function isTerminal(task: Task): boolean {
  return task.status !== 'processing';
}

export class TaskTracker {
  constructor(
    private readonly store: TaskStore = new InMemoryTaskStore(),
    private readonly now: () => Date = () => new Date()
  ) {}

  create(documentType: DocumentType): Task {
    const task: Task = {
      id: uuidv4(),
      status: 'processing',
      documentType,
      current: 0,
      total: 0,
      currentFile: '',
      startedAt: this.now().toISOString(),
      errors: [],
      processedFiles: [],
    };
    this.store.set(task);
    console.error(`[TaskTracker] Created task ${task.id} (${documentType})`);
    return cloneTask(task);
  }

  /**
   * @throws MCPError TASK_NOT_FOUND
   */
  get(taskId: string): Task {
    const task = this.store.get(taskId);
    if (!task) throw taskNotFoundError(taskId);
    return task;
  }

  /**
   * Newest first
   */
  list(): Task[] {
    // Reversed first so tasks started in the same millisecond keep newest-first
    return this.store
      .values()
      .reverse()
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : a.startedAt > b.startedAt ? -1 : 0));
  }

  /**
   * Apply one progress event from the orchestrator
   */
  update(taskId: string, event: ProgressEvent): Task {
    return this.mutate(taskId, 'update', (task) => {
      task.current = event.current;
      task.total = event.total;
      task.currentFile = event.filename;
      const entry: ProcessedFile = { filename: event.filename, status: event.status };
      if (event.error !== undefined) {
        entry.detail = event.error;
        task.errors.push(`${event.filename}: ${event.error}`);
      }
      task.processedFiles.push(entry);
    });
  }

  complete(taskId: string, result: BatchResult): Task {
    return this.mutate(taskId, 'complete', (task) => {
      task.status = 'completed';
      task.total = result.total;
      task.current = result.total;
      task.result = result;
      task.completedAt = this.now().toISOString();
    });
  }

  fail(taskId: string, message: string): Task {
    return this.mutate(taskId, 'fail', (task) => {
      task.status = 'failed';
      task.error = message;
      task.completedAt = this.now().toISOString();
    });
  }

  /**
   * Drive a job for an existing task and mark the task exactly once.
   * Never rejects: a job failure is recorded on the task.
   */
  async runInBackground(taskId: string, job: () => Promise<BatchResult>): Promise<Task> {
    try {
      const result = await job();
      return this.complete(taskId, result);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[TaskTracker] Task ${taskId} failed: ${message}`);
      return this.fail(taskId, message);
    }
  }

  private mutate(taskId: string, action: string, apply: (task: Task) => void): Task {
    const task = this.get(taskId);
    if (isTerminal(task)) {
      console.warn(`[TaskTracker] Ignoring ${action} for ${task.status} task ${taskId}`);
      return task;
    }
    apply(task);
    this.store.set(task);
    return cloneTask(task);
  }
}
