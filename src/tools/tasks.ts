/**
 * Task MCP Tools
 *
 * Tools: task_status, task_list
 *
 * @module tools/tasks
 */

import { z } from 'zod';
import { getTaskTracker } from '../server/state.js';
import { successResult } from '../server/types.js';
import type { Task } from '../services/ingestion/task-tracker.js';
import { validateInput, TaskStatusInput, TaskListInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

/**
 * Wire shape of a task, without the full batch result
 */
export function summarizeTask(task: Task): Record<string, unknown> {
  return {
    task_id: task.id,
    status: task.status,
    document_type: task.documentType,
    current: task.current,
    total: task.total,
    current_file: task.currentFile,
    started_at: task.startedAt,
    completed_at: task.completedAt ?? null,
    error_count: task.errors.length,
    error: task.error ?? null,
  };
}

export async function handleTaskStatus(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(TaskStatusInput, params);
    const task = getTaskTracker().get(input.task_id);

    return formatResponse(
      successResult({
        ...summarizeTask(task),
        errors: task.errors,
        processed_files: task.processedFiles,
        result: task.result ?? null,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleTaskList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(TaskListInput, params);
    const tasks = getTaskTracker()
      .list()
      .filter((task) => !input.status || task.status === input.status);

    return formatResponse(successResult({ tasks: tasks.map(summarizeTask), total: tasks.length }));
  } catch (error) {
    return handleError(error);
  }
}

export const taskTools: Record<string, ToolDefinition> = {
  task_status: {
    description: 'Progress, per-file outcomes and errors of a folder ingestion task',
    inputSchema: {
      task_id: z.string().uuid().describe('Task ID returned by folder_ingest'),
    },
    handler: handleTaskStatus,
  },

  task_list: {
    description: 'All folder ingestion tasks of this server process, newest first',
    inputSchema: {
      status: z.enum(['processing', 'completed', 'failed']).optional().describe('Only tasks in this state'),
    },
    handler: handleTaskList,
  },
};
