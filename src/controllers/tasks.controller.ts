import type { InventoryController } from './inventory.controller';
import type { TaskMessage, TaskResult } from '../services/amqp';
import { InventoryError, ValidationError, errorMessage } from '../lib/errors';
import { describeOperations, findOperation } from '../tools/catalog';
import rootLogger from '../lib/logger';

const logger = rootLogger.child('tasks');

export const LIST_OPERATIONS_ACTION = 'tools.list';

export class TasksController {
  constructor(
    private readonly inventory: InventoryController,
    private readonly agentId: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async handle(task: TaskMessage): Promise<TaskResult> {
    if (task.action === LIST_OPERATIONS_ACTION) {
      return this.ok(task, { operations: describeOperations() });
    }

    const operation = findOperation(task.action);
    if (!operation) {
      return this.fail(task, new ValidationError(`Unknown action '${task.action}'`));
    }

    const startedAt = Date.now();
    try {
      const result = await operation.invoke(this.inventory, task.data);
      logger.info('task completed', { taskId: task.taskId, action: task.action, ms: Date.now() - startedAt });
      return this.ok(task, result);
    } catch (err) {
      if (err instanceof ValidationError) {
        logger.warn('task rejected', { taskId: task.taskId, action: task.action, error: err.message });
        return this.fail(task, err);
      }
      logger.error('task failed', { taskId: task.taskId, action: task.action, err });
      return this.fail(task, err, `Error executing operation '${task.action}': ${errorMessage(err)}`);
    }
  }

  private ok(task: TaskMessage, result: unknown): TaskResult {
    return {
      taskId: task.taskId,
      agentId: this.agentId,
      ok: true,
      result,
      finishedAt: this.now().toISOString(),
    };
  }

  private fail(task: TaskMessage, err: unknown, message?: string): TaskResult {
    const body =
      err instanceof InventoryError ? err.toResponseBody() : { error: errorMessage(err), code: 'INTERNAL_ERROR' };
    return {
      taskId: task.taskId,
      agentId: this.agentId,
      ok: false,
      error: message ?? body.error,
      code: body.code,
      finishedAt: this.now().toISOString(),
    };
  }
}
