import { ITask, TaskResult } from '../types/task.types';

export class TaskRunner {
  private tasks: Map<string, ITask> = new Map();

  registerTask(task: ITask): void {
    this.tasks.set(task.name, task);
    console.log(`Task registered: ${task.name}`);
  }

  hasTask(taskName: string): boolean {
    return this.tasks.has(taskName);
  }

  async executeTask(taskName: string): Promise<TaskResult> {
    const task = this.tasks.get(taskName);

    if (!task) {
      throw new Error(`Task not found: ${taskName}`);
    }

    return task.execute();
  }

  async executeAllTasks(): Promise<TaskResult[]> {
    const results: TaskResult[] = [];
    for (const [name, task] of this.tasks) {
      console.log(`Executing task: ${name}`);
      try {
        results.push(await task.execute());
      } catch (error) {
        console.error(`Task ${name} failed:`, error);
        results.push({
          taskName: name,
          success: false,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return results;
  }

  getRegisteredTasks(): string[] {
    return Array.from(this.tasks.keys());
  }
}
