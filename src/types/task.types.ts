export interface ITask {
  name: string;
  execute(): Promise<TaskResult>;
}

export interface TaskResult {
  taskName: string;
  success: boolean;
  message: string;
}
