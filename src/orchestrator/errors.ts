export class TaskNotFoundError extends Error {
  constructor(
    public taskId: string,
    public taskPath: string,
  ) {
    super(`task.json not found for ${taskId} (looked in ${taskPath})`);
    this.name = 'TaskNotFoundError';
  }
}

export class TaskDefinitionError extends Error {
  constructor(
    public taskPath: string,
    public issues: string[],
  ) {
    super(`Invalid task definition ${taskPath}: ${issues.join('; ')}`);
    this.name = 'TaskDefinitionError';
  }
}

export class StateFileError extends Error {
  constructor(
    public statePath: string,
    public reason: string,
  ) {
    super(`Unreadable run state ${statePath}: ${reason}`);
    this.name = 'StateFileError';
  }
}
