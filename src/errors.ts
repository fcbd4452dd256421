export class TaskNotFoundError extends Error {
  readonly code = 'TASK_NOT_FOUND';

  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

export class DocumentWriteError extends Error {
  readonly code = 'DOCUMENT_WRITE_FAILED';

  constructor(readonly document: string, readonly filePath: string, cause: unknown) {
    super(`Failed to write ${document} document to ${filePath}`, { cause });
    this.name = 'DocumentWriteError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function isNotFoundError(value: unknown): boolean {
  return value instanceof Error && 'code' in value && value.code === 'ENOENT';
}
