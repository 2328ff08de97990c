export type ErrorKind =
  | 'TransportError'
  | 'ToolNotFound'
  | 'ToolExecutionError'
  | 'TaskExecutionError'
  | 'InvalidTransition'
  | 'MemoryFormat'
  | 'WorkflowDefinition';

export class AgentweaveError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** The model gateway could not produce a reply (network, timeout, bad payload). */
export class TransportError extends AgentweaveError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super('TransportError', message, options);
    this.status = status;
  }
}

export class ToolNotFoundError extends AgentweaveError {
  constructor(readonly toolName: string) {
    super('ToolNotFound', `Tool '${toolName}' not found`);
  }
}

export class ToolExecutionError extends AgentweaveError {
  constructor(readonly toolName: string, cause: unknown) {
    super('ToolExecutionError', errorMessage(cause), { cause });
  }
}

export class TaskExecutionError extends AgentweaveError {
  constructor(readonly taskId: string, cause: unknown) {
    super('TaskExecutionError', errorMessage(cause), { cause });
  }
}

export class InvalidTransitionError extends AgentweaveError {
  constructor(taskId: string, from: string, to: string) {
    super('InvalidTransition', `Task ${taskId} cannot move from ${from} to ${to}`);
  }
}

export class MemoryFormatError extends AgentweaveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MemoryFormat', message, options);
  }
}

export class WorkflowDefinitionError extends AgentweaveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('WorkflowDefinition', message, options);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
