export type MessageRole = 'system' | 'user' | 'assistant';
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';
export type AgentState = 'thinking' | 'acting' | 'awaiting_retry' | 'done' | 'exhausted';
export type ParsingStrategy = 'react' | 'json';
export type ToolErrorKind = 'ToolNotFound' | 'ToolExecutionError';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ConversationMessage {
  role: MessageRole;
  content: string;
}

export type ToolArgs = Record<string, unknown>;

export interface ToolParameterSchema {
  type: 'object';
  properties: Record<string, { type: string; description: string }>;
  required: string[];
}

export interface Tool {
  name: string;
  description: string;
  parameters: ToolParameterSchema;
  invoke(args: ToolArgs): string | Promise<string>;
}

export interface ToolResult {
  success: boolean;
  output: string;
  error?: string;
  errorKind?: ToolErrorKind;
}

export interface AgentStep {
  stepNumber: number;
  thought: string;
  action?: string;
  actionInput?: Record<string, unknown>;
  observation?: string;
  isFinal: boolean;
  finalAnswer?: string;
}

export interface Task {
  id: string;
  description: string;
  assignedAgent?: string;
  status: TaskStatus;
  result?: string;
  dependencies: string[];
  createdAt: Date;
  completedAt?: Date;
}

export interface WorkflowResult {
  id: string;
  success: boolean;
  tasksCompleted: number;
  tasksFailed: number;
  totalTasks: number;
  results: Record<string, string>;
  /**
   * Ids behind `results`, in execution order. Object keys that look like
   * integers enumerate in numeric order, so iterate this instead of the keys.
   */
  completedTaskIds: string[];
  summary: string;
  durationSeconds: number;
}

export interface MemoryItem {
  content: string;
  category: string;
  importance: number;
  timestamp: string;
}

/**
 * What an agent loop needs from memory: a context string to seed prompts
 * and a sink for completed interactions.
 */
export interface MemoryContext {
  remember(content: string, category?: string, importance?: number): void;
  getContext(): string;
  /** Forget the working conversation while keeping long-lived items. */
  clearShortTerm?(): void;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  agentId?: string;
  taskId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface Metric {
  name: string;
  value: number;
  labels: Record<string, string>;
  timestamp: Date;
}
