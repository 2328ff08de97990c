import { Tool, ToolArgs, ToolResult } from '../../core/types';
import { ToolExecutionError, ToolNotFoundError } from '../../core/errors';
import { EventEmitter } from 'events';
import { createBuiltinTools, BuiltinToolOptions } from '../builtin';

export interface OpenAIFunctionTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Tool['parameters'];
  };
}

export class ToolCatalog extends EventEmitter {
  private tools: Map<string, Tool> = new Map();

  constructor(tools: Tool[] = []) {
    super();
    for (const tool of tools) {
      this.register(tool);
    }
  }

  static withBuiltins(options: BuiltinToolOptions = {}): ToolCatalog {
    return new ToolCatalog(createBuiltinTools(options));
  }

  register(tool: Tool): void {
    // Map keeps the original insertion slot on overwrite, so display order
    // stays stable while the new definition wins.
    this.tools.set(tool.name, tool);
    this.emit('tool:registered', tool.name);
  }

  unregister(name: string): boolean {
    const removed = this.tools.delete(name);
    if (removed) {
      this.emit('tool:unregistered', name);
    }
    return removed;
  }

  lookup(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  list(): string[] {
    return Array.from(this.tools.keys());
  }

  async invoke(name: string, args: ToolArgs = {}): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      const error = new ToolNotFoundError(name);
      return { success: false, output: '', error: error.message, errorKind: 'ToolNotFound' };
    }

    try {
      const output = await tool.invoke(args);
      return { success: true, output: String(output) };
    } catch (cause) {
      const error = new ToolExecutionError(name, cause);
      this.emit('tool:error', { name, error });
      return { success: false, output: '', error: error.message, errorKind: 'ToolExecutionError' };
    }
  }

  describe(): string {
    const lines = ['Available Tools:'];
    for (const tool of this.tools.values()) {
      lines.push(`  - ${tool.name}: ${tool.description}`);
      const params = Object.entries(tool.parameters.properties);
      if (params.length > 0) {
        lines.push('    Parameters: ' + params.map(([key, spec]) => `${key} (${spec.type}): ${spec.description}`).join('; '));
      }
    }
    return lines.join('\n');
  }

  toOpenAIFormat(): OpenAIFunctionTool[] {
    return Array.from(this.tools.values()).map(tool => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
  }
}
