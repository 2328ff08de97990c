import { existsSync, mkdirSync, readFileSync, readdirSync, statSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { Tool, ToolArgs } from '../../core/types';
import { calculate } from './calculator';

export interface BuiltinToolOptions {
  /** Clock used by get_datetime. */
  now?: () => Date;
  /** Characters returned by read_file before truncation. */
  maxReadChars?: number;
}

function stringArg(args: ToolArgs, key: string, fallback?: string): string {
  const value = args[key];
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback;
    throw new Error(`Missing required parameter '${key}'`);
  }
  return String(value);
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatDateTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function analyzeText(text: string): string {
  const words = text.split(/\s+/).filter(Boolean);
  const lines = text.split('\n');
  const avg = words.reduce((sum, w) => sum + w.length, 0) / Math.max(words.length, 1);

  return [
    'Text Analysis:',
    `  Characters: ${text.length}`,
    `  Words: ${words.length}`,
    `  Lines: ${lines.length}`,
    `  Avg word length: ${avg.toFixed(1)}`,
  ].join('\n');
}

export function createBuiltinTools(options: BuiltinToolOptions = {}): Tool[] {
  const now = options.now ?? (() => new Date());
  const maxReadChars = options.maxReadChars ?? 5000;

  return [
    {
      name: 'calculator',
      description: 'Calculate mathematical expressions. Supports +, -, *, /, %, **, sqrt, sin, cos, etc.',
      parameters: {
        type: 'object',
        properties: {
          expression: { type: 'string', description: "Math expression to evaluate, e.g., '2 + 2' or 'sqrt(16)'" },
        },
        required: ['expression'],
      },
      invoke: (args) => calculate(stringArg(args, 'expression')),
    },
    {
      name: 'read_file',
      description: 'Read the contents of a file',
      parameters: {
        type: 'object',
        properties: {
          filepath: { type: 'string', description: 'Path to the file to read' },
        },
        required: ['filepath'],
      },
      invoke: (args) => {
        const filepath = stringArg(args, 'filepath');
        if (!existsSync(filepath)) {
          throw new Error(`File '${filepath}' not found`);
        }
        const content = readFileSync(filepath, 'utf8');
        return content.length > maxReadChars
          ? content.slice(0, maxReadChars) + '\n... (truncated)'
          : content;
      },
    },
    {
      name: 'write_file',
      description: 'Write content to a file',
      parameters: {
        type: 'object',
        properties: {
          filepath: { type: 'string', description: 'Path to the file to write' },
          content: { type: 'string', description: 'Content to write to the file' },
        },
        required: ['filepath', 'content'],
      },
      invoke: (args) => {
        const filepath = stringArg(args, 'filepath');
        const content = stringArg(args, 'content');
        mkdirSync(dirname(filepath), { recursive: true });
        writeFileSync(filepath, content, 'utf8');
        return `Successfully wrote ${content.length} characters to ${filepath}`;
      },
    },
    {
      name: 'list_directory',
      description: 'List files and folders in a directory',
      parameters: {
        type: 'object',
        properties: {
          path: { type: 'string', description: 'Directory path to list' },
        },
        required: [],
      },
      invoke: (args) => {
        const path = stringArg(args, 'path', '.');
        const items = readdirSync(path).sort();
        if (items.length === 0) {
          return `Directory '${path}' is empty`;
        }

        const dirs: string[] = [];
        const files: string[] = [];
        for (const item of items) {
          const stats = statSync(join(path, item));
          if (stats.isDirectory()) dirs.push(`  [DIR]  ${item}/`);
          else files.push(`  [FILE] ${item} (${stats.size} bytes)`);
        }
        return [`Contents of '${path}':`, ...dirs, ...files].join('\n');
      },
    },
    {
      name: 'get_datetime',
      description: 'Get current date and time',
      parameters: { type: 'object', properties: {}, required: [] },
      invoke: () => formatDateTime(now()),
    },
    {
      name: 'web_search',
      description: 'Search the web for information',
      parameters: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'Search query' },
        },
        required: ['query'],
      },
      // Placeholder until a search provider is registered under the same name.
      invoke: (args) => [
        `Search results for '${stringArg(args, 'query')}':`,
        'Note: Web search requires API setup.',
        'Register a web_search tool backed by a search provider to enable it.',
      ].join('\n'),
    },
    {
      name: 'text_analysis',
      description: 'Analyze text - count words, characters, lines',
      parameters: {
        type: 'object',
        properties: {
          text: { type: 'string', description: 'Text to analyze' },
        },
        required: ['text'],
      },
      invoke: (args) => analyzeText(stringArg(args, 'text')),
    },
  ];
}
