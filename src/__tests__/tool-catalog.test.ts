import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { Tool } from '../core/types';
import { ToolCatalog } from '../tools/registry/ToolCatalog';
import { createTempDir, TempDir } from './test-helpers';

const echoTool: Tool = {
  name: 'echo',
  description: 'Echo text',
  parameters: {
    type: 'object',
    properties: { text: { type: 'string', description: 'Text to echo' } },
    required: ['text'],
  },
  invoke: (args) => String(args['text']),
};

const noopTool: Tool = {
  name: 'noop',
  description: 'Does nothing',
  parameters: { type: 'object', properties: {}, required: [] },
  invoke: () => '',
};

describe('ToolCatalog', () => {
  it('registers, lists and overwrites tools by name', () => {
    const catalog = new ToolCatalog([echoTool, noopTool]);
    const replacement: Tool = { ...echoTool, description: 'Echo text loudly', invoke: (args) => String(args['text']).toUpperCase() };
    catalog.register(replacement);

    expect(catalog.list()).toEqual(['echo', 'noop']);
    expect(catalog.size).toBe(2);
    expect(catalog.lookup('echo')?.description).toBe('Echo text loudly');
    expect(catalog.unregister('noop')).toBe(true);
    expect(catalog.unregister('noop')).toBe(false);
    expect(catalog.has('noop')).toBe(false);
  });

  it('invokes a tool and stringifies its output', async () => {
    const catalog = new ToolCatalog([echoTool]);
    await expect(catalog.invoke('echo', { text: 'hi' })).resolves.toEqual({ success: true, output: 'hi' });
  });

  it('reports an unknown tool without throwing', async () => {
    const catalog = new ToolCatalog();
    await expect(catalog.invoke('nonexistent', {})).resolves.toEqual({
      success: false,
      output: '',
      error: "Tool 'nonexistent' not found",
      errorKind: 'ToolNotFound',
    });
  });

  it('captures a throwing tool as a failed result', async () => {
    const failing: Tool = { ...noopTool, name: 'boom', invoke: () => { throw new Error('kaput'); } };
    const catalog = new ToolCatalog([failing]);
    const errors: string[] = [];
    catalog.on('tool:error', (event: { name: string }) => errors.push(event.name));

    const result = await catalog.invoke('boom');

    expect(result).toEqual({ success: false, output: '', error: 'kaput', errorKind: 'ToolExecutionError' });
    expect(errors).toEqual(['boom']);
  });

  it('describes tools with their parameters', () => {
    const catalog = new ToolCatalog([echoTool, noopTool]);
    expect(catalog.describe()).toBe([
      'Available Tools:',
      '  - echo: Echo text',
      '    Parameters: text (string): Text to echo',
      '  - noop: Does nothing',
    ].join('\n'));
  });

  it('exports OpenAI function definitions', () => {
    const catalog = new ToolCatalog([noopTool]);
    expect(catalog.toOpenAIFormat()).toEqual([
      { type: 'function', function: { name: 'noop', description: 'Does nothing', parameters: noopTool.parameters } },
    ]);
  });
});

describe('built-in tools', () => {
  let dir: TempDir;
  let catalog: ToolCatalog;

  beforeEach(() => {
    dir = createTempDir();
    catalog = ToolCatalog.withBuiltins({ now: () => new Date(2024, 0, 5, 9, 3, 7), maxReadChars: 5 });
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('ships the default tool set', () => {
    expect(catalog.list()).toEqual([
      'calculator',
      'read_file',
      'write_file',
      'list_directory',
      'get_datetime',
      'web_search',
      'text_analysis',
    ]);
  });

  it('evaluates expressions and reports calculator errors', async () => {
    await expect(catalog.invoke('calculator', { expression: '2 + 2' })).resolves.toEqual({ success: true, output: '2 + 2 = 4' });

    const failed = await catalog.invoke('calculator', { expression: '1/0' });
    expect(failed.errorKind).toBe('ToolExecutionError');
    expect(failed.error).toBe('division by zero');

    const missing = await catalog.invoke('calculator', {});
    expect(missing.error).toBe("Missing required parameter 'expression'");
  });

  it('writes, reads and truncates files', async () => {
    const target = join(dir.path, 'nested', 'out.txt');

    const written = await catalog.invoke('write_file', { filepath: target, content: '0123456789' });
    expect(written.output).toBe(`Successfully wrote 10 characters to ${target}`);
    expect(readFileSync(target, 'utf8')).toBe('0123456789');

    const read = await catalog.invoke('read_file', { filepath: target });
    expect(read.output).toBe('01234\n... (truncated)');
  });

  it('fails to read a missing file', async () => {
    const target = join(dir.path, 'missing.txt');
    const result = await catalog.invoke('read_file', { filepath: target });

    expect(result.success).toBe(false);
    expect(result.error).toBe(`File '${target}' not found`);
  });

  it('lists directories before files', async () => {
    mkdirSync(join(dir.path, 'sub'));
    writeFileSync(join(dir.path, 'a.txt'), 'abc');

    const result = await catalog.invoke('list_directory', { path: dir.path });
    expect(result.output).toBe([`Contents of '${dir.path}':`, '  [DIR]  sub/', '  [FILE] a.txt (3 bytes)'].join('\n'));

    const empty = await catalog.invoke('list_directory', { path: join(dir.path, 'sub') });
    expect(empty.output).toBe(`Directory '${join(dir.path, 'sub')}' is empty`);
  });

  it('formats the current time from the injected clock', async () => {
    await expect(catalog.invoke('get_datetime')).resolves.toEqual({ success: true, output: '2024-01-05 09:03:07' });
  });

  it('analyzes text', async () => {
    const result = await catalog.invoke('text_analysis', { text: 'hello world\nfoo' });
    expect(result.output).toBe('Text Analysis:\n  Characters: 15\n  Words: 3\n  Lines: 2\n  Avg word length: 4.3');
  });

  it('returns setup guidance from the web search placeholder', async () => {
    const result = await catalog.invoke('web_search', { query: 'typescript' });
    expect(result.output.split('\n')[0]).toBe("Search results for 'typescript':");
  });
});
