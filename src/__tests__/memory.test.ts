import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { MemoryFormatError } from '../core/errors';
import { MemoryManager } from '../knowledge/memory/MemoryManager';
import { createTempDir, TempDir } from './test-helpers';

const fixedClock = () => new Date('2024-03-01T12:00:00.000Z');

describe('MemoryManager', () => {
  let memory: MemoryManager;

  beforeEach(() => {
    memory = new MemoryManager({ now: fixedClock });
  });

  it('routes items by importance', () => {
    memory.remember('routine note');
    memory.remember('key fact', 'fact', 0.7);

    expect(memory.items()).toEqual({
      shortTerm: [{ content: 'routine note', category: 'general', importance: 0.5, timestamp: '2024-03-01T12:00:00.000Z' }],
      longTerm: [{ content: 'key fact', category: 'fact', importance: 0.7, timestamp: '2024-03-01T12:00:00.000Z' }],
    });
  });

  it('drops duplicate long-term contents', () => {
    memory.remember('key fact', 'fact', 0.9);
    memory.remember('key fact', 'other', 0.8);

    expect(memory.items().longTerm).toHaveLength(1);
    expect(memory.items().longTerm[0]?.category).toBe('fact');
  });

  it('forgets the oldest short-term items past capacity', () => {
    const small = new MemoryManager({ maxShortTerm: 3 });
    for (const n of [1, 2, 3, 4, 5]) {
      small.remember(`note ${n}`);
    }

    expect(small.items().shortTerm.map(i => i.content)).toEqual(['note 3', 'note 4', 'note 5']);
  });

  it('clamps importance into range', () => {
    memory.remember('too high', 'general', 3);
    memory.remember('too low', 'general', -1);

    expect(memory.items().longTerm[0]?.importance).toBe(1);
    expect(memory.items().shortTerm[0]?.importance).toBe(0);
  });

  it('recalls matches case-insensitively, most important first', () => {
    memory.remember('Paris is in France', 'fact', 0.9);
    memory.remember('paris trip planned', 'general', 0.3);
    memory.remember('Berlin is in Germany', 'fact', 0.8);
    memory.remember('PARIS weather', 'general', 0.6);

    expect(memory.recall('paris').map(i => i.content)).toEqual([
      'Paris is in France',
      'PARIS weather',
      'paris trip planned',
    ]);
    expect(memory.recall('paris', 1)).toHaveLength(1);
    expect(memory.recall('tokyo')).toEqual([]);
  });

  it('builds a context block per tier', () => {
    expect(memory.getContext()).toBe('');

    memory.remember('Task: write a poem', 'task', 0.8);
    memory.remember('User: hi');
    memory.remember('Assistant: hello');

    expect(memory.getContext()).toBe([
      '=== Important Information ===',
      '- Task: write a poem',
      '',
      '=== Recent Conversation ===',
      '- User: hi',
      '- Assistant: hello',
    ].join('\n'));
  });

  it('keeps only the latest five short-term items in context', () => {
    for (const n of [1, 2, 3, 4, 5, 6, 7]) {
      memory.remember(`note ${n}`);
    }

    expect(memory.getContext()).toBe(
      ['=== Recent Conversation ===', '- note 3', '- note 4', '- note 5', '- note 6', '- note 7'].join('\n'),
    );
  });

  it('clears short-term items only', () => {
    memory.remember('key fact', 'fact', 0.9);
    memory.remember('chatter');
    memory.clearShortTerm();

    expect(memory.size).toBe(1);
    memory.clear();
    expect(memory.size).toBe(0);
  });

  describe('persistence', () => {
    let dir: TempDir;

    beforeEach(() => {
      dir = createTempDir();
    });

    afterEach(() => {
      dir.cleanup();
    });

    it('round-trips through a JSON file', () => {
      const file = join(dir.path, 'agents', 'writer.json');
      memory.remember('key fact', 'fact', 0.9);
      memory.remember('chatter');
      memory.save(file);

      const restored = new MemoryManager();
      restored.load(file);

      expect(restored.items()).toEqual(memory.items());
    });

    it('round-trips an empty store', () => {
      const file = join(dir.path, 'empty.json');
      memory.save(file);

      const restored = new MemoryManager();
      restored.load(file);

      expect(restored.items()).toEqual({ shortTerm: [], longTerm: [] });
    });

    it('skips long-term duplicates and keeps the short-term cap when loading', () => {
      const file = join(dir.path, 'shared.json');
      memory.remember('key fact', 'fact', 0.9);
      memory.remember('chatter one');
      memory.remember('chatter two');
      memory.save(file);

      const target = new MemoryManager({ maxShortTerm: 3 });
      target.remember('key fact', 'fact', 0.9);
      target.load(file);
      target.load(file);

      expect(target.items().longTerm.map(i => i.content)).toEqual(['key fact']);
      expect(target.items().shortTerm.map(i => i.content)).toEqual(['chatter two', 'chatter one', 'chatter two']);
    });

    it('ignores a missing file', () => {
      memory.load(join(dir.path, 'absent.json'));
      expect(memory.size).toBe(0);
    });

    it('rejects files that are not memory snapshots', () => {
      const broken = join(dir.path, 'broken.json');
      writeFileSync(broken, '{not json');
      const wrongShape = join(dir.path, 'wrong.json');
      writeFileSync(wrongShape, JSON.stringify({ longTerm: [{ content: 1 }] }));

      expect(() => memory.load(broken)).toThrow(MemoryFormatError);
      expect(() => memory.load(wrongShape)).toThrow(MemoryFormatError);
    });
  });
});
