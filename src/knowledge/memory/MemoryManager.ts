import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { MemoryContext, MemoryItem } from '../../core/types';
import { MemoryFormatError, errorMessage } from '../../core/errors';

export const LONG_TERM_THRESHOLD = 0.7;

export interface MemoryManagerOptions {
  maxShortTerm?: number;
  /** Clock used to stamp new items. */
  now?: () => Date;
}

const memoryItemSchema = z.object({
  content: z.string(),
  category: z.string(),
  importance: z.number().min(0).max(1),
  timestamp: z.string(),
});

const memoryFileSchema = z.object({
  shortTerm: z.array(memoryItemSchema).default([]),
  longTerm: z.array(memoryItemSchema).default([]),
});

export type MemorySnapshot = z.infer<typeof memoryFileSchema>;

function clampImportance(importance: number): number {
  if (Number.isNaN(importance)) return 0.5;
  return Math.min(1, Math.max(0, importance));
}

/**
 * Two-tier agent memory. Items at or above LONG_TERM_THRESHOLD importance are
 * kept in long-term memory, where exact duplicate contents are dropped; the
 * rest go to a bounded short-term buffer that forgets its oldest entries.
 */
export class MemoryManager implements MemoryContext {
  private shortTerm: MemoryItem[] = [];
  private longTerm: MemoryItem[] = [];
  private maxShortTerm: number;
  private now: () => Date;

  constructor(options: MemoryManagerOptions = {}) {
    this.maxShortTerm = options.maxShortTerm ?? 50;
    this.now = options.now ?? (() => new Date());
  }

  remember(content: string, category: string = 'general', importance: number = 0.5): void {
    const item: MemoryItem = {
      content,
      category,
      importance: clampImportance(importance),
      timestamp: this.now().toISOString(),
    };

    this.store(item);
  }

  recall(query: string, limit: number = 5): MemoryItem[] {
    const needle = query.toLowerCase();
    const seen = new Set<string>();
    const matches: MemoryItem[] = [];

    for (const item of [...this.longTerm, ...this.shortTerm]) {
      if (!item.content.toLowerCase().includes(needle) || seen.has(item.content)) continue;
      seen.add(item.content);
      matches.push(item);
    }

    // Array#sort is stable, so equal importance keeps long-term-first order.
    return matches.sort((a, b) => b.importance - a.importance).slice(0, limit);
  }

  getContext(): string {
    const blocks: string[] = [];

    if (this.longTerm.length > 0) {
      blocks.push(['=== Important Information ===', ...this.longTerm.slice(-10).map(i => `- ${i.content}`)].join('\n'));
    }
    if (this.shortTerm.length > 0) {
      blocks.push(['=== Recent Conversation ===', ...this.shortTerm.slice(-5).map(i => `- ${i.content}`)].join('\n'));
    }

    return blocks.join('\n\n');
  }

  items(): MemorySnapshot {
    return {
      shortTerm: this.shortTerm.map(i => ({ ...i })),
      longTerm: this.longTerm.map(i => ({ ...i })),
    };
  }

  get size(): number {
    return this.shortTerm.length + this.longTerm.length;
  }

  save(filepath: string): void {
    mkdirSync(dirname(filepath), { recursive: true });
    writeFileSync(filepath, JSON.stringify(this.items(), null, 2), 'utf8');
  }

  /**
   * Merges the items stored at `filepath` under the same rules as `remember`:
   * long-term duplicates are skipped and short-term stays capped. Each item
   * keeps the tier it was saved in. A missing file is a no-op.
   */
  load(filepath: string): void {
    if (!existsSync(filepath)) return;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filepath, 'utf8'));
    } catch (error) {
      throw new MemoryFormatError(`Cannot read memory file ${filepath}: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = memoryFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MemoryFormatError(`Invalid memory file ${filepath}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }

    for (const item of parsed.data.longTerm) {
      this.storeLongTerm(item);
    }
    for (const item of parsed.data.shortTerm) {
      this.storeShortTerm(item);
    }
  }

  clearShortTerm(): void {
    this.shortTerm = [];
  }

  clear(): void {
    this.shortTerm = [];
    this.longTerm = [];
  }

  private store(item: MemoryItem): void {
    if (item.importance >= LONG_TERM_THRESHOLD) {
      this.storeLongTerm(item);
    } else {
      this.storeShortTerm(item);
    }
  }

  private storeLongTerm(item: MemoryItem): void {
    if (!this.longTerm.some(existing => existing.content === item.content)) {
      this.longTerm.push(item);
    }
  }

  private storeShortTerm(item: MemoryItem): void {
    this.shortTerm.push(item);
    if (this.shortTerm.length > this.maxShortTerm) {
      this.shortTerm.shift();
    }
  }
}
