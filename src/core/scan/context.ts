import { join } from 'node:path';

import { Logger, silentLogger } from '../../utils/logger.js';
import { readText } from '../../utils/fs.js';
import { parseSource, type ParsedSource } from '../detect/syntax.js';

export interface RunContextOptions {
  root: string;
  logger?: Logger;
}

/**
 * Per-run state shared by the stages: file text and parse caches keyed by tree-relative path.
 * The apply engine invalidates entries it rewrites. Discard the context when the run ends.
 */
export class RunContext {
  readonly root: string;
  readonly logger: Logger;
  private readonly texts = new Map<string, string>();
  private readonly parsed = new Map<string, ParsedSource | null>();

  constructor(opts: RunContextOptions) {
    this.root = opts.root;
    this.logger = opts.logger ?? silentLogger;
  }

  absPath(file: string): string {
    return join(this.root, file);
  }

  async read(file: string): Promise<string> {
    const cached = this.texts.get(file);
    if (cached !== undefined) return cached;
    const text = await readText(this.absPath(file));
    this.texts.set(file, text);
    return text;
  }

  async parse(file: string): Promise<ParsedSource | null> {
    if (this.parsed.has(file)) return this.parsed.get(file) ?? null;
    const text = await this.read(file);
    const parsed = parseSource(file, text);
    this.parsed.set(file, parsed);
    return parsed;
  }

  invalidate(file: string): void {
    this.texts.delete(file);
    this.parsed.delete(file);
  }

  /** Context over a different root (e.g. an isolated copy of the tree), sharing the logger. */
  fork(root: string): RunContext {
    return new RunContext({ root, logger: this.logger });
  }
}
