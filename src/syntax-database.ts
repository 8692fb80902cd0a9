/**
 * Syntax Database - Loads and indexes dialect pattern descriptors
 *
 * Descriptor files are loaded in lexicographic filename order and their
 * patterns in declaration order. A pattern's rank is its explicit
 * `priority` when declared, otherwise its declaration index; equal ranks
 * are ordered by declaration index. Two patterns of the same
 * dialect+category may not share a rank.
 *
 * The database is frozen after construction.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { RuleKind } from './types';
import type { Matcher, SyntaxDatabaseOptions, SyntaxPattern, Template } from './types';
import { LoadError, errorMessage } from './errors';
import { compileMatcher, compileTemplate } from './pattern-matcher';

export const DEFAULT_DATABASE_OPTIONS: SyntaxDatabaseOptions = {
  canonicalDialect: 'brave',
  commentMarker: '!'
};

const matcherSchema = z
  .object({
    type: z.enum(['regex', 'token', 'prefix', 'glob']),
    expression: z.string().min(1),
    ignoreCase: z.boolean().optional()
  })
  .strict();

const patternSchema = z
  .object({
    name: z.string().min(1),
    dialect: z.string().min(1).optional(),
    category: z.string().min(1),
    kinds: z.array(z.nativeEnum(RuleKind)).min(1).optional(),
    matcher: matcherSchema,
    template: z.string().min(1).optional(),
    priority: z.number().int().nonnegative().optional(),
    notes: z.string().optional()
  })
  .strict();

const descriptorFileSchema = z
  .object({
    dialect: z.string().min(1).optional(),
    patterns: z.array(patternSchema)
  })
  .strict();

export type PatternDescriptor = z.infer<typeof patternSchema>;
export type DescriptorFile = z.infer<typeof descriptorFileSchema>;

export interface DescriptorSource {
  fileName: string;
  content: unknown;
}

/** Structured-clone-safe form used to rebuild the database in a worker */
export interface SyntaxDatabaseSnapshot {
  files: Array<{ fileName: string; descriptor: DescriptorFile }>;
  options: SyntaxDatabaseOptions;
}

export class SyntaxDatabase {
  readonly canonicalDialect: string;
  readonly commentMarker: string;

  private readonly patterns: readonly SyntaxPattern[];
  private readonly byKind: ReadonlyMap<RuleKind, readonly SyntaxPattern[]>;
  private readonly byId: ReadonlyMap<string, SyntaxPattern>;
  private readonly files: SyntaxDatabaseSnapshot['files'];

  private constructor(
    files: SyntaxDatabaseSnapshot['files'],
    options: SyntaxDatabaseOptions
  ) {
    this.canonicalDialect = options.canonicalDialect;
    this.commentMarker = options.commentMarker;
    this.files = files;

    const compiled = compileAll(files);
    this.patterns = Object.freeze(compiled);

    const byId = new Map<string, SyntaxPattern>();
    for (const pattern of compiled) {
      byId.set(pattern.id, pattern);
    }
    this.byId = byId;

    const byKind = new Map<RuleKind, readonly SyntaxPattern[]>();
    for (const kind of Object.values(RuleKind)) {
      byKind.set(kind, Object.freeze(compiled.filter(p => p.kinds.includes(kind))));
    }
    this.byKind = byKind;

    Object.freeze(this);
  }

  /**
   * Load every `*.json` descriptor file in a directory
   */
  static load(directory: string, options: Partial<SyntaxDatabaseOptions> = {}): SyntaxDatabase {
    let stats: fs.Stats;
    try {
      stats = fs.statSync(directory);
    } catch {
      throw new LoadError(`Syntax pattern directory not found: ${directory}`);
    }
    if (!stats.isDirectory()) {
      throw new LoadError(`Syntax pattern path is not a directory: ${directory}`);
    }

    const fileNames = fs
      .readdirSync(directory)
      .filter(name => name.endsWith('.json'))
      .sort();

    const sources: DescriptorSource[] = fileNames.map((fileName) => {
      const filePath = path.join(directory, fileName);
      let text: string;
      try {
        text = fs.readFileSync(filePath, 'utf-8');
      } catch (error) {
        throw new LoadError(`Cannot read ${filePath}: ${errorMessage(error)}`);
      }
      try {
        const content: unknown = JSON.parse(text);
        return { fileName, content };
      } catch (error) {
        throw new LoadError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`);
      }
    });

    return SyntaxDatabase.fromDescriptors(sources, options);
  }

  /**
   * Build from in-memory descriptor files, in the order given
   */
  static fromDescriptors(
    sources: DescriptorSource[],
    options: Partial<SyntaxDatabaseOptions> = {}
  ): SyntaxDatabase {
    const files = sources.map(({ fileName, content }) => {
      const parsed = descriptorFileSchema.safeParse(content);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        throw new LoadError(`Malformed descriptor file ${fileName}: ${issues}`);
      }
      return { fileName, descriptor: parsed.data };
    });

    return new SyntaxDatabase(files, {
      canonicalDialect: options.canonicalDialect ?? DEFAULT_DATABASE_OPTIONS.canonicalDialect,
      commentMarker: options.commentMarker ?? DEFAULT_DATABASE_OPTIONS.commentMarker
    });
  }

  static fromSnapshot(snapshot: SyntaxDatabaseSnapshot): SyntaxDatabase {
    return SyntaxDatabase.fromDescriptors(
      snapshot.files.map(file => ({ fileName: file.fileName, content: file.descriptor })),
      snapshot.options
    );
  }

  toSnapshot(): SyntaxDatabaseSnapshot {
    return {
      files: this.files,
      options: {
        canonicalDialect: this.canonicalDialect,
        commentMarker: this.commentMarker
      }
    };
  }

  /**
   * Patterns applicable to a record kind, in priority order
   */
  matchersFor(kind: RuleKind): readonly SyntaxPattern[] {
    return this.byKind.get(kind) ?? [];
  }

  patternById(id: string): SyntaxPattern | undefined {
    return this.byId.get(id);
  }

  all(): readonly SyntaxPattern[] {
    return this.patterns;
  }

  get size(): number {
    return this.patterns.length;
  }

  isCanonical(pattern: SyntaxPattern): boolean {
    return pattern.dialect === this.canonicalDialect;
  }
}

function compileAll(files: SyntaxDatabaseSnapshot['files']): SyntaxPattern[] {
  const patterns: SyntaxPattern[] = [];
  const ids = new Set<string>();
  // dialect+category -> rank -> pattern id
  const ranks = new Map<string, Map<number, string>>();
  let order = 0;

  for (const { fileName, descriptor } of files) {
    for (const entry of descriptor.patterns) {
      const dialect = entry.dialect ?? descriptor.dialect;
      if (!dialect) {
        throw new LoadError(`Pattern '${entry.name}' in ${fileName} declares no dialect`);
      }

      const id = `${dialect}/${entry.name}`;
      if (ids.has(id)) {
        throw new LoadError(`Duplicate pattern '${id}' in ${fileName}`);
      }
      ids.add(id);

      const priority = entry.priority ?? order;
      const pairKey = `${dialect}\u0000${entry.category}`;
      const pairRanks = ranks.get(pairKey) ?? new Map<number, string>();
      const holder = pairRanks.get(priority);
      if (holder !== undefined) {
        throw new LoadError(
          `Conflicting priority ${priority} for ${dialect}/${entry.category}: '${holder}' and '${id}' (${fileName})`
        );
      }
      pairRanks.set(priority, id);
      ranks.set(pairKey, pairRanks);

      patterns.push(Object.freeze(compileEntry(entry, id, dialect, priority, order, fileName)));
      order++;
    }
  }

  return patterns.sort((a, b) => a.priority - b.priority || a.order - b.order);
}

function compileEntry(
  entry: PatternDescriptor,
  id: string,
  dialect: string,
  priority: number,
  order: number,
  fileName: string
): SyntaxPattern {
  let matcher: Matcher;
  try {
    matcher = compileMatcher(entry.matcher.type, entry.matcher.expression, entry.matcher.ignoreCase);
  } catch (error) {
    throw new LoadError(`Invalid ${entry.matcher.type} matcher in pattern '${id}' (${fileName}): ${errorMessage(error)}`);
  }

  let template: Template | undefined;
  if (entry.template !== undefined) {
    try {
      template = compileTemplate(entry.template);
    } catch (error) {
      throw new LoadError(`Invalid template in pattern '${id}' (${fileName}): ${errorMessage(error)}`);
    }
  }

  return {
    id,
    name: entry.name,
    dialect,
    category: entry.category,
    kinds: Object.freeze(entry.kinds ?? [RuleKind.RULE]),
    matcher,
    template,
    priority,
    order,
    notes: entry.notes,
    sourceFile: fileName
  };
}
