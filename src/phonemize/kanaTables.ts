/** Kana classification tables: glyph → trailing vowel, leading consonant, bare-vowel substitute. */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Declarative source lines, one class per line: `class=g1,g2,...`.
 * Each table is inverted into glyph → class when built.
 */
export const KanaTableSourceSchema = z.object({
  vowels: z.array(z.string()),
  consonants: z.array(z.string()),
  substitutes: z.array(z.string()),
});

export type KanaTableSource = z.infer<typeof KanaTableSourceSchema>;

export interface KanaTables {
  readonly vowels: ReadonlyMap<string, string>;
  readonly consonants: ReadonlyMap<string, string>;
  readonly substitutes: ReadonlyMap<string, string>;
}

const DEFAULT_TABLES_URL = new URL('../../data/kana-tables.json', import.meta.url);

/**
 * Invert `class=g1,g2,...` lines into a glyph → class map.
 * Later lines overwrite earlier ones on a repeated glyph; empty glyphs
 * (a trailing comma) are skipped.
 */
export function invertTableLines(lines: readonly string[]): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const line of lines) {
    const eq = line.indexOf('=');
    if (eq < 0) continue;
    const cls = line.slice(0, eq);
    for (const glyph of line.slice(eq + 1).split(',')) {
      if (glyph.length === 0) continue;
      lookup.set(glyph, cls);
    }
  }
  return lookup;
}

/** Build an immutable table set from declarative lines. */
export function buildKanaTables(source: KanaTableSource): KanaTables {
  return Object.freeze({
    vowels: invertTableLines(source.vowels),
    consonants: invertTableLines(source.consonants),
    substitutes: invertTableLines(source.substitutes),
  });
}

let defaultSource: KanaTableSource | undefined;
let defaultTables: KanaTables | undefined;

/** The built-in Japanese table lines, read from data/kana-tables.json on first use. */
export function getDefaultKanaTableSource(): KanaTableSource {
  if (!defaultSource) {
    const raw = JSON.parse(readFileSync(DEFAULT_TABLES_URL, 'utf-8'));
    defaultSource = KanaTableSourceSchema.parse(raw);
  }
  return defaultSource;
}

export function getDefaultKanaTables(): KanaTables {
  if (!defaultTables) defaultTables = buildKanaTables(getDefaultKanaTableSource());
  return defaultTables;
}

/** Built-in tables with whole tables replaced by the given lines. */
export function extendDefaultKanaTables(overrides: Partial<KanaTableSource>): KanaTables {
  if (!overrides.vowels && !overrides.consonants && !overrides.substitutes) return getDefaultKanaTables();
  return buildKanaTables({ ...getDefaultKanaTableSource(), ...overrides });
}

export function classifyVowel(glyph: string, tables: KanaTables = getDefaultKanaTables()): string | undefined {
  return tables.vowels.get(glyph);
}

/** Consonant class of a glyph or small-kana cluster, e.g. "きゃ" → "k". */
export function classifyConsonant(cluster: string, tables: KanaTables = getDefaultKanaTables()): string | undefined {
  return tables.consonants.get(cluster);
}

/** Romanized substitute of a bare-vowel kana, e.g. "あ" → "a". */
export function substituteBareVowel(glyph: string, tables: KanaTables = getDefaultKanaTables()): string | undefined {
  return tables.substitutes.get(glyph);
}
