/** Alias candidate construction: CV defaults, bare-vowel substitution, VCV prefixing. */

import type { LyricNote } from '../types/note.js';
import { type KanaTables, classifyVowel, substituteBareVowel } from './kanaTables.js';

/** Alias prefix for a syllable sung at the start of a phrase. */
export const PHRASE_START_PREFIX = '- ';
/** Alias prefix for a syllable following any vowel. */
export const ANY_VOWEL_PREFIX = '* ';

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

export function normalizeLyric(text: string): string {
  return text.normalize('NFC');
}

/** Split text into user-perceived characters. */
export function toGraphemes(text: string): string[] {
  return Array.from(graphemeSegmenter.segment(text), s => s.segment);
}

export function lastGrapheme(text: string): string | undefined {
  const graphemes = toGraphemes(text);
  return graphemes[graphemes.length - 1];
}

/** Vowel class of the last grapheme, e.g. "a" for "きゃ" (from "ゃ"). */
export function trailingVowel(text: string, tables: KanaTables): string | undefined {
  const last = lastGrapheme(text);
  return last === undefined ? undefined : classifyVowel(last, tables);
}

/** The note's hint when it has one, else its lyric. */
export function effectiveLyric(note: LyricNote): string {
  return normalizeLyric(note.phoneticHint ? note.phoneticHint : note.lyric);
}

/**
 * Substitute for a lyric whose CV aliases are missing: the last grapheme of
 * its vowel class, looked up in the substitute table.
 */
export function bareVowelSubstitute(lyric: string, tables: KanaTables): string | undefined {
  const vowel = trailingVowel(lyric, tables);
  if (vowel === undefined) return undefined;
  const last = lastGrapheme(vowel);
  if (last === undefined) return undefined;
  const sub = substituteBareVowel(last, tables);
  return sub === undefined ? undefined : normalizeLyric(sub);
}

export function defaultCandidates(lyric: string): string[] {
  return [`${PHRASE_START_PREFIX}${lyric}`, lyric];
}

export function vcvCandidates(vowel: string, lyric: string): string[] {
  return [`${vowel} ${lyric}`, `${ANY_VOWEL_PREFIX}${lyric}`, lyric, `${PHRASE_START_PREFIX}${lyric}`];
}

export interface CandidateSet {
  lyric: string;        // current lyric after substitution
  candidates: string[]; // probe order, never empty
  vowel?: string;       // previous neighbour's trailing vowel when VCV applied
  substituted: boolean;
}

/**
 * Build the ordered probe list for a note. `hasHit` checks whether the
 * plain defaults already resolve; only then is substitution skipped.
 */
export function buildCandidates(
  lyric: string,
  prevNeighbour: LyricNote | undefined,
  tables: KanaTables,
  hasHit: (candidates: readonly string[]) => boolean,
): CandidateSet {
  let current = lyric;
  let candidates = defaultCandidates(current);
  let substituted = false;

  if (!hasHit(candidates)) {
    const sub = bareVowelSubstitute(current, tables);
    if (sub !== undefined) {
      current = sub;
      candidates = defaultCandidates(current);
      substituted = true;
    }
  }

  if (prevNeighbour) {
    const vowel = trailingVowel(effectiveLyric(prevNeighbour), tables);
    if (vowel !== undefined) {
      return { lyric: current, candidates: vcvCandidates(vowel, current), vowel, substituted };
    }
  }

  return { lyric: current, candidates, substituted };
}
