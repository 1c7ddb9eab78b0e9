/**
 * Japanese kana phonemizer: resolves each note to exactly one oto alias.
 *
 * Resolution runs HintCheck → CandidateResolution → Resolved:
 * 1. A phonetic hint that matches a sample wins outright.
 * 2. Otherwise CV defaults ("- か", "か") are checked; on a miss the lyric
 *    falls back to the bare vowel of its vowel class.
 * 3. With a previous neighbour, VCV candidates ("a か", "* か", ...) go first.
 * 4. No match at all → the lyric text itself is emitted.
 */

import type { LyricNote, PhonemeAttribute, PhonemizerResult, SampleMatch } from '../types/note.js';
import { type KanaTables, getDefaultKanaTables } from './kanaTables.js';
import { buildCandidates, normalizeLyric } from './candidates.js';
import { type OtoLibrary, type OtoRequest, collectOtoHits, pickOtoHit } from './otoResolver.js';

export type ResolutionState = 'HintCheck' | 'CandidateResolution' | 'Resolved';

export interface ResolutionStep {
  state: ResolutionState;
  candidates: string[];
  hits: SampleMatch[];
  chosen?: SampleMatch;
}

export interface ResolutionTrace {
  phoneme: string;
  source: 'hint' | 'oto' | 'lyric';
  substituted: boolean;
  vowel?: string;
  steps: ResolutionStep[];
}

/** Index-0 attribute of a note, with empty/zero defaults. */
export function resolveAttributes(note: LyricNote): OtoRequest {
  const attr: PhonemeAttribute | undefined = note.phonemeAttributes?.find(a => a.index === 0);
  return {
    tone: note.tone,
    toneShift: attr?.toneShift ?? 0,
    color: attr?.voiceColor ?? '',
    alternate: attr?.alternate === undefined ? '' : String(attr.alternate),
  };
}

export class SubstitutorPhonemizer {
  private singer: OtoLibrary;
  private readonly tables: KanaTables;

  constructor(singer: OtoLibrary, tables: KanaTables = getDefaultKanaTables()) {
    this.singer = singer;
    this.tables = tables;
  }

  setSinger(singer: OtoLibrary): void {
    this.singer = singer;
  }

  process(note: LyricNote, prevNeighbour?: LyricNote): PhonemizerResult {
    return { phonemes: [{ phoneme: this.trace(note, prevNeighbour).phoneme }] };
  }

  trace(note: LyricNote, prevNeighbour?: LyricNote): ResolutionTrace {
    const request = resolveAttributes(note);
    const steps: ResolutionStep[] = [];
    const probe = (state: ResolutionState, candidates: string[]): SampleMatch | undefined => {
      const hits = collectOtoHits(this.singer, candidates, request);
      const chosen = pickOtoHit(hits, request.color);
      steps.push({ state, candidates, hits, chosen });
      return chosen;
    };

    const lyric = normalizeLyric(note.lyric);

    if (note.phoneticHint) {
      const hit = probe('HintCheck', [normalizeLyric(note.phoneticHint)]);
      if (hit) {
        return { phoneme: hit.alias, source: 'hint', substituted: false, steps };
      }
    }

    const set = buildCandidates(lyric, prevNeighbour, this.tables,
      candidates => probe('CandidateResolution', [...candidates]) !== undefined);
    const hit = probe('Resolved', set.candidates);

    return {
      phoneme: hit ? hit.alias : set.lyric,
      source: hit ? 'oto' : 'lyric',
      substituted: set.substituted,
      vowel: set.vowel,
      steps,
    };
  }
}
