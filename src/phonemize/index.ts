/** Public API: kana lyric notes → oto aliases. */

export {
  KanaTableSourceSchema,
  buildKanaTables,
  getDefaultKanaTables,
  getDefaultKanaTableSource,
  extendDefaultKanaTables,
  invertTableLines,
  classifyVowel,
  classifyConsonant,
  substituteBareVowel,
} from './kanaTables.js';
export type { KanaTables, KanaTableSource } from './kanaTables.js';
export {
  PHRASE_START_PREFIX,
  ANY_VOWEL_PREFIX,
  normalizeLyric,
  toGraphemes,
  lastGrapheme,
  trailingVowel,
  effectiveLyric,
  bareVowelSubstitute,
  defaultCandidates,
  vcvCandidates,
  buildCandidates,
} from './candidates.js';
export type { CandidateSet } from './candidates.js';
export { collectOtoHits, pickOtoHit, resolveOto } from './otoResolver.js';
export type { OtoLibrary, OtoRequest } from './otoResolver.js';
export { SubstitutorPhonemizer, resolveAttributes } from './substitutor.js';
export type { ResolutionState, ResolutionStep, ResolutionTrace } from './substitutor.js';
export { findPrevNeighbour, phonemizeNotes } from './sequence.js';
export type { SequenceResult } from './sequence.js';
export type { LyricNote, PhonemeAttribute, Phoneme, PhonemizerResult, SampleMatch } from '../types/note.js';
