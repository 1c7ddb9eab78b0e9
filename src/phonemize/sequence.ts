/** Phonemize a note sequence, pairing each note with its previous neighbour. */

import type { LyricNote } from '../types/note.js';
import type { ResolutionTrace, SubstitutorPhonemizer } from './substitutor.js';

export interface SequenceResult {
  phonemes: string[];
  traces: ResolutionTrace[];
  warnings: string[];
}

/**
 * The previous note counts as a neighbour only when it ends exactly where
 * this note starts. Without both positions and the previous duration, list
 * adjacency is enough.
 */
export function findPrevNeighbour(notes: readonly LyricNote[], index: number): LyricNote | undefined {
  if (index <= 0 || index >= notes.length) return undefined;
  const prev = notes[index - 1];
  const note = notes[index];
  if (prev.position === undefined || prev.duration === undefined || note.position === undefined) return prev;
  return prev.position + prev.duration === note.position ? prev : undefined;
}

export function phonemizeNotes(phonemizer: SubstitutorPhonemizer, notes: readonly LyricNote[]): SequenceResult {
  const phonemes: string[] = [];
  const traces: ResolutionTrace[] = [];
  const warnings: string[] = [];

  notes.forEach((note, i) => {
    const trace = phonemizer.trace(note, findPrevNeighbour(notes, i));
    if (trace.source === 'lyric') {
      warnings.push(`Note ${i} ("${note.lyric}"): no oto matched, using lyric "${trace.phoneme}"`);
    }
    phonemes.push(trace.phoneme);
    traces.push(trace);
  });

  return { phonemes, traces, warnings };
}
