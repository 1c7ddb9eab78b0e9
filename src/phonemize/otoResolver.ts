/** Probe a voicebank with ordered alias candidates and pick one sample by voice color. */

import type { SampleMatch } from '../types/note.js';

/** The singer's mapped oto lookup: exact, case-sensitive alias match. */
export interface OtoLibrary {
  tryGetMappedOto(alias: string, tone: number, color: string): SampleMatch | undefined;
}

export interface OtoRequest {
  tone: number;
  toneShift: number;
  color: string;      // "" when the note has no voice color
  alternate: string;  // "" when the note has no alternate tag
}

/**
 * Probe every candidate, most specific first. Per candidate the
 * alternate-tagged alias wins over the plain one; at most one hit each.
 * Scanning never stops early so the color tie-break sees all hits.
 */
export function collectOtoHits(library: OtoLibrary, candidates: readonly string[], request: OtoRequest): SampleMatch[] {
  const pitch = request.tone + request.toneShift;
  const hits: SampleMatch[] = [];
  for (const candidate of candidates) {
    const hit = library.tryGetMappedOto(candidate + request.alternate, pitch, request.color)
      ?? library.tryGetMappedOto(candidate, pitch, request.color);
    if (hit) hits.push(hit);
  }
  return hits;
}

/**
 * First hit whose color equals the requested one (absent counts as ""),
 * else the first hit overall.
 */
export function pickOtoHit(hits: readonly SampleMatch[], color: string): SampleMatch | undefined {
  return hits.find(hit => (hit.color ?? '') === color) ?? hits[0];
}

export function resolveOto(library: OtoLibrary, candidates: readonly string[], request: OtoRequest): SampleMatch | undefined {
  return pickOtoHit(collectOtoHits(library, candidates, request), request.color);
}
