/** In-memory mapped oto lookup: subbank prefix/suffix by color and tone, then bare alias. */

import type { OtoLibrary } from '../phonemize/otoResolver.js';
import type { SampleMatch } from '../types/note.js';
import { SubbankSchema, type OtoEntry, type Subbank, type SubbankInput } from './schema.js';

const NOTE_OFFSETS: Record<string, number> = {
  C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11,
};

/** "C4" → 60, "A#3" → 58, "Db4" → 61. Returns null for anything else. */
export function noteNameToTone(name: string): number | null {
  const m = /^([A-G])(#|b)?(\d)$/.exec(name.trim());
  if (!m) return null;
  const accidental = m[2] === '#' ? 1 : m[2] === 'b' ? -1 : 0;
  return (Number(m[3]) + 1) * 12 + NOTE_OFFSETS[m[1]] + accidental;
}

/** Expand tone range specs into a set of MIDI numbers. */
export function parseToneRanges(ranges: readonly (number | string)[]): Set<number> {
  const tones = new Set<number>();
  for (const range of ranges) {
    if (typeof range === 'number') {
      tones.add(range);
      continue;
    }
    const [lowName, highName = lowName] = range.split('-');
    const low = noteNameToTone(lowName);
    const high = noteNameToTone(highName);
    if (low === null || high === null) {
      throw new Error(`Invalid tone range "${range}"`);
    }
    for (let t = low; t <= high; t++) tones.add(t);
  }
  return tones;
}

function toMatch(oto: OtoEntry, color: string | undefined): SampleMatch {
  return color ? { alias: oto.alias, color } : { alias: oto.alias };
}

interface MappedSubbank extends Subbank {
  tones: Set<number> | null; // null = every tone
}

export interface OtoLibraryDefinition {
  subbanks?: SubbankInput[];
  otos: OtoEntry[];
}

export class MappedOtoLibrary implements OtoLibrary {
  private readonly subbanks: MappedSubbank[];
  private readonly otos = new Map<string, OtoEntry>();

  constructor(def: OtoLibraryDefinition) {
    this.subbanks = (def.subbanks ?? []).map(input => {
      const subbank = SubbankSchema.parse(input);
      return {
        ...subbank,
        tones: subbank.toneRanges.length > 0 ? parseToneRanges(subbank.toneRanges) : null,
      };
    });
    for (const oto of def.otos) {
      if (this.otos.has(oto.alias)) continue;
      this.otos.set(oto.alias, oto);
    }
  }

  get size(): number {
    return this.otos.size;
  }

  /** Colors declared by the subbanks, in declaration order. */
  get colors(): string[] {
    return [...new Set(this.subbanks.map(s => s.color).filter(c => c.length > 0))];
  }

  /**
   * A hit through a subbank carries the oto's own color, else the subbank's
   * (an empty subbank color means none).
   */
  tryGetMappedOto(alias: string, tone: number, color: string): SampleMatch | undefined {
    const subbank = this.subbanks.find(s =>
      (color === '' || s.color === color) && (s.tones === null || s.tones.has(tone)));
    if (subbank) {
      const mapped = this.otos.get(`${subbank.prefix}${alias}${subbank.suffix}`);
      if (mapped) return toMatch(mapped, mapped.color ?? subbank.color);
    }
    const bare = this.otos.get(alias);
    return bare ? toMatch(bare, bare.color) : undefined;
  }
}
