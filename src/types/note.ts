/** Per-phoneme voice attributes attached to a note. Only index 0 is read. */
export interface PhonemeAttribute {
  index: number;
  voiceColor?: string;
  toneShift?: number;
  alternate?: string | number; // appended to each candidate alias, e.g. "2" → "- か2"
}

export interface LyricNote {
  lyric: string;          // kana syllable, e.g. "か", "きゃ"
  phoneticHint?: string;  // explicit alias override, tried before anything else
  tone: number;           // MIDI note number
  position?: number;      // tick position, used to detect neighbours
  duration?: number;      // ticks
  phonemeAttributes?: PhonemeAttribute[];
}

export interface Phoneme {
  phoneme: string;        // oto alias (or the literal lyric when nothing matched)
}

/** Phonemizer output for one note: always exactly one phoneme. */
export interface PhonemizerResult {
  phonemes: [Phoneme];
}

/** A sample found in the voicebank for a probed alias. */
export interface SampleMatch {
  alias: string;
  color?: string;
}
