/**
 * Resolve a kana lyric sequence against a voicebank and print one alias per note.
 *
 * Usage: npx tsx src/cli/phonemize.ts <path-to-voicebank.json> [--trace] [--tone=60] [--color=<name>] <lyric...>
 *
 * Lyrics are sung back to back, so each note's previous neighbour is the
 * lyric before it. A lyric written "か:a か" carries the phonetic hint "a か".
 */
import { resolve } from 'node:path';
import { loadVoicebank } from '../voicebank/loader.js';
import { SubstitutorPhonemizer } from '../phonemize/substitutor.js';
import { phonemizeNotes } from '../phonemize/sequence.js';
import type { LyricNote } from '../types/note.js';

function parseLyricArg(arg: string, tone: number, color: string | undefined): LyricNote {
  const sep = arg.indexOf(':');
  const note: LyricNote = sep < 0
    ? { lyric: arg, tone }
    : { lyric: arg.slice(0, sep), phoneticHint: arg.slice(sep + 1), tone };
  if (color) note.phonemeAttributes = [{ index: 0, voiceColor: color }];
  return note;
}

async function main() {
  const args = process.argv.slice(2);
  const flags = args.filter(a => a.startsWith('--'));
  const positional = args.filter(a => !a.startsWith('--'));

  if (positional.length < 2) {
    console.error('Usage: npx tsx src/cli/phonemize.ts <path-to-voicebank.json> [--trace] [--tone=60] [--color=<name>] <lyric...>');
    process.exit(1);
  }

  const showTrace = flags.includes('--trace');
  const tone = Number(flags.find(f => f.startsWith('--tone='))?.slice('--tone='.length) ?? 60);
  const color = flags.find(f => f.startsWith('--color='))?.slice('--color='.length);
  if (!Number.isInteger(tone)) {
    console.error('--tone must be an integer MIDI note number');
    process.exit(1);
  }

  const manifestPath = resolve(positional[0]);
  try {
    const { manifest, library, tables } = await loadVoicebank(manifestPath);
    console.log(`Voicebank: ${manifest.name} (${library.size} otos)`);

    const notes = positional.slice(1).map(arg => parseLyricArg(arg, tone, color));
    const result = phonemizeNotes(new SubstitutorPhonemizer(library, tables), notes);

    result.traces.forEach((trace, i) => {
      console.log(`  ${notes[i].lyric.padEnd(4)} → ${trace.phoneme}  [${trace.source}${trace.substituted ? ', substituted' : ''}]`);
      if (!showTrace) return;
      for (const step of trace.steps) {
        const hits = step.hits.map(h => h.color ? `${h.alias}(${h.color})` : h.alias).join(', ') || '-';
        console.log(`      ${step.state.padEnd(19)} [${step.candidates.join(' | ')}] hits: ${hits}`);
      }
    });

    for (const w of result.warnings) console.warn(`  WARN: ${w}`);
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
