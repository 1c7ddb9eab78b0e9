/**
 * Print how the kana tables classify each lyric.
 *
 * Usage: npx tsx src/cli/inspect-kana.ts <lyric...>
 */
import {
  getDefaultKanaTables,
  classifyConsonant,
  substituteBareVowel,
  normalizeLyric,
  toGraphemes,
  trailingVowel,
  bareVowelSubstitute,
} from '../phonemize/index.js';

function main() {
  const lyrics = process.argv.slice(2);
  if (lyrics.length === 0) {
    console.error('Usage: npx tsx src/cli/inspect-kana.ts <lyric...>');
    process.exit(1);
  }

  const tables = getDefaultKanaTables();
  console.log(`Tables: ${tables.vowels.size} vowel glyphs, ${tables.consonants.size} consonant clusters, ${tables.substitutes.size} substitutes`);

  for (const raw of lyrics) {
    const lyric = normalizeLyric(raw);
    const graphemes = toGraphemes(lyric);
    const consonant = classifyConsonant(lyric, tables) ?? '-';
    const vowel = trailingVowel(lyric, tables) ?? '-';
    const bare = substituteBareVowel(lyric, tables) ?? '-';
    const sub = bareVowelSubstitute(lyric, tables) ?? '-';
    console.log(`  ${lyric.padEnd(4)} graphemes=[${graphemes.join(' ')}] consonant=${consonant} vowel=${vowel} bare=${bare} substitute=${sub}`);
  }
}

main();
