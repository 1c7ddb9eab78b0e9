import { describe, it, expect } from 'vitest';
import {
  buildKanaTables,
  classifyConsonant,
  classifyVowel,
  extendDefaultKanaTables,
  getDefaultKanaTables,
  invertTableLines,
  substituteBareVowel,
} from './kanaTables.js';

describe('invertTableLines', () => {
  it('maps every glyph to the class on the left of "="', () => {
    const lookup = invertTableLines(['a=か,さ', 'i=き']);
    expect([...lookup.entries()]).toEqual([['か', 'a'], ['さ', 'a'], ['き', 'i']]);
  });

  it('lets a later line overwrite a repeated glyph', () => {
    expect(invertTableLines(['x=1,2', 'y=2']).get('2')).toBe('y');
  });

  it('skips empty glyphs and lines without "="', () => {
    const lookup = invertTableLines(['d=だ,ど,', 'garbage']);
    expect(lookup.size).toBe(2);
    expect(lookup.has('')).toBe(false);
  });
});

describe('classifyVowel', () => {
  it('classifies hiragana, katakana and small kana', () => {
    expect(classifyVowel('か')).toBe('a');
    expect(classifyVowel('ゃ')).toBe('a');
    expect(classifyVowel('ケ')).toBe('e');
    expect(classifyVowel('ゐ')).toBe('i');
    expect(classifyVowel('を')).toBe('o');
    expect(classifyVowel('ヴ')).toBe('u');
  });

  it('distinguishes hiragana ん from katakana ン', () => {
    expect(classifyVowel('ん')).toBe('n');
    expect(classifyVowel('ン')).toBe('N');
    expect(classifyVowel('ng')).toBe('N');
  });

  it('classifies romanized vowels as themselves', () => {
    expect(classifyVowel('a')).toBe('a');
    expect(classifyVowel('n')).toBe('n');
  });

  it('returns undefined for glyphs absent from the table', () => {
    expect(classifyVowel('x')).toBeUndefined();
    expect(classifyVowel('きゃ')).toBeUndefined();
    expect(classifyVowel('')).toBeUndefined();
  });
});

describe('classifyConsonant', () => {
  it('classifies single kana and small-kana clusters', () => {
    expect(classifyConsonant('か')).toBe('k');
    expect(classifyConsonant('きゃ')).toBe('k');
    expect(classifyConsonant('しぇ')).toBe('s');
    expect(classifyConsonant('でぃ')).toBe('d');
    expect(classifyConsonant('を')).toBe('w');
  });

  it('does not map the empty string from the trailing comma in the d row', () => {
    expect(classifyConsonant('')).toBeUndefined();
  });

  it('returns undefined for bare vowels', () => {
    expect(classifyConsonant('あ')).toBeUndefined();
  });
});

describe('substituteBareVowel', () => {
  it('maps bare-vowel kana to romaji', () => {
    expect(substituteBareVowel('あ')).toBe('a');
    expect(substituteBareVowel('え')).toBe('e');
    expect(substituteBareVowel('ん')).toBe('n');
  });

  it('returns undefined for everything else', () => {
    expect(substituteBareVowel('a')).toBeUndefined();
    expect(substituteBareVowel('か')).toBeUndefined();
  });
});

describe('getDefaultKanaTables', () => {
  it('builds once and returns the same frozen instance', () => {
    const first = getDefaultKanaTables();
    expect(getDefaultKanaTables()).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('has one entry per default glyph', () => {
    const tables = getDefaultKanaTables();
    expect(tables.substitutes.size).toBe(6);
    expect(tables.vowels.size).toBe(35 + 31 + 31 + 35 + 2 + 34 + 2);
  });
});

describe('buildKanaTables', () => {
  it('builds independent custom tables', () => {
    const tables = buildKanaTables({ vowels: ['o=ぉ'], consonants: ['k=く'], substitutes: ['o=お'] });
    expect(classifyVowel('ぉ', tables)).toBe('o');
    expect(classifyVowel('か', tables)).toBeUndefined();
    expect(classifyConsonant('く', tables)).toBe('k');
    expect(substituteBareVowel('お', tables)).toBe('o');
  });
});

describe('extendDefaultKanaTables', () => {
  it('returns the built-in tables when nothing is overridden', () => {
    expect(extendDefaultKanaTables({})).toBe(getDefaultKanaTables());
  });

  it('replaces only the named tables', () => {
    const tables = extendDefaultKanaTables({ substitutes: ['a=a'] });
    expect(substituteBareVowel('a', tables)).toBe('a');
    expect(substituteBareVowel('あ', tables)).toBeUndefined();
    expect(classifyVowel('か', tables)).toBe('a');
    expect(classifyConsonant('きゃ', tables)).toBe('k');
  });
});
