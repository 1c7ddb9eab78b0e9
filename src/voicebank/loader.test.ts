import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { getVoicebank, getVoicebankDirInfo, listVoicebankIds, loadVoicebank } from './loader.js';
import { VoicebankError } from './schema.js';
import { getDefaultKanaTables } from '../phonemize/kanaTables.js';
import { SubstitutorPhonemizer } from '../phonemize/substitutor.js';

const VOICEBANK_DIR = fileURLToPath(new URL('../../voicebanks', import.meta.url));

describe('loadVoicebank', () => {
  let scratch: string;

  beforeAll(async () => {
    scratch = await mkdtemp(join(tmpdir(), 'kana-oto-'));
  });

  afterAll(async () => {
    await rm(scratch, { recursive: true, force: true });
  });

  it('loads the bundled demo voicebank', async () => {
    const { manifest, library } = await loadVoicebank(join(VOICEBANK_DIR, 'kana-demo', 'voicebank.json'));
    expect(manifest.id).toBe('kana-demo');
    expect(manifest.subbanks).toHaveLength(3);
    expect(library.size).toBe(17);
    expect(library.colors).toEqual(['power']);
  });

  it('uses the built-in kana tables by default', async () => {
    const { tables } = await loadVoicebank(join(VOICEBANK_DIR, 'kana-demo', 'voicebank.json'));
    expect(tables).toBe(getDefaultKanaTables());
  });

  it('applies kana table overrides from the manifest', async () => {
    const path = join(scratch, 'romaji-fallback.json');
    await writeFile(path, JSON.stringify({
      schema: 'kana-oto-resolver.voicebank',
      version: '1',
      id: 'romaji-fallback',
      name: 'Romaji fallback',
      otos: [{ alias: '- a' }],
      kanaTables: { substitutes: ['a=a'] },
    }));
    const { library, tables } = await loadVoicebank(path);
    const phonemizer = new SubstitutorPhonemizer(library, tables);
    expect(phonemizer.process({ lyric: 'か', tone: 60 }).phonemes[0].phoneme).toBe('- a');
  });

  it('fills subbank defaults', async () => {
    const path = join(scratch, 'defaults.json');
    await writeFile(path, JSON.stringify({
      schema: 'kana-oto-resolver.voicebank',
      version: '1',
      id: 'defaults',
      name: 'Defaults',
      subbanks: [{ suffix: 'H' }],
      otos: [],
    }));
    const { manifest } = await loadVoicebank(path);
    expect(manifest.subbanks).toEqual([{ color: '', prefix: '', suffix: 'H', toneRanges: [] }]);
  });

  it('rejects a manifest that fails the schema', async () => {
    const path = join(scratch, 'no-otos.json');
    await writeFile(path, JSON.stringify({ schema: 'kana-oto-resolver.voicebank', version: '1', id: 'x', name: 'X' }));
    await expect(loadVoicebank(path)).rejects.toMatchObject({ code: 'VOICEBANK_INVALID' });
  });

  it('rejects malformed JSON', async () => {
    const path = join(scratch, 'broken.json');
    await writeFile(path, '{ not json');
    await expect(loadVoicebank(path)).rejects.toBeInstanceOf(VoicebankError);
  });

  it('rejects an unparseable tone range', async () => {
    const path = join(scratch, 'bad-range.json');
    await writeFile(path, JSON.stringify({
      schema: 'kana-oto-resolver.voicebank',
      version: '1',
      id: 'bad',
      name: 'Bad',
      subbanks: [{ toneRanges: ['Q9'] }],
      otos: [],
    }));
    await expect(loadVoicebank(path)).rejects.toMatchObject({
      code: 'VOICEBANK_INVALID',
      message: `${path}: Invalid tone range "Q9"`,
    });
  });
});

describe('voicebank directory', () => {
  it('lists voicebank ids', () => {
    expect(listVoicebankIds(VOICEBANK_DIR)).toEqual(['kana-demo']);
    expect(getVoicebankDirInfo(VOICEBANK_DIR)).toEqual({ voicebankDir: VOICEBANK_DIR, count: 1, voicebanks: ['kana-demo'] });
  });

  it('returns an empty list for a missing directory', () => {
    expect(listVoicebankIds(join(VOICEBANK_DIR, 'does-not-exist'))).toEqual([]);
  });

  it('caches loaded voicebanks', async () => {
    const first = await getVoicebank('kana-demo', VOICEBANK_DIR);
    expect(await getVoicebank('kana-demo', VOICEBANK_DIR)).toBe(first);
  });

  it('reports unknown ids with the available ones', async () => {
    await expect(getVoicebank('nope', VOICEBANK_DIR)).rejects.toMatchObject({
      code: 'VOICEBANK_NOT_FOUND',
      message: "Voicebank 'nope' not found. Available voicebanks: [kana-demo]",
    });
  });
});
