import { readFile } from 'node:fs/promises';
import { existsSync, readdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { VoicebankSchema, VoicebankError, type VoicebankManifest } from './schema.js';
import { MappedOtoLibrary } from './library.js';
import { extendDefaultKanaTables, type KanaTables } from '../phonemize/kanaTables.js';

export interface LoadedVoicebank {
  manifest: VoicebankManifest;
  library: MappedOtoLibrary;
  tables: KanaTables;
}

export async function loadVoicebank(manifestPath: string): Promise<LoadedVoicebank> {
  const content = await readFile(manifestPath, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new VoicebankError('VOICEBANK_INVALID', `${manifestPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = VoicebankSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new VoicebankError('VOICEBANK_INVALID', `${manifestPath}: ${issues}`);
  }

  const manifest = parsed.data;
  let library: MappedOtoLibrary;
  try {
    library = new MappedOtoLibrary(manifest);
  } catch (err) {
    throw new VoicebankError('VOICEBANK_INVALID', `${manifestPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  return { manifest, library, tables: extendDefaultKanaTables(manifest.kanaTables ?? {}) };
}

// --- Voicebank directory discovery ---
// Layout: <VOICEBANK_DIR>/<id>/voicebank.json

export function getVoicebankDir(): string {
  return resolve(process.env.VOICEBANK_DIR || 'voicebanks');
}

export function listVoicebankIds(dir = getVoicebankDir()): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir, { withFileTypes: true })
    .filter(d => d.isDirectory() && existsSync(join(dir, d.name, 'voicebank.json')))
    .map(d => d.name)
    .sort();
}

export function getVoicebankDirInfo(dir = getVoicebankDir()) {
  const voicebanks = listVoicebankIds(dir);
  return { voicebankDir: dir, count: voicebanks.length, voicebanks };
}

const cache = new Map<string, LoadedVoicebank>();

/** Load a voicebank by id from the voicebank directory; cached after first load. */
export async function getVoicebank(id: string, dir = getVoicebankDir()): Promise<LoadedVoicebank> {
  const manifestPath = join(dir, id, 'voicebank.json');
  const cached = cache.get(manifestPath);
  if (cached) return cached;

  if (!existsSync(manifestPath)) {
    const available = listVoicebankIds(dir);
    throw new VoicebankError(
      'VOICEBANK_NOT_FOUND',
      `Voicebank '${id}' not found. Available voicebanks: [${available.join(', ')}]`,
    );
  }

  const loaded = await loadVoicebank(manifestPath);
  cache.set(manifestPath, loaded);
  console.log(`[voicebank] Loaded '${loaded.manifest.name}' (${loaded.library.size} otos) from ${manifestPath}`);
  return loaded;
}

export function clearVoicebankCache(): void {
  cache.clear();
}
