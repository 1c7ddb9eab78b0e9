import { Router } from 'express';
import { getVoicebank, listVoicebankIds } from '../../voicebank/loader.js';

export const voicebanksRouter = Router();

voicebanksRouter.get('/', async (_req, res) => {
  try {
    const voicebanks = [];
    for (const id of listVoicebankIds()) {
      const { manifest, library } = await getVoicebank(id);
      voicebanks.push({
        id,
        name: manifest.name,
        version: manifest.version,
        otoCount: library.size,
        colors: library.colors,
      });
    }
    res.json({ ok: true, voicebanks });
  } catch (err) {
    res.status(500).json({ ok: false, error: err instanceof Error ? err.message : String(err) });
  }
});
