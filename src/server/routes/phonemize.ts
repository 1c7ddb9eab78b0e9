import { Router } from 'express';
import { PhonemizeRequestSchema, phonemizeRequest } from '../services/phonemizeService.js';
import { VoicebankError } from '../../voicebank/schema.js';
import type { JsonResponse } from '../types.js';

export async function handlePhonemize(req: { body?: unknown }, res: JsonResponse): Promise<void> {
  const parsed = PhonemizeRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    res.status(400).json({ ok: false, error: `${issue.path.join('.') || 'body'}: ${issue.message}` });
    return;
  }

  try {
    const result = await phonemizeRequest(parsed.data);
    res.status(200).json({ ok: true, ...result });
  } catch (err) {
    if (err instanceof VoicebankError) {
      res.status(err.code === 'VOICEBANK_NOT_FOUND' ? 404 : 500).json({ ok: false, code: err.code, error: err.message });
      return;
    }
    console.error('[phonemize] Request failed:', err);
    res.status(500).json({ ok: false, error: err instanceof Error ? err.message : String(err) });
  }
}

export const phonemizeRouter = Router();

phonemizeRouter.post('/', (req, res) => handlePhonemize(req, res));
