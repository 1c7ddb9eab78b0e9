import { Router } from 'express';
import { getVoicebankDirInfo } from '../../voicebank/loader.js';

export const healthRouter = Router();

const startedAt = Date.now();

healthRouter.get('/', (_req, res) => {
  const voicebankInfo = getVoicebankDirInfo();
  res.json({
    ok: true,
    version: process.env.APP_VERSION ?? "dev",
    commit: process.env.GIT_COMMIT ?? "unknown",
    node: process.version,
    voicebankDir: voicebankInfo.voicebankDir,
    voicebanksFound: voicebankInfo.count,
    voicebanks: voicebankInfo.voicebanks,
    uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
  });
});
