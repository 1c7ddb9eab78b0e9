import { createServer } from 'node:http';
import { createApp } from './app.js';
import { getVoicebankDirInfo } from '../voicebank/loader.js';

const app = createApp();
const server = createServer(app);

// Boot log: voicebank directory info
const voicebankInfo = getVoicebankDirInfo();
console.log(`[boot] VOICEBANK_DIR = ${voicebankInfo.voicebankDir} (${voicebankInfo.count} voicebanks: ${voicebankInfo.voicebanks.join(', ') || 'NONE'})`);

if (voicebankInfo.count === 0) {
  console.warn(`[boot] WARNING: No voicebanks found in ${voicebankInfo.voicebankDir}. Phonemize requests will fail until voicebanks are deployed.`);
}

const port = Number(process.env.PORT ?? 4321);
server.listen(port, () => {
  console.log(`Kana oto resolver running at http://localhost:${port}`);
});
