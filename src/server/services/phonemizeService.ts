import { z } from 'zod';
import { SubstitutorPhonemizer } from '../../phonemize/substitutor.js';
import { phonemizeNotes } from '../../phonemize/sequence.js';
import { getVoicebank, getVoicebankDir } from '../../voicebank/loader.js';

export const PhonemeAttributeSchema = z.object({
  index: z.number().int(),
  voiceColor: z.string().optional(),
  toneShift: z.number().int().optional(),
  alternate: z.union([z.string(), z.number().int()]).optional(),
});

export const LyricNoteSchema = z.object({
  lyric: z.string(),
  phoneticHint: z.string().optional(),
  tone: z.number().int(),
  position: z.number().int().optional(),
  duration: z.number().int().nonnegative().optional(),
  phonemeAttributes: z.array(PhonemeAttributeSchema).optional(),
});

export const PhonemizeRequestSchema = z.object({
  voicebank: z.string().regex(/^[\w-][\w.-]*$/, 'Invalid voicebank id'),
  notes: z.array(LyricNoteSchema).min(1, 'Missing or empty "notes" array'),
  trace: z.boolean().optional(),
});

export type PhonemizeRequest = z.infer<typeof PhonemizeRequestSchema>;

/** Resolve a request's notes against the named voicebank. */
export async function phonemizeRequest(request: PhonemizeRequest, voicebankDir = getVoicebankDir()) {
  const { library, tables } = await getVoicebank(request.voicebank, voicebankDir);
  const result = phonemizeNotes(new SubstitutorPhonemizer(library, tables), request.notes);
  return {
    phonemes: result.phonemes,
    warnings: result.warnings,
    ...(request.trace ? { traces: result.traces } : {}),
  };
}
