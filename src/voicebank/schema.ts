import { z } from 'zod';
import { KanaTableSourceSchema } from '../phonemize/kanaTables.js';

/** MIDI number, note name ("C4", "A#3") or name range ("C1-B7"). */
export const ToneRangeSchema = z.union([z.number().int(), z.string()]);

export const SubbankSchema = z.object({
  color: z.string().default(''),
  prefix: z.string().default(''),
  suffix: z.string().default(''),
  toneRanges: z.array(ToneRangeSchema).default([]), // empty = every tone
});

export const OtoSchema = z.object({
  alias: z.string(),
  color: z.string().optional(),
  file: z.string().optional(),
});

export const VoicebankSchema = z.object({
  schema: z.literal('kana-oto-resolver.voicebank'),
  version: z.string(),
  id: z.string(),
  name: z.string(),
  subbanks: z.array(SubbankSchema).default([]),
  otos: z.array(OtoSchema),
  kanaTables: KanaTableSourceSchema.partial().optional(), // replaces built-in tables by name
});

export type VoicebankManifest = z.infer<typeof VoicebankSchema>;
export type SubbankInput = z.input<typeof SubbankSchema>;
export type Subbank = z.infer<typeof SubbankSchema>;
export type OtoEntry = z.infer<typeof OtoSchema>;

export type VoicebankErrorCode = 'VOICEBANK_NOT_FOUND' | 'VOICEBANK_INVALID';

export class VoicebankError extends Error {
  readonly code: VoicebankErrorCode;

  constructor(code: VoicebankErrorCode, message: string) {
    super(message);
    this.name = 'VoicebankError';
    this.code = code;
  }
}
