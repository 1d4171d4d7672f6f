/**
 * Voice presets -> OpenAI speech voices.
 */

import { VOICE_PRESETS } from '../../shared/types.js';
import type { VoicePreset } from '../../shared/types.js';

export const OPENAI_VOICE_MAP: Record<VoicePreset, string> = {
  default: 'alloy',
  male: 'onyx',
  female: 'nova',
  british: 'fable',
  american: 'echo',
};

export function isVoicePreset(value: string): value is VoicePreset {
  return VOICE_PRESETS.some((preset) => preset === value);
}
