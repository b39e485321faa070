import { Logger } from '@nestjs/common';

export const YARNGPT_VOICES = [
  'Idera',
  'Emma',
  'Zainab',
  'Osagie',
  'Wura',
  'Jude',
  'Chinenye',
  'Tayo',
  'Regina',
  'Femi',
  'Adaora',
  'Umar',
  'Mary',
  'Nonso',
  'Remi',
  'Adam',
] as const;

export type YarnGptVoice = (typeof YARNGPT_VOICES)[number];

const AUDIO_CONTENT_TYPES: Record<string, string> = {
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  opus: 'audio/ogg',
  flac: 'audio/flac',
  aac: 'audio/aac',
};

export function contentTypeForFormat(format: string): string {
  return AUDIO_CONTENT_TYPES[format.toLowerCase()] ?? 'application/octet-stream';
}

/** Case-insensitive match against the known YarnGPT voices. */
export function findYarnGptVoice(name: string): YarnGptVoice | undefined {
  const normalized = name.trim().toLowerCase();
  return YARNGPT_VOICES.find((voice) => voice.toLowerCase() === normalized);
}

export function resolveYarnGptVoice(requested: string | undefined, fallback: string, logger: Logger): string {
  if (!requested) {
    return findYarnGptVoice(fallback) ?? fallback;
  }
  const match = findYarnGptVoice(requested);
  if (match) {
    return match;
  }
  logger.warn(`Unknown YarnGPT voice "${requested}", using ${fallback}`);
  return findYarnGptVoice(fallback) ?? fallback;
}
