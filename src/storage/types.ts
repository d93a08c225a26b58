export const AUDIO_FORMATS = ['wav', 'mp3', 'ogg', 'flac'] as const;

export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export interface AudioArtifact {
  id: string;
  path: string;
  format: AudioFormat;
  /** Epoch milliseconds, stamped once before the artifact becomes visible. */
  createdAt: number;
}

export interface ArtifactListing extends AudioArtifact {
  protected: boolean;
}

export const CONTENT_TYPES: Record<AudioFormat, string> = {
  wav: 'audio/wav',
  mp3: 'audio/mpeg',
  ogg: 'audio/ogg',
  flac: 'audio/flac',
};

const CONTENT_TYPE_ALIASES: Record<string, AudioFormat> = {
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'audio/wave': 'wav',
  'audio/mpeg': 'mp3',
  'audio/mp3': 'mp3',
  'audio/ogg': 'ogg',
  'audio/flac': 'flac',
  'audio/x-flac': 'flac',
};

export function isAudioFormat(value: string): value is AudioFormat {
  return AUDIO_FORMATS.some((format) => format === value);
}

export function formatFromContentType(contentType: string | undefined): AudioFormat | null {
  if (!contentType) {
    return null;
  }
  const mediaType = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return CONTENT_TYPE_ALIASES[mediaType] ?? null;
}
