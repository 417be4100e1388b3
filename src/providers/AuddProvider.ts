import { Blob } from 'node:buffer';
import { FormData } from 'undici';
import { z } from 'zod';
import { encodeWav } from '../audio/wav.js';
import { ProviderError, type ProviderErrorKind } from '../types/errors.js';
import { postForm } from './http.js';
import type { AudioBuffer } from '../types/audio.js';
import type { ProviderMatch, RecognitionProvider } from '../types/identification.js';

export interface AuddOptions {
  endpoint: string;
  apiToken: string;
  timeoutMs: number;
}

const AuddResultSchema = z.object({
  artist: z.string(),
  title: z.string(),
  album: z.string().nullish(),
  release_date: z.string().nullish(),
  label: z.string().nullish(),
  timecode: z.string().nullish(),
  song_link: z.string().nullish(),
});

const AuddResponseSchema = z.object({
  status: z.enum(['success', 'error']),
  result: AuddResultSchema.nullish(),
  error: z.object({ error_code: z.number(), error_message: z.string() }).optional(),
});

const ERROR_KINDS: Record<number, ProviderErrorKind> = {
  300: 'MalformedRequest',
  400: 'MalformedRequest',
  500: 'MalformedRequest',
  700: 'MalformedRequest',
  900: 'AuthError',
  901: 'RateLimited',
  902: 'RateLimited',
};

/**
 * AudD reports no score, so confidence is how complete the returned metadata
 * is: title, artist, album and release date each count a quarter.
 */
export function parseAuddResponse(providerName: string, body: unknown): ProviderMatch | null {
  const parsed = AuddResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderError(providerName, 'Unknown', 'Unexpected response shape');
  }

  const { status, result, error } = parsed.data;
  if (status === 'error') {
    const code = error?.error_code ?? 0;
    throw new ProviderError(
      providerName,
      ERROR_KINDS[code] ?? 'Unknown',
      error?.error_message ?? 'Unknown error',
      undefined,
      { code }
    );
  }

  if (!result) return null;

  const completeness =
    [result.title, result.artist, result.album, result.release_date].filter(
      (field) => typeof field === 'string' && field.trim() !== ''
    ).length / 4;

  return {
    title: result.title,
    artist: result.artist,
    confidence: completeness,
    rawMetadata: {
      album: result.album ?? undefined,
      releaseDate: result.release_date ?? undefined,
      label: result.label ?? undefined,
      timecode: result.timecode ?? undefined,
      songLink: result.song_link ?? undefined,
    },
  };
}

export class AuddProvider implements RecognitionProvider {
  readonly name = 'audd';

  constructor(private readonly options: AuddOptions) {}

  async identify(audio: AudioBuffer): Promise<ProviderMatch | null> {
    const form = new FormData();
    form.append('api_token', this.options.apiToken);
    form.append('file', new Blob([encodeWav(audio)]), 'sample.wav');

    const body = await postForm({
      providerName: this.name,
      url: this.options.endpoint,
      form,
      timeoutMs: this.options.timeoutMs,
    });

    return parseAuddResponse(this.name, body);
  }
}
