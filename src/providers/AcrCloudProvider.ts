import { createHmac } from 'node:crypto';
import { Blob } from 'node:buffer';
import { FormData } from 'undici';
import { z } from 'zod';
import { encodeWav } from '../audio/wav.js';
import { ProviderError, type ProviderErrorKind } from '../types/errors.js';
import { postForm } from './http.js';
import type { AudioBuffer } from '../types/audio.js';
import type { ProviderMatch, RecognitionProvider } from '../types/identification.js';

export interface AcrCloudOptions {
  host: string;
  accessKey: string;
  accessSecret: string;
  timeoutMs: number;
  now?: () => number;
}

const IDENTIFY_PATH = '/v1/identify';

const AcrCloudMusicSchema = z.object({
  title: z.string(),
  artists: z.array(z.object({ name: z.string() })).optional(),
  album: z.object({ name: z.string() }).optional(),
  score: z.number().optional(),
  play_offset_ms: z.number().optional(),
  duration_ms: z.number().optional(),
  release_date: z.string().optional(),
  label: z.string().optional(),
  acrid: z.string().optional(),
  external_ids: z.object({ isrc: z.string().optional() }).passthrough().optional(),
});

const AcrCloudResponseSchema = z.object({
  status: z.object({ code: z.number(), msg: z.string() }),
  metadata: z
    .object({
      music: z.array(AcrCloudMusicSchema).optional(),
    })
    .optional(),
});

// https://docs.acrcloud.com/reference/error-codes
const STATUS_KINDS: Record<number, ProviderErrorKind> = {
  2004: 'MalformedRequest',
  3001: 'AuthError',
  3003: 'RateLimited',
  3006: 'MalformedRequest',
  3014: 'AuthError',
  3015: 'RateLimited',
};

const NO_RESULT = 1001;

export function signRequest(accessKey: string, accessSecret: string, timestamp: number): string {
  const stringToSign = ['POST', IDENTIFY_PATH, accessKey, 'audio', '1', String(timestamp)].join('\n');
  return createHmac('sha1', accessSecret).update(stringToSign, 'utf8').digest('base64');
}

/**
 * Maps an identify response body to the best music match, `null` for "no
 * result", or throws a ProviderError for error statuses.
 */
export function parseAcrCloudResponse(providerName: string, body: unknown): ProviderMatch | null {
  const parsed = AcrCloudResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderError(providerName, 'Unknown', 'Unexpected response shape');
  }

  const { status, metadata } = parsed.data;
  if (status.code === NO_RESULT) return null;
  if (status.code !== 0) {
    throw new ProviderError(providerName, STATUS_KINDS[status.code] ?? 'Unknown', status.msg, undefined, {
      code: status.code,
    });
  }

  const music = [...(metadata?.music ?? [])].sort((a, b) => (b.score ?? 100) - (a.score ?? 100));
  const best = music[0];
  if (!best) return null;

  return {
    title: best.title,
    artist: (best.artists ?? []).map((artist) => artist.name).join(', '),
    confidence: (best.score ?? 100) / 100,
    rawMetadata: {
      album: best.album?.name,
      releaseDate: best.release_date,
      label: best.label,
      isrc: best.external_ids?.isrc,
      acrid: best.acrid,
      playOffsetMs: best.play_offset_ms,
      durationMs: best.duration_ms,
      alternatives: music.length - 1,
    },
  };
}

export class AcrCloudProvider implements RecognitionProvider {
  readonly name = 'acrcloud';
  private readonly now: () => number;

  constructor(private readonly options: AcrCloudOptions) {
    this.now = options.now ?? Date.now;
  }

  async identify(audio: AudioBuffer): Promise<ProviderMatch | null> {
    const sample = encodeWav(audio);
    const timestamp = Math.floor(this.now() / 1000);

    const form = new FormData();
    form.append('sample', new Blob([sample]), 'sample.wav');
    form.append('sample_bytes', String(sample.length));
    form.append('access_key', this.options.accessKey);
    form.append('data_type', 'audio');
    form.append('signature_version', '1');
    form.append('signature', signRequest(this.options.accessKey, this.options.accessSecret, timestamp));
    form.append('timestamp', String(timestamp));

    const body = await postForm({
      providerName: this.name,
      url: `https://${this.options.host}${IDENTIFY_PATH}`,
      form,
      timeoutMs: this.options.timeoutMs,
    });

    return parseAcrCloudResponse(this.name, body);
  }
}
