import type { ProviderErrorKind } from './errors.js';
import type { AudioBuffer } from './audio.js';

/**
 * What a recognition service reports for a sample. `confidence` is already
 * normalized to [0, 1]; service-specific fields (album, ids, offset within
 * the track) travel in `rawMetadata`.
 */
export interface ProviderMatch {
  title: string;
  artist: string;
  confidence: number;
  rawMetadata: Record<string, unknown>;
}

export interface IdentifyContext {
  /** Start of the sample within the mix, in seconds */
  offsetSeconds: number;
}

/**
 * One external recognition service. Resolves `null` when the service heard
 * no music, rejects with a ProviderError otherwise.
 */
export interface RecognitionProvider {
  readonly name: string;
  identify(audio: AudioBuffer, context: IdentifyContext): Promise<ProviderMatch | null>;
}

/**
 * Outcome of one (segment, provider) identification. `matchedAtOffsetSeconds`
 * is the segment's position in the mix.
 */
export interface ProviderResult {
  readonly providerName: string;
  readonly trackTitle: string;
  readonly artist: string;
  readonly confidence: number;
  readonly matchedAtOffsetSeconds: number;
  readonly rawMetadata: Readonly<Record<string, unknown>>;
  readonly succeeded: boolean;
  readonly errorKind?: ProviderErrorKind;
}

export interface CacheEntry {
  segmentFingerprint: string;
  results: ProviderResult[];
  createdAt: number;
  ttlMs: number;
}

export interface Track {
  readonly title: string;
  readonly artist: string;
  readonly confidence: number;
  readonly firstSeenOffsetSeconds: number;
  readonly lastSeenOffsetSeconds: number;
  readonly sourceProvider: string;
  readonly occurrenceCount: number;
}

export type Tracklist = readonly Track[];

export interface TrackMetadata {
  album?: string;
  releaseDate?: string;
  isrc?: string;
  spotifyUrl?: string;
  spotifyUri?: string;
  matchScore: number;
}

export interface EnrichedTrack extends Track {
  readonly metadata?: TrackMetadata;
}

export interface PipelineStats {
  segmentsProcessed: number;
  segmentsIdentified: number;
  segmentsExhausted: number;
  cacheHits: number;
  cacheMisses: number;
}

export interface PipelineRunResult {
  tracklist: Tracklist;
  stats: PipelineStats;
  cancelled: boolean;
}
