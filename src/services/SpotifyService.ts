import SpotifyWebApi from 'spotify-web-api-node';
import Bottleneck from 'bottleneck';
import { setTimeout as sleep } from 'node:timers/promises';
import { EnrichmentError } from '../types/errors.js';
import { SongMatcher } from '../utils/matching.js';
import { Logger } from '../utils/logger.js';
import type { EnrichedTrack, Track, TrackMetadata, Tracklist } from '../types/identification.js';

export interface SpotifySearchTrack {
  id: string;
  name: string;
  uri: string;
  artists: { name: string }[];
  album: { name: string; release_date?: string };
  external_ids?: { isrc?: string };
  external_urls: { spotify: string };
}

/**
 * The slice of spotify-web-api-node used for enrichment.
 */
export interface SpotifyClient {
  clientCredentialsGrant(): Promise<{ body: { access_token: string; expires_in: number } }>;
  setAccessToken(accessToken: string): void;
  searchTracks(
    query: string,
    options?: { limit?: number }
  ): Promise<{ body: { tracks?: { items: SpotifySearchTrack[] } } }>;
}

export interface SpotifyServiceOptions {
  minMatchScore: number;
  limiter?: Bottleneck;
  now?: () => number;
  wait?: (ms: number) => Promise<unknown>;
}

export class SpotifyService {
  private readonly limiter: Bottleneck;
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<unknown>;
  private lastRefresh = 0;
  private expiresIn = 0;

  constructor(
    private readonly api: SpotifyClient,
    private readonly options: SpotifyServiceOptions
  ) {
    this.limiter = options.limiter ?? new Bottleneck({ maxConcurrent: 1, minTime: 100 });
    this.now = options.now ?? Date.now;
    this.wait = options.wait ?? sleep;
  }

  static fromCredentials(clientId: string, clientSecret: string, minMatchScore: number): SpotifyService {
    return new SpotifyService(new SpotifyWebApi({ clientId, clientSecret }), { minMatchScore });
  }

  private async ensureAccessToken(): Promise<void> {
    const now = Math.floor(this.now() / 1000);

    if (now - this.lastRefresh > this.expiresIn - 60) {
      const maxRetries = 3;

      for (let attempt = 0; attempt < maxRetries; attempt++) {
        try {
          const data = await this.api.clientCredentialsGrant();
          this.api.setAccessToken(data.body.access_token);
          this.lastRefresh = now;
          this.expiresIn = data.body.expires_in || 3600;
          Logger.debug('Spotify access token granted');
          return;
        } catch (error) {
          const message = error instanceof Error ? error.message : 'Unknown error';

          if (attempt === maxRetries - 1 || !this.isRetryableError(error)) {
            throw new EnrichmentError(`Failed to obtain access token: ${message}`, { attempt });
          }

          await this.wait(2000 * (attempt + 1));
        }
      }
    }
  }

  private async withRetry<T>(operation: () => Promise<T>, maxRetries = 3): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const isRetryable = this.isRetryableError(error);

        if (attempt >= maxRetries - 1 || !isRetryable) {
          const message = error instanceof Error ? error.message : 'Unknown error';
          throw new EnrichmentError(message, { attempt, isRetryable });
        }

        await this.wait(1000 * Math.pow(2, attempt));
      }
    }
  }

  private isRetryableError(error: unknown): boolean {
    if (!error || typeof error !== 'object') return false;

    const code = 'code' in error ? error.code : undefined;
    const statusCode = 'statusCode' in error ? error.statusCode : undefined;
    return (
      code === 'ECONNRESET' ||
      code === 'ETIMEDOUT' ||
      statusCode === 429 ||
      statusCode === 502 ||
      statusCode === 503 ||
      statusCode === 504
    );
  }

  private async search(query: string): Promise<SpotifySearchTrack[]> {
    const response = await this.limiter.schedule(() => this.api.searchTracks(query, { limit: 10 }));
    return response.body.tracks?.items ?? [];
  }

  /**
   * Looks a recognized track up in the Spotify catalogue. Returns `null`
   * when no candidate scores at least `minMatchScore`.
   */
  async searchTrack(track: Pick<Track, 'title' | 'artist'>): Promise<TrackMetadata | null> {
    await this.limiter.schedule(() => this.ensureAccessToken());

    return this.withRetry(async () => {
      let items = await this.search(`track:${track.title} artist:${track.artist}`);

      if (!items.length) {
        items = await this.search(track.title);
      }

      if (!items.length) return null;

      const candidates = items
        .map((item) => ({
          item,
          score: SongMatcher.computeConfidence(track, {
            title: item.name,
            artists: item.artists.map((artist) => artist.name),
          }),
        }))
        .sort((a, b) => b.score - a.score);

      const best = candidates[0];
      if (best.score < this.options.minMatchScore) {
        Logger.debug('No Spotify candidate above threshold', {
          title: track.title,
          artist: track.artist,
          bestScore: Math.round(best.score),
        });
        return null;
      }

      return {
        album: best.item.album.name,
        releaseDate: best.item.album.release_date,
        isrc: best.item.external_ids?.isrc,
        spotifyUrl: best.item.external_urls.spotify,
        spotifyUri: best.item.uri,
        matchScore: Math.round(best.score * 10) / 10,
      };
    });
  }

  /**
   * Attaches catalogue metadata to each track. A failed lookup leaves that
   * track as it was.
   */
  async enrich(tracklist: Tracklist): Promise<EnrichedTrack[]> {
    const enriched: EnrichedTrack[] = [];

    for (const track of tracklist) {
      try {
        const metadata = await this.searchTrack(track);
        enriched.push(metadata ? { ...track, metadata } : { ...track });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        Logger.warn('Spotify enrichment failed', {
          title: track.title,
          artist: track.artist,
          error: message,
        });
        enriched.push({ ...track });
      }
    }

    const matched = enriched.filter((track) => track.metadata).length;
    Logger.info(`Enriched ${matched}/${tracklist.length} tracks from Spotify`);
    return enriched;
  }

  async stop(): Promise<void> {
    await this.limiter.stop({ dropWaitingJobs: true });
  }
}
