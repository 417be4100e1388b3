import { ConfigurationError } from '../types/errors.js';
import { Logger, formatOffset } from '../utils/logger.js';
import { ReorderBuffer } from '../utils/reorderBuffer.js';
import { Segmenter } from './Segmenter.js';
import { TrackMatcher, type ConsumeOutcome, type TrackMatcherOptions } from './TrackMatcher.js';
import { ProviderClient } from './ProviderClient.js';
import type { ProviderOrchestrator, SegmentIdentification } from './ProviderOrchestrator.js';
import type { AudioSegment, AudioSource } from '../types/audio.js';
import type { PipelineRunResult, PipelineStats, ProviderResult, Tracklist } from '../types/identification.js';

export interface PipelineOptions {
  segmentLengthSeconds: number;
  overlapSeconds: number;
  maxConcurrentSegments: number;
  matching: TrackMatcherOptions;
}

export interface SegmentProgress {
  index: number;
  startOffsetSeconds: number;
  outcome: ConsumeOutcome;
  topResult?: ProviderResult;
  fromCache: boolean;
  tracks: Tracklist;
}

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: (progress: SegmentProgress) => void;
}

interface CompletedSegment {
  index: number;
  startOffsetSeconds: number;
  identification: SegmentIdentification;
}

/**
 * Segmenter → orchestrator (bounded worker pool) → track matcher. Segments
 * are identified concurrently but reach the matcher strictly by index.
 */
export class IdentificationPipeline {
  constructor(
    private readonly orchestrator: ProviderOrchestrator,
    private readonly options: PipelineOptions
  ) {
    Segmenter.validate(options.segmentLengthSeconds, options.overlapSeconds);
    if (!Number.isInteger(options.maxConcurrentSegments) || options.maxConcurrentSegments < 1) {
      throw new ConfigurationError('maxConcurrentSegments must be a positive integer', {
        maxConcurrentSegments: options.maxConcurrentSegments,
      });
    }
  }

  async run(source: AudioSource, runOptions: RunOptions = {}): Promise<PipelineRunResult> {
    const { signal, onProgress } = runOptions;
    const matcher = new TrackMatcher(this.options.matching);
    const stats: PipelineStats = {
      segmentsProcessed: 0,
      segmentsIdentified: 0,
      segmentsExhausted: 0,
      cacheHits: 0,
      cacheMisses: 0,
    };

    const totalSeconds = await source.duration();
    Logger.info('Starting track identification', {
      source: source.id,
      length: formatOffset(totalSeconds),
      segmentLength: this.options.segmentLengthSeconds,
      overlap: this.options.overlapSeconds,
      concurrency: this.options.maxConcurrentSegments,
    });

    const buffer = new ReorderBuffer<CompletedSegment>((_, completed) => {
      const { results, fromCache, exhausted } = completed.identification;
      const outcome = matcher.consume(completed, results);

      stats.segmentsProcessed++;
      if (outcome !== 'filtered') stats.segmentsIdentified++;
      if (exhausted) stats.segmentsExhausted++;
      if (fromCache) stats.cacheHits++;
      else stats.cacheMisses++;

      onProgress?.({
        index: completed.index,
        startOffsetSeconds: completed.startOffsetSeconds,
        outcome,
        topResult: results[0],
        fromCache,
        tracks: matcher.snapshot(),
      });
    });

    const segments = Segmenter.segment(
      source,
      this.options.segmentLengthSeconds,
      this.options.overlapSeconds
    )[Symbol.asyncIterator]();

    let sourceDone = false;
    let failure: unknown;

    const nextSegment = async (): Promise<AudioSegment | undefined> => {
      if (sourceDone || failure !== undefined || signal?.aborted) return undefined;
      const next = await segments.next();
      if (next.done) {
        sourceDone = true;
        return undefined;
      }
      // Pulls resolve in index order, so dropping after an abort keeps the delivered prefix dense
      return signal?.aborted ? undefined : next.value;
    };

    const worker = async (): Promise<void> => {
      for (;;) {
        let segment: AudioSegment | undefined;
        try {
          segment = await nextSegment();
        } catch (error) {
          failure ??= error;
          return;
        }
        if (!segment) return;

        const identification = await this.identify(segment, signal);
        try {
          buffer.push(segment.index, {
            index: segment.index,
            startOffsetSeconds: segment.startOffsetSeconds,
            identification,
          });
        } catch (error) {
          failure ??= error;
          return;
        }
      }
    };

    await Promise.all(
      Array.from({ length: this.options.maxConcurrentSegments }, () => worker())
    );

    if (!sourceDone) {
      await segments.return?.(undefined);
    }

    if (failure !== undefined) {
      throw failure;
    }

    const cancelled = signal?.aborted ?? false;
    if (buffer.pendingCount > 0) {
      Logger.warn(`${buffer.pendingCount} identified segment(s) could not be delivered in order`);
    }

    const tracklist = matcher.finalize();
    const matcherStats = matcher.stats();

    Logger.info(cancelled ? 'Track identification cancelled' : 'Track identification completed', {
      segmentsAnalyzed: stats.segmentsProcessed,
      rawIdentifications: stats.segmentsIdentified,
      exhausted: stats.segmentsExhausted,
      cacheHits: stats.cacheHits,
      replays: matcherStats.replayed,
      uniqueTracks: tracklist.length,
    });

    return { tracklist, stats, cancelled };
  }

  private async identify(segment: AudioSegment, signal?: AbortSignal): Promise<SegmentIdentification> {
    try {
      return await this.orchestrator.identifySegment(segment, signal);
    } catch (error) {
      // The orchestrator absorbs provider failures; anything else still must not stop the run
      Logger.error(`Identification of segment ${segment.index} failed unexpectedly`, {
        error: error instanceof Error ? error.message : String(error),
      });
      const placeholders = this.orchestrator.providerNames.map((name) =>
        ProviderClient.failure(name, segment, 'Unknown')
      );
      return { results: placeholders, fromCache: false, exhausted: true };
    }
  }
}
