import { Logger, formatOffset } from '../utils/logger.js';
import { trackIdentity } from '../utils/matching.js';
import type { AudioSegment } from '../types/audio.js';
import type { ProviderResult, Track, Tracklist } from '../types/identification.js';

export interface TrackMatcherOptions {
  minConfidenceThreshold: number;
  timeThresholdSeconds: number;
  maxDuplicates: number;
}

export type ConsumeOutcome =
  | 'filtered'
  | 'continued'
  | 'appended'
  | 'replayed'
  | 'replay-suppressed'
  | 'interleaved';

export interface TrackMatcherStats {
  consumed: number;
  filtered: number;
  continued: number;
  appended: number;
  replayed: number;
  suppressedReplays: number;
  interleaved: number;
}

interface TrackState {
  identity: string;
  title: string;
  artist: string;
  confidence: number;
  firstSeenOffsetSeconds: number;
  lastSeenOffsetSeconds: number;
  sourceProvider: string;
  occurrenceCount: number;
}

/**
 * Folds the ordered stream of per-segment results into a tracklist. Segments
 * must arrive in ascending offset order; only the top-ranked result of each
 * segment counts.
 */
export class TrackMatcher {
  private tracks: TrackState[] = [];
  private byIdentity = new Map<string, TrackState[]>();
  private lastAccepted: TrackState | undefined;
  private finalized = false;
  private counters: TrackMatcherStats = {
    consumed: 0,
    filtered: 0,
    continued: 0,
    appended: 0,
    replayed: 0,
    suppressedReplays: 0,
    interleaved: 0,
  };

  constructor(private readonly options: TrackMatcherOptions) {}

  consume(
    segment: Pick<AudioSegment, 'index' | 'startOffsetSeconds'>,
    results: readonly ProviderResult[]
  ): ConsumeOutcome {
    if (this.finalized) {
      throw new Error('TrackMatcher already finalized');
    }
    this.counters.consumed++;

    const top = results[0];
    if (
      !top ||
      !top.succeeded ||
      top.trackTitle.trim() === '' ||
      top.confidence < this.options.minConfidenceThreshold
    ) {
      this.counters.filtered++;
      return 'filtered';
    }

    const offset = segment.startOffsetSeconds;
    const identity = trackIdentity(top.trackTitle, top.artist);
    const threshold = this.options.timeThresholdSeconds;

    const last = this.lastAccepted;
    if (last && last.identity === identity && offset - last.lastSeenOffsetSeconds <= threshold) {
      this.extend(last, offset, top);
      this.counters.continued++;
      return 'continued';
    }

    const entries = this.byIdentity.get(identity);
    const latest = entries?.[entries.length - 1];

    if (!entries || !latest) {
      this.append(identity, offset, top);
      this.counters.appended++;
      Logger.info(
        `Found track: ${top.artist} - ${top.trackTitle} at ${formatOffset(offset)} (${(top.confidence * 100).toFixed(1)}%)`
      );
      return 'appended';
    }

    if (offset - latest.lastSeenOffsetSeconds > threshold) {
      if (entries.length < this.options.maxDuplicates) {
        this.append(identity, offset, top);
        this.counters.replayed++;
        Logger.info(`Replay of ${top.artist} - ${top.trackTitle} at ${formatOffset(offset)}`);
        return 'replayed';
      }

      // Entry limit reached: keep counting, add nothing
      latest.occurrenceCount++;
      this.counters.suppressedReplays++;
      Logger.debug(`Suppressed replay of ${top.artist} - ${top.trackTitle}`, {
        entries: entries.length,
        maxDuplicates: this.options.maxDuplicates,
      });
      return 'replay-suppressed';
    }

    // Same track re-detected between hits of another one
    this.extend(latest, offset, top);
    this.lastAccepted = latest;
    this.counters.interleaved++;
    return 'interleaved';
  }

  /**
   * Current tracklist without ending the run.
   */
  snapshot(): Tracklist {
    return Object.freeze(
      [...this.tracks]
        .sort((a, b) => a.firstSeenOffsetSeconds - b.firstSeenOffsetSeconds)
        .map(toTrack)
    );
  }

  finalize(): Tracklist {
    const tracklist = this.snapshot();
    this.finalized = true;
    return tracklist;
  }

  stats(): TrackMatcherStats {
    return { ...this.counters };
  }

  private append(identity: string, offset: number, result: ProviderResult): void {
    const state: TrackState = {
      identity,
      title: result.trackTitle,
      artist: result.artist,
      confidence: result.confidence,
      firstSeenOffsetSeconds: offset,
      lastSeenOffsetSeconds: offset,
      sourceProvider: result.providerName,
      occurrenceCount: 1,
    };

    this.tracks.push(state);
    const entries = this.byIdentity.get(identity);
    if (entries) {
      entries.push(state);
    } else {
      this.byIdentity.set(identity, [state]);
    }
    this.lastAccepted = state;
  }

  private extend(state: TrackState, offset: number, result: ProviderResult): void {
    state.lastSeenOffsetSeconds = Math.max(state.lastSeenOffsetSeconds, offset);
    state.occurrenceCount++;
    if (result.confidence > state.confidence) {
      state.confidence = result.confidence;
      state.sourceProvider = result.providerName;
    }
  }
}

function toTrack(state: TrackState): Track {
  return Object.freeze({
    title: state.title,
    artist: state.artist,
    confidence: state.confidence,
    firstSeenOffsetSeconds: state.firstSeenOffsetSeconds,
    lastSeenOffsetSeconds: state.lastSeenOffsetSeconds,
    sourceProvider: state.sourceProvider,
    occurrenceCount: state.occurrenceCount,
  });
}
