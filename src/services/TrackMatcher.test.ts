import { describe, it, expect } from 'vitest';
import { TrackMatcher, type TrackMatcherOptions } from './TrackMatcher.js';
import { providerResult } from '../testing/fakes.js';

const defaults: TrackMatcherOptions = {
  minConfidenceThreshold: 0.5,
  timeThresholdSeconds: 60,
  maxDuplicates: 2,
};

function feed(
  matcher: TrackMatcher,
  hits: Array<[offset: number, title: string, artist: string, confidence: number]>
): string[] {
  return hits.map(([offset, title, artist, confidence], index) =>
    matcher.consume({ index, startOffsetSeconds: offset }, [providerResult(title, artist, confidence)])
  );
}

type TrackSummary = [name: string, first: number, last: number, occurrences: number];

function summarize(matcher: TrackMatcher): TrackSummary[] {
  return matcher
    .finalize()
    .map((track): TrackSummary => [
      `${track.artist} - ${track.title}`,
      track.firstSeenOffsetSeconds,
      track.lastSeenOffsetSeconds,
      track.occurrenceCount,
    ]);
}

describe('TrackMatcher', () => {
  it('should merge continuations and keep replays beyond the time threshold', () => {
    const matcher = new TrackMatcher(defaults);

    const outcomes = feed(matcher, [
      [0, 'X', 'A', 0.9],
      [30, 'X', 'A', 0.8],
      [120, 'Y', 'B', 0.9],
      [400, 'X', 'A', 0.9],
    ]);

    expect(outcomes).toEqual(['appended', 'continued', 'appended', 'replayed']);
    expect(summarize(matcher)).toEqual([
      ['A - X', 0, 30, 2],
      ['B - Y', 120, 120, 1],
      ['A - X', 400, 400, 1],
    ]);
  });

  it('should never create or extend a track from a low-confidence result', () => {
    const matcher = new TrackMatcher(defaults);

    const outcomes = feed(matcher, [
      [0, 'X', 'A', 0.3],
      [25, 'Y', 'B', 0.9],
      [50, 'Y', 'B', 0.3],
    ]);

    expect(outcomes).toEqual(['filtered', 'appended', 'filtered']);
    expect(summarize(matcher)).toEqual([['B - Y', 25, 25, 1]]);
  });

  it('should stop adding entries once maxDuplicates is reached but keep counting', () => {
    const matcher = new TrackMatcher({ ...defaults, maxDuplicates: 1 });

    const outcomes = feed(matcher, [
      [0, 'X', 'A', 0.9],
      [100, 'Y', 'B', 0.9],
      [200, 'X', 'A', 0.9],
      [300, 'X', 'A', 0.9],
    ]);

    expect(outcomes).toEqual(['appended', 'appended', 'replay-suppressed', 'replay-suppressed']);
    expect(summarize(matcher)).toEqual([
      ['A - X', 0, 0, 3],
      ['B - Y', 100, 100, 1],
    ]);
    expect(matcher.stats().suppressedReplays).toBe(2);
  });

  it('should fold a re-detection between hits of another track into the earlier entry', () => {
    const matcher = new TrackMatcher(defaults);

    const outcomes = feed(matcher, [
      [0, 'X', 'A', 0.9],
      [30, 'Y', 'B', 0.9],
      [60, 'X', 'A', 0.9],
      [90, 'X', 'A', 0.9],
    ]);

    expect(outcomes).toEqual(['appended', 'appended', 'interleaved', 'continued']);
    expect(summarize(matcher)).toEqual([
      ['A - X', 0, 90, 3],
      ['B - Y', 30, 30, 1],
    ]);
  });

  it('should compare identities case-insensitively with collapsed whitespace', () => {
    const matcher = new TrackMatcher(defaults);

    const outcomes = feed(matcher, [
      [0, 'Blue  Monday', 'New Order', 0.9],
      [25, 'blue monday ', ' NEW ORDER', 0.9],
    ]);

    expect(outcomes).toEqual(['appended', 'continued']);
    expect(summarize(matcher)).toEqual([['New Order - Blue  Monday', 0, 25, 2]]);
  });

  it('should keep the higher confidence and its provider', () => {
    const matcher = new TrackMatcher(defaults);
    matcher.consume({ index: 0, startOffsetSeconds: 0 }, [
      providerResult('X', 'A', 0.6, { providerName: 'audd' }),
    ]);
    matcher.consume({ index: 1, startOffsetSeconds: 25 }, [
      providerResult('X', 'A', 0.95, { providerName: 'acrcloud' }),
    ]);
    matcher.consume({ index: 2, startOffsetSeconds: 50 }, [
      providerResult('X', 'A', 0.7, { providerName: 'audd' }),
    ]);

    const [track] = matcher.finalize();
    expect(track.confidence).toBe(0.95);
    expect(track.sourceProvider).toBe('acrcloud');
  });

  it('should only consider the top-ranked result', () => {
    const matcher = new TrackMatcher(defaults);

    const outcome = matcher.consume({ index: 0, startOffsetSeconds: 0 }, [
      providerResult('', '', 0, { succeeded: false, errorKind: 'Timeout' }),
      providerResult('X', 'A', 0.9),
    ]);

    expect(outcome).toBe('filtered');
    expect(matcher.consume({ index: 1, startOffsetSeconds: 25 }, [])).toBe('filtered');
    expect(matcher.finalize()).toEqual([]);
  });

  it('should refuse input after finalize', () => {
    const matcher = new TrackMatcher(defaults);
    matcher.finalize();

    expect(() => matcher.consume({ index: 0, startOffsetSeconds: 0 }, [])).toThrow('already finalized');
  });

  it('should expose a snapshot without finalizing', () => {
    const matcher = new TrackMatcher(defaults);
    feed(matcher, [[0, 'X', 'A', 0.9]]);

    expect(matcher.snapshot()).toHaveLength(1);
    expect(feed(matcher, [[200, 'Y', 'B', 0.9]])).toEqual(['appended']);
  });
});
