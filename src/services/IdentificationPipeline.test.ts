import { describe, it, expect, afterEach } from 'vitest';
import { IdentificationPipeline, type SegmentProgress } from './IdentificationPipeline.js';
import { createPipeline, type PipelineComponents } from './createPipeline.js';
import { MemoryCacheBackend } from '../cache/MemoryCacheBackend.js';
import { AudioSourceError, ConfigurationError, ProviderError } from '../types/errors.js';
import {
  InMemoryAudioSource,
  ScriptedProvider,
  delay,
  match,
  testConfig,
  type ProviderScript,
} from '../testing/fakes.js';
import type { CLIOptions } from '../types/config.js';

const noWait = async (): Promise<void> => undefined;

describe('IdentificationPipeline', () => {
  let components: PipelineComponents | undefined;

  afterEach(async () => {
    await components?.close();
    components = undefined;
  });

  function build(script: ProviderScript, options: CLIOptions = {}): { pipeline: IdentificationPipeline; provider: ScriptedProvider } {
    const provider = new ScriptedProvider('fake', script);
    components = createPipeline(testConfig(options), {
      providers: [provider],
      cacheBackend: new MemoryCacheBackend(),
      wait: noWait,
    });
    return { pipeline: components.pipeline, provider };
  }

  // 100s mix, 30s segments with 5s overlap: segments start at 0, 25, 50 and 75
  const source = (): InMemoryAudioSource => new InMemoryAudioSource('mix.wav', 100);

  it('should feed the matcher in index order when segments finish out of order', async () => {
    const { pipeline } = build(
      async (offset) => {
        // earlier segments answer later
        await delay((75 - offset) / 2);
        return offset < 50 ? match('X', 'A', 0.9) : match('Y', 'B', 0.8);
      },
      { concurrency: 4 }
    );

    const progress: SegmentProgress[] = [];
    const result = await pipeline.run(source(), { onProgress: (event) => progress.push(event) });

    expect(progress.map((event) => event.index)).toEqual([0, 1, 2, 3]);
    expect(progress.map((event) => event.outcome)).toEqual([
      'appended',
      'continued',
      'appended',
      'continued',
    ]);
    expect(result.cancelled).toBe(false);
    expect(
      result.tracklist.map((track) => [
        track.title,
        track.firstSeenOffsetSeconds,
        track.lastSeenOffsetSeconds,
        track.occurrenceCount,
      ])
    ).toEqual([
      ['X', 0, 25, 2],
      ['Y', 50, 75, 2],
    ]);
    expect(result.stats).toEqual({
      segmentsProcessed: 4,
      segmentsIdentified: 4,
      segmentsExhausted: 0,
      cacheHits: 0,
      cacheMisses: 4,
    });
  });

  it('should never identify more segments at once than configured', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const { pipeline, provider } = build(
      async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(20);
        inFlight--;
        return null;
      },
      { concurrency: 2 }
    );

    await pipeline.run(source());

    expect(provider.calls).toHaveLength(4);
    expect(maxInFlight).toBe(2);
  });

  it('should keep going past segments every provider failed on', async () => {
    const { pipeline } = build((offset) => {
      if (offset === 25) throw new ProviderError('fake', 'Timeout', 'no response');
      return match('X', 'A', 0.9);
    });

    const result = await pipeline.run(source());

    expect(result.stats.segmentsExhausted).toBe(1);
    expect(result.stats.segmentsProcessed).toBe(4);
    expect(result.tracklist).toHaveLength(1);
    expect(result.tracklist[0]).toMatchObject({
      firstSeenOffsetSeconds: 0,
      lastSeenOffsetSeconds: 75,
      occurrenceCount: 3,
    });
  });

  it('should return a partial tracklist when cancelled', async () => {
    const controller = new AbortController();
    const { pipeline, provider } = build(
      () => {
        controller.abort();
        return match('X', 'A', 0.9);
      },
      { concurrency: 1 }
    );

    const result = await pipeline.run(source(), { signal: controller.signal });

    expect(result.cancelled).toBe(true);
    expect(provider.calls).toEqual([0]);
    expect(result.stats.segmentsProcessed).toBe(1);
    expect(result.tracklist.map((track) => track.title)).toEqual(['X']);
  });

  it('should identify nothing when cancelled before starting', async () => {
    const controller = new AbortController();
    controller.abort();
    const { pipeline, provider } = build(() => match('X', 'A', 0.9));

    const result = await pipeline.run(source(), { signal: controller.signal });

    expect(result).toEqual({
      tracklist: [],
      stats: { segmentsProcessed: 0, segmentsIdentified: 0, segmentsExhausted: 0, cacheHits: 0, cacheMisses: 0 },
      cancelled: true,
    });
    expect(provider.calls).toEqual([]);
  });

  it('should answer a repeated run from the cache', async () => {
    const { pipeline, provider } = build(() => match('X', 'A', 0.9));

    await pipeline.run(source());
    const second = await pipeline.run(source());

    expect(provider.calls).toHaveLength(4);
    expect(second.stats.cacheHits).toBe(4);
    expect(second.tracklist).toHaveLength(1);
  });

  it('should fail the run when the audio source cannot be read', async () => {
    const { pipeline } = build(() => match('X', 'A', 0.9));
    const broken = new InMemoryAudioSource('broken.wav', 100);
    broken.readRange = async () => {
      throw new AudioSourceError('read failed');
    };

    await expect(pipeline.run(broken)).rejects.toThrow('Audio Source Error: read failed');
  });

  it('should reject invalid pipeline options', () => {
    build(() => null);
    const orchestrator = components?.orchestrator;
    if (!orchestrator) throw new Error('pipeline not built');

    const options = {
      segmentLengthSeconds: 30,
      overlapSeconds: 5,
      maxConcurrentSegments: 2,
      matching: { minConfidenceThreshold: 0.5, timeThresholdSeconds: 60, maxDuplicates: 2 },
    };

    expect(new IdentificationPipeline(orchestrator, options)).toBeInstanceOf(IdentificationPipeline);
    expect(() => new IdentificationPipeline(orchestrator, { ...options, maxConcurrentSegments: 0 })).toThrow(
      ConfigurationError
    );
    expect(() => new IdentificationPipeline(orchestrator, { ...options, overlapSeconds: 30 })).toThrow(
      ConfigurationError
    );
  });
});
