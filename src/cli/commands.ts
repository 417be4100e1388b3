import { writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfigFromEnvironment, missingCredentials, printConfigSummary } from '../config/index.js';
import { WavFileAudioSource } from '../audio/WavFileAudioSource.js';
import { FileCacheBackend } from '../cache/FileCacheBackend.js';
import { createCacheBackend, createPipeline, type PipelineComponents } from '../services/createPipeline.js';
import { SpotifyService } from '../services/SpotifyService.js';
import { ConfigurationError } from '../types/errors.js';
import { Logger, formatOffset } from '../utils/logger.js';
import type { ValidatedAppConfig } from '../config/schema.js';
import type { CLIOptions } from '../types/config.js';
import type { EnrichedTrack, PipelineRunResult } from '../types/identification.js';

export interface TracklistReport {
  source: string;
  cancelled: boolean;
  stats: PipelineRunResult['stats'];
  tracks: Array<EnrichedTrack & { firstSeen: string; lastSeen: string }>;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number.`);
  }
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

export function buildReport(
  source: string,
  result: PipelineRunResult,
  tracks: readonly EnrichedTrack[] = result.tracklist
): TracklistReport {
  return {
    source: basename(source),
    cancelled: result.cancelled,
    stats: result.stats,
    tracks: tracks.map((track) => ({
      ...track,
      firstSeen: formatOffset(track.firstSeenOffsetSeconds),
      lastSeen: formatOffset(track.lastSeenOffsetSeconds),
    })),
  };
}

async function identify(file: string, options: CLIOptions, controller: AbortController): Promise<void> {
  const config = loadConfigFromEnvironment(options);
  Logger.setLevel(config.logging.level);

  const missing = missingCredentials(config);
  if (missing.length > 0) {
    throw new ConfigurationError('Missing provider credentials', { missing });
  }

  const components = createPipeline(config);
  try {
    const source = await WavFileAudioSource.open(file);
    try {
      await identifySource(file, source, { options, config, controller, components });
    } finally {
      await source.close();
    }
  } finally {
    await components.close();
  }
}

interface IdentifyRun {
  options: CLIOptions;
  config: ValidatedAppConfig;
  controller: AbortController;
  components: PipelineComponents;
}

async function identifySource(
  file: string,
  source: WavFileAudioSource,
  { options, config, controller, components }: IdentifyRun
): Promise<void> {
  const budget =
    options.timeBudget !== undefined
      ? setTimeout(() => {
          Logger.warn(`Time budget of ${options.timeBudget}s reached, stopping`);
          controller.abort();
        }, options.timeBudget * 1000)
      : undefined;

  try {
    const result = await components.pipeline.run(source, {
      signal: controller.signal,
      onProgress: ({ outcome, topResult, startOffsetSeconds }) => {
        if ((outcome === 'appended' || outcome === 'replayed') && topResult) {
          Logger.info(
            `[${formatOffset(startOffsetSeconds)}] ${topResult.artist} - ${topResult.trackTitle}`,
            { provider: topResult.providerName, confidence: topResult.confidence }
          );
        }
      },
    });

    let tracks: readonly EnrichedTrack[] = result.tracklist;
    if (options.enrich) {
      tracks = await enrich(result, config.spotify);
    }

    const json = JSON.stringify(buildReport(file, result, tracks), null, 2);
    if (options.output) {
      await writeFile(options.output, `${json}\n`, 'utf8');
      Logger.info(`Tracklist written to ${options.output}`);
    } else {
      process.stdout.write(`${json}\n`);
    }

    Logger.debug('Cache statistics', { ...components.cache.stats() });
    for (const name of components.rateLimiter.providerNames()) {
      Logger.debug('Rate limiter utilization', { ...(await components.rateLimiter.utilization(name)) });
    }
  } finally {
    if (budget) clearTimeout(budget);
  }
}

async function enrich(
  result: PipelineRunResult,
  spotifyConfig: ValidatedAppConfig['spotify']
): Promise<readonly EnrichedTrack[]> {
  if (!spotifyConfig.clientId || !spotifyConfig.clientSecret) {
    Logger.warn('Skipping enrichment: SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET are not set');
    return result.tracklist;
  }

  const spotify = SpotifyService.fromCredentials(
    spotifyConfig.clientId,
    spotifyConfig.clientSecret,
    spotifyConfig.minMatchScore
  );
  try {
    return await spotify.enrich(result.tracklist);
  } finally {
    await spotify.stop();
  }
}

export function createCLI(controller: AbortController = new AbortController()): Command {
  const program = new Command();

  program
    .name('mixtrace')
    .description('Identify the tracks played in a DJ mix recording')
    .version('0.1.0');

  program
    .command('identify')
    .description('Identify the tracks in a PCM WAV recording and print the tracklist as JSON')
    .argument('<file>', 'WAV file to analyse')
    .option('-s, --segment-length <seconds>', 'segment length in seconds', parseNumber)
    .option('-l, --overlap <seconds>', 'overlap between segments in seconds', parseNumber)
    .option('-c, --concurrency <count>', 'segments identified at once', parseInteger)
    .option('-p, --providers <names>', 'comma-separated provider priority order')
    .option('--fallback', 'query fallback providers when the primary is not confident')
    .option('--no-fallback', 'only query the primary provider')
    .option('-m, --min-confidence <score>', 'minimum confidence for a track (0-1)', parseNumber)
    .option('-t, --time-budget <seconds>', 'stop after this many seconds with a partial tracklist', parseNumber)
    .option('--cache', 'use the identification cache')
    .option('--no-cache', 'bypass the identification cache')
    .option('-e, --enrich', 'add Spotify metadata to identified tracks')
    .option('-o, --output <file>', 'write the tracklist to a file instead of stdout')
    .option('-v, --verbose', 'debug logging')
    .action(async (file: string, options: CLIOptions) => {
      await identify(file, options, controller);
    });

  const cache = program.command('cache').description('Manage the identification cache');

  cache
    .command('clear')
    .description('Remove every cached identification')
    .action(async () => {
      const config = loadConfigFromEnvironment();
      await createCacheBackend({ ...config.cache, enabled: true }).clear();
      Logger.info('Identification cache cleared');
    });

  cache
    .command('cleanup')
    .description('Remove expired and unreadable cache files')
    .action(async () => {
      const config = loadConfigFromEnvironment();
      const backend = createCacheBackend({ ...config.cache, enabled: true });
      if (!(backend instanceof FileCacheBackend)) {
        Logger.info('Nothing to clean up for the memory cache');
        return;
      }
      const removed = await backend.cleanup();
      Logger.info(`Removed ${removed} cache file(s)`);
    });

  program
    .command('config')
    .description('Show the effective configuration')
    .action(() => {
      printConfigSummary(loadConfigFromEnvironment());
    });

  return program;
}
