import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHmac } from 'crypto';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici';
import { AcrCloudProvider, parseAcrCloudResponse, signRequest } from './AcrCloudProvider.js';
import { ProviderError } from '../types/errors.js';

const audio = { data: Buffer.alloc(16), format: { sampleRate: 8000, channels: 1, bitsPerSample: 16 } };

function kindOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof ProviderError ? error.kind : 'not a ProviderError';
  }
  return undefined;
}

describe('signRequest', () => {
  it('should sign the identify request with HMAC-SHA1', () => {
    const expected = createHmac('sha1', 'test-secret')
      .update('POST\n/v1/identify\ntest-key\naudio\n1\n1700000000')
      .digest('base64');

    expect(signRequest('test-key', 'test-secret', 1700000000)).toBe(expected);
  });
});

describe('parseAcrCloudResponse', () => {
  it('should pick the highest scoring music match', () => {
    const match = parseAcrCloudResponse('acrcloud', {
      status: { code: 0, msg: 'Success' },
      metadata: {
        music: [
          { title: 'Cover', artists: [{ name: 'Someone' }], score: 70 },
          {
            title: 'Windowlicker',
            artists: [{ name: 'Aphex Twin' }, { name: 'Richard D. James' }],
            album: { name: 'Windowlicker' },
            score: 96,
            release_date: '1999-03-22',
            external_ids: { isrc: 'GBBPW9900001' },
            play_offset_ms: 42000,
          },
        ],
      },
    });

    expect(match).toEqual({
      title: 'Windowlicker',
      artist: 'Aphex Twin, Richard D. James',
      confidence: 0.96,
      rawMetadata: {
        album: 'Windowlicker',
        releaseDate: '1999-03-22',
        label: undefined,
        isrc: 'GBBPW9900001',
        acrid: undefined,
        playOffsetMs: 42000,
        durationMs: undefined,
        alternatives: 1,
      },
    });
  });

  it('should report no result as null', () => {
    expect(parseAcrCloudResponse('acrcloud', { status: { code: 1001, msg: 'No result' } })).toBeNull();
  });

  it('should classify error statuses', () => {
    const status = (code: number) => () =>
      parseAcrCloudResponse('acrcloud', { status: { code, msg: 'error' } });

    expect(kindOf(status(3001))).toBe('AuthError');
    expect(kindOf(status(3014))).toBe('AuthError');
    expect(kindOf(status(3003))).toBe('RateLimited');
    expect(kindOf(status(3015))).toBe('RateLimited');
    expect(kindOf(status(2004))).toBe('MalformedRequest');
    expect(kindOf(status(3000))).toBe('Unknown');
  });

  it('should reject unexpected bodies', () => {
    expect(kindOf(() => parseAcrCloudResponse('acrcloud', { hello: 'world' }))).toBe('Unknown');
  });
});

describe('AcrCloudProvider', () => {
  let agent: MockAgent;
  let previous: Dispatcher;

  beforeEach(() => {
    previous = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(previous);
    await agent.close();
  });

  const provider = (timeoutMs = 1000): AcrCloudProvider =>
    new AcrCloudProvider({
      host: 'identify.example.test',
      accessKey: 'test-key',
      accessSecret: 'test-secret',
      timeoutMs,
      now: () => 1700000000000,
    });

  it('should post the sample and map the response', async () => {
    agent
      .get('https://identify.example.test')
      .intercept({ path: '/v1/identify', method: 'POST' })
      .reply(200, {
        status: { code: 0, msg: 'Success' },
        metadata: { music: [{ title: 'Xtal', artists: [{ name: 'Aphex Twin' }], score: 88 }] },
      });

    const match = await provider().identify(audio);

    expect(match?.title).toBe('Xtal');
    expect(match?.artist).toBe('Aphex Twin');
    expect(match?.confidence).toBe(0.88);
  });

  it('should turn HTTP 429 into RateLimited with the retry-after hint', async () => {
    agent
      .get('https://identify.example.test')
      .intercept({ path: '/v1/identify', method: 'POST' })
      .reply(429, 'slow down', { headers: { 'retry-after': '2' } });

    await expect(provider().identify(audio)).rejects.toMatchObject({
      kind: 'RateLimited',
      retryAfterMs: 2000,
    });
  });

  it('should time out slow responses', async () => {
    agent
      .get('https://identify.example.test')
      .intercept({ path: '/v1/identify', method: 'POST' })
      .reply(200, { status: { code: 1001, msg: 'No result' } })
      .delay(500);

    await expect(provider(50).identify(audio)).rejects.toMatchObject({ kind: 'Timeout' });
  });
});
