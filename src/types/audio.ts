export interface PcmFormat {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
}

export interface AudioBuffer {
  data: Buffer;
  format: PcmFormat;
}

/**
 * Readable, already-normalized audio. Offsets and durations are in seconds.
 */
export interface AudioSource {
  /** Stable identifier of the recording (path, URL, stream id) */
  readonly id: string;
  duration(): Promise<number>;
  readRange(startSeconds: number, durationSeconds: number): Promise<AudioBuffer>;
}

export interface AudioSegment {
  readonly index: number;
  readonly startOffsetSeconds: number;
  readonly durationSeconds: number;
  readonly sourceId: string;
  readonly audio: AudioBuffer;
}
