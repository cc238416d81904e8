// Hit feedback for Whack-a-Zombie
// The sound is synthesized at startup, so there are no audio assets to load.

import { createLogger } from '@/core/logger';
import {
  BLIP_SAMPLE_RATE,
  BLIP_DURATION,
  BLIP_FREQUENCY,
  BLIP_DECAY,
  BLIP_AMPLITUDE,
} from '@/config/constants';

const log = createLogger('audio');

export interface AudioSink {
  /** False when audio could not be initialized; mute is then not offered. */
  readonly supported: boolean;
  /** Fire-and-forget. Never throws. */
  play(): void;
}

export class NoopAudioSink implements AudioSink {
  readonly supported = false;

  play(): void {
    // Nothing to play
  }
}

/** Short percussive blip: a sine with exponential decay. */
export function synthesizeBlip(sampleRate = BLIP_SAMPLE_RATE): Float32Array {
  const length = Math.round(sampleRate * BLIP_DURATION);
  const samples = new Float32Array(length);
  for (let i = 0; i < length; i++) {
    const t = i / sampleRate;
    samples[i] = Math.sin(2 * Math.PI * BLIP_FREQUENCY * t) * Math.exp(-BLIP_DECAY * t) * BLIP_AMPLITUDE;
  }
  return samples;
}

// The parts of AudioContext the sink uses; a real AudioContext satisfies it
export interface BlipBuffer {
  getChannelData(channel: number): Float32Array;
}

export interface BlipSource {
  buffer: BlipBuffer | null;
  connect(destination: unknown): unknown;
  start(when?: number): void;
}

export interface BlipContext {
  readonly state: string;
  readonly destination: unknown;
  resume(): Promise<void>;
  createBuffer(channels: number, length: number, sampleRate: number): BlipBuffer;
  createBufferSource(): BlipSource;
}

export class WebAudioSink implements AudioSink {
  readonly supported = true;

  private readonly context: BlipContext;
  private readonly buffer: BlipBuffer;

  constructor(context: BlipContext) {
    this.context = context;
    const samples = synthesizeBlip();
    this.buffer = context.createBuffer(1, samples.length, BLIP_SAMPLE_RATE);
    this.buffer.getChannelData(0).set(samples);
  }

  play(): void {
    try {
      if (this.context.state === 'suspended') {
        this.context.resume().catch((err: unknown) => {
          log.warn({ err }, 'Could not resume audio context');
        });
      }
      const source = this.context.createBufferSource();
      source.buffer = this.buffer;
      source.connect(this.context.destination);
      source.start(0);
    } catch (err) {
      log.warn({ err }, 'Hit sound playback failed');
    }
  }
}

export type AudioContextFactory = () => BlipContext;

const defaultFactory: AudioContextFactory = () => new AudioContext();

/**
 * Picks the sink once at startup. Any failure here disables sound for
 * the rest of the session.
 */
export function createAudioSink(createContext: AudioContextFactory = defaultFactory): AudioSink {
  try {
    return new WebAudioSink(createContext());
  } catch (err) {
    log.warn({ err }, 'Audio unavailable, continuing without sound');
    return new NoopAudioSink();
  }
}
