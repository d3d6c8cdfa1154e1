/**
 * In-process stand-ins for the host collaborators
 */

import { vi } from 'vitest';
import type { AudioBackend, DurationProbe } from '../types';

/**
 * Records every transport call as a short string, e.g. "load:/a.mp3", "play:0"
 */
export class FakeAudioBackend implements AudioBackend {
  readonly calls: string[] = [];
  readonly failingPaths = new Set<string>();
  busy = false;
  volume = 1;
  loaded: string | null = null;
  decodedLength?: (path: string) => Promise<number>;

  async load(path: string): Promise<void> {
    this.calls.push(`load:${path}`);
    if (this.failingPaths.has(path)) {
      throw new Error('unsupported format');
    }
    this.loaded = path;
  }

  playFromOffset(seconds: number): void {
    this.calls.push(`play:${seconds}`);
    this.busy = true;
  }

  pause(): void {
    this.calls.push('pause');
  }

  resume(): void {
    this.calls.push('resume');
  }

  stop(): void {
    this.calls.push('stop');
    this.busy = false;
  }

  setVolume(volume: number): void {
    this.calls.push(`volume:${volume}`);
    this.volume = volume;
  }

  currentVolume(): number {
    return this.volume;
  }

  isBusy(): boolean {
    return this.busy;
  }

  /** The track runs out on its own */
  finish(): void {
    this.busy = false;
  }
}

/**
 * Time source advanced by hand, in seconds
 */
export class ManualClock {
  current = 1000;

  readonly now = (): number => this.current;

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export function fixedProbe(seconds: number): DurationProbe {
  return { probe: vi.fn(async () => seconds) };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
