/**
 * PlaybackClock - transport state and derived elapsed time
 *
 * The backend never reports a position, so elapsed time is computed from a
 * wall-clock anchor minus the time spent paused. Seeking restarts the
 * backend at the offset and moves the anchor; there is no in-place seek.
 * Natural end of a track is found by polling the backend busy flag.
 */

import type { AudioBackend, DurationProbe, PlaybackPhase, TimeSource, TrackRef } from '../types';
import { LoadError } from '../types';
import { createLogger } from '../utils/logger';
import { clamp } from '../utils/validation';

const logger = createLogger('PlaybackClock');

/**
 * Wall clock in seconds
 */
export const systemTime: TimeSource = () => Date.now() / 1000;

export interface PlaybackClockOptions {
  backend: AudioBackend;
  probe: DurationProbe;
  now?: TimeSource;
}

export class PlaybackClock {
  private readonly backend: AudioBackend;
  private readonly probe: DurationProbe;
  private readonly now: TimeSource;

  private phaseValue: PlaybackPhase = 'stopped';
  private length = 0;
  private startAnchor = 0;
  private pauseAccum = 0;
  private lastPauseAt = 0;
  private loadedPath: TrackRef | null = null;

  // Bumped by every load and stop; a load that finds it changed is stale
  private generation = 0;
  private loading = false;

  constructor(options: PlaybackClockOptions) {
    this.backend = options.backend;
    this.probe = options.probe;
    this.now = options.now ?? systemTime;
  }

  // ============================================================================
  // State
  // ============================================================================

  get phase(): PlaybackPhase {
    return this.phaseValue;
  }

  /** Seconds, 0 when unknown */
  get trackLength(): number {
    return this.length;
  }

  get currentPath(): TrackRef | null {
    return this.loadedPath;
  }

  /** A load is awaiting the probe or the backend */
  get isLoading(): boolean {
    return this.loading;
  }

  /**
   * Seconds since position zero. Frozen while paused, 0 while stopped
   */
  elapsed(): number {
    switch (this.phaseValue) {
      case 'stopped':
        return 0;
      case 'paused':
        return Math.max(0, this.lastPauseAt - this.startAnchor - this.pauseAccum);
      case 'playing':
        return Math.max(0, this.now() - this.startAnchor - this.pauseAccum);
    }
  }

  // ============================================================================
  // Transport
  // ============================================================================

  /**
   * Probe the length, load the file and start it from the beginning.
   *
   * @returns true when playing, false when a newer load or stop superseded this one
   * @throws LoadError when the backend cannot load or start the file; the clock is then stopped
   */
  async loadAndPlay(path: TrackRef): Promise<boolean> {
    const generation = ++this.generation;
    this.loading = true;
    try {
      return await this.startTrack(path, generation);
    } finally {
      if (generation === this.generation) {
        this.loading = false;
      }
    }
  }

  /**
   * @returns false when not playing
   */
  pause(): boolean {
    if (this.phaseValue !== 'playing') {
      logger.debug({ phase: this.phaseValue }, 'Ignoring pause');
      return false;
    }

    this.safely('pause', () => this.backend.pause());
    this.phaseValue = 'paused';
    this.lastPauseAt = this.now();
    return true;
  }

  /**
   * @returns false when not paused
   */
  resume(): boolean {
    if (this.phaseValue !== 'paused') {
      logger.debug({ phase: this.phaseValue }, 'Ignoring resume');
      return false;
    }

    this.safely('resume', () => this.backend.resume());
    this.phaseValue = 'playing';
    this.pauseAccum += this.now() - this.lastPauseAt;
    this.lastPauseAt = 0;
    return true;
  }

  stop(): void {
    this.generation++;
    this.loading = false;
    this.safely('stop', () => this.backend.stop());
    this.reset();
  }

  /**
   * Restart the backend at an offset, clamped into the track. A paused
   * clock re-pauses the backend straight away and stays paused.
   *
   * @returns false when stopped or the length is unknown
   */
  seek(offsetSeconds: number): boolean {
    if (this.phaseValue === 'stopped' || this.length <= 0) {
      logger.debug({ phase: this.phaseValue, trackLength: this.length }, 'Ignoring seek');
      return false;
    }

    const offset = clamp(offsetSeconds, 0, this.length);
    const wasPaused = this.phaseValue === 'paused';

    this.safely('seek', () => {
      this.backend.playFromOffset(offset);
      if (wasPaused) {
        this.backend.pause();
      }
    });

    const now = this.now();
    this.startAnchor = now - offset;
    this.pauseAccum = 0;
    this.lastPauseAt = wasPaused ? now : 0;
    return true;
  }

  /**
   * Called once per tick. When playing and the backend has gone quiet the
   * track is over: the clock stops and true is returned. A track ending
   * close to its probed length and one ending anywhere else are the same event.
   * While a load is in flight the backend is between tracks and is not polled.
   */
  pollForCompletion(): boolean {
    if (this.phaseValue !== 'playing' || this.loading) {
      return false;
    }
    if (this.backend.isBusy()) {
      return false;
    }

    logger.debug({ path: this.loadedPath, elapsed: this.elapsed() }, 'Track ended');
    this.reset();
    return true;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async startTrack(path: TrackRef, generation: number): Promise<boolean> {
    const length = await this.probeLength(path);
    if (generation !== this.generation) {
      return false;
    }

    try {
      await this.backend.load(path);
      if (generation !== this.generation) {
        return false;
      }
      this.backend.playFromOffset(0);
    } catch (error) {
      if (generation !== this.generation) {
        logger.debug({ path, err: error }, 'Superseded load failed');
        return false;
      }
      this.reset();
      this.safely('stop', () => this.backend.stop());
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ path, err: error }, 'Load failed');
      throw new LoadError(`Could not load ${path}: ${reason}`, path, error);
    }

    this.phaseValue = 'playing';
    this.length = length;
    this.startAnchor = this.now();
    this.pauseAccum = 0;
    this.lastPauseAt = 0;
    this.loadedPath = path;

    logger.debug({ path, trackLength: length }, 'Playing');
    return true;
  }

  private async probeLength(path: TrackRef): Promise<number> {
    try {
      return await this.probe.probe(path);
    } catch (error) {
      logger.debug({ path, err: error }, 'Probe failed');
      return 0;
    }
  }

  private reset(): void {
    this.phaseValue = 'stopped';
    this.length = 0;
    this.startAnchor = 0;
    this.pauseAccum = 0;
    this.lastPauseAt = 0;
    this.loadedPath = null;
  }

  /**
   * Transport calls other than load are not allowed to fail an operation
   */
  private safely(operation: string, call: () => void): void {
    try {
      call();
    } catch (error) {
      logger.warn({ operation, err: error }, 'Backend call failed');
    }
  }
}
