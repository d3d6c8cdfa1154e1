/**
 * Main AudioPlayer class
 *
 * Entry point of the core. Combines the playlist and the playback clock
 * behind the intents a UI shell issues (play, pause, seek, next, ...) and
 * the state it polls on every tick:
 * - Playlist editing with shuffle/repeat
 * - Transport control over an injected audio backend
 * - Elapsed-time tracking and end-of-track detection
 * - Typed events for state changes
 *
 * @example
 * ```typescript
 * const player = new AudioPlayer({ backend, volume: 0.6 })
 * player.addTracks(['/music/intro.mp3', '/music/theme.xm'])
 * await player.play()
 *
 * const ticker = new TickScheduler(() => player.tick(), player.tickIntervalMs)
 * ticker.start()
 * ```
 */

import type {
  AudioBackend,
  DurationProbe,
  PlaybackPhase,
  PlaybackProgress,
  PlayerConfig,
  PlayerEvents,
  PlayerState,
  PlaylistMatch,
  PlaylistSnapshot,
  RandomSource,
  RepeatMode,
  TickReport,
  TimeSource,
  TrackRef,
} from './types';
import { LoadError } from './types';
import { PlaylistStore, trackName } from './playlist';
import { PlaybackClock, createDefaultProbe } from './playback';
import { EventEmitter, type EventListener } from './utils/events';
import { createLogger } from './utils/logger';
import { formatTime } from './utils/format';
import { clamp, validate, validateSafe } from './utils/validation';
import {
  FiniteNumberSchema,
  PlayerConfigSchema,
  type ResolvedPlayerConfig,
} from './utils/validators';

const logger = createLogger('AudioPlayer');

export interface PlayerOptions extends PlayerConfig {
  backend: AudioBackend;
  /** Defaults to metadata, then a decode through the backend */
  probe?: DurationProbe;
  /** Time source in seconds */
  now?: TimeSource;
  /** Random source for shuffling */
  random?: RandomSource;
}

export class AudioPlayer {
  private readonly backend: AudioBackend;
  private readonly playlist: PlaylistStore;
  private readonly clock: PlaybackClock;
  private readonly events = new EventEmitter<PlayerEvents>();

  // Phase last reported through phasechange; intents may change the clock during a load
  private reportedPhase: PlaybackPhase = 'stopped';

  /** Period the host should tick at */
  public readonly tickIntervalMs: number;

  // Loads are serialized so an intent and a tick-driven advance never interleave
  private operationQueue: Promise<void> = Promise.resolve();

  constructor(options: PlayerOptions) {
    const { backend, probe, now, random, ...settings } = options;
    const config: ResolvedPlayerConfig = validate(PlayerConfigSchema, settings, 'PlayerConfig');

    this.backend = backend;
    this.tickIntervalMs = config.tickIntervalMs;
    this.playlist = new PlaylistStore({ repeat: config.repeat, random });
    this.clock = new PlaybackClock({
      backend,
      probe: probe ?? createDefaultProbe(backend),
      now,
    });

    if (config.shuffle) {
      this.playlist.toggleShuffle();
    }

    this.applyVolume(config.volume);

    logger.debug({ config }, 'Initialized');
  }

  // ============================================================================
  // Polled State
  // ============================================================================

  phase(): PlaybackPhase {
    return this.clock.phase;
  }

  elapsed(): number {
    return this.clock.elapsed();
  }

  trackLength(): number {
    return this.clock.trackLength;
  }

  currentTrack(): TrackRef | null {
    return this.clock.currentPath;
  }

  /**
   * File name of the loaded track, null when nothing is loaded
   */
  currentTrackName(): string | null {
    const path = this.clock.currentPath;
    return path === null ? null : trackName(path);
  }

  volume(): number {
    return this.readVolume();
  }

  getPlaylist(): PlaylistSnapshot {
    return this.playlist.snapshot();
  }

  getState(): PlayerState {
    return {
      phase: this.clock.phase,
      elapsed: this.clock.elapsed(),
      trackLength: this.clock.trackLength,
      currentTrack: this.clock.currentPath,
      volume: this.readVolume(),
      playlist: this.playlist.snapshot(),
    };
  }

  getProgress(): PlaybackProgress {
    const elapsed = this.clock.elapsed();
    const trackLength = this.clock.trackLength;

    if (trackLength > 0) {
      return {
        elapsed,
        trackLength,
        fraction: clamp(elapsed / trackLength, 0, 1),
        label: `${formatTime(elapsed)} / ${formatTime(trackLength)}`,
      };
    }

    return {
      elapsed,
      trackLength,
      fraction: null,
      label: `${formatTime(elapsed)} / --:--`,
    };
  }

  search(query: string): PlaylistMatch[] {
    return this.playlist.search(query);
  }

  // ============================================================================
  // Tick
  // ============================================================================

  /**
   * One beat of the host timer: detect end of track and advance or repeat.
   * Ticks must not overlap; TickScheduler guarantees that.
   */
  async tick(): Promise<TickReport> {
    const endedTrack = this.clock.currentPath;
    const ended = this.clock.pollForCompletion();

    if (ended) {
      this.notifyPhase();
      if (endedTrack !== null) {
        this.events.emit('ended', { track: endedTrack, index: this.playlist.currentIndex });
      }
      await this.lockOperation(() => this.handleTrackEnd());
    }

    return {
      phase: this.clock.phase,
      elapsed: this.clock.elapsed(),
      trackLength: this.clock.trackLength,
      currentTrack: this.clock.currentPath,
      ended,
    };
  }

  // ============================================================================
  // Playback Controls
  // ============================================================================

  /**
   * Resume when paused; otherwise start the selected track (the first one
   * when nothing is selected). Does nothing on an empty playlist.
   */
  async play(): Promise<void> {
    return this.lockOperation(async () => {
      if (this.playlist.isEmpty()) {
        logger.info('Nothing to play: playlist is empty');
        return;
      }

      if (this.clock.phase === 'paused') {
        this.resume();
        return;
      }
      if (this.clock.phase === 'playing') {
        return;
      }

      if (this.playlist.currentIndex === -1) {
        this.playlist.select(0);
      }
      await this.startAt(this.playlist.currentIndex);
    });
  }

  pause(): void {
    if (this.clock.pause()) {
      this.notifyPhase();
    }
  }

  resume(): void {
    if (this.clock.resume()) {
      this.notifyPhase();
    }
  }

  async togglePlayPause(): Promise<void> {
    if (this.clock.phase === 'playing') {
      this.pause();
    } else {
      await this.play();
    }
  }

  stop(): void {
    this.clock.stop();
    this.notifyPhase();
  }

  async next(): Promise<void> {
    return this.lockOperation(() => this.advance(1));
  }

  async previous(): Promise<void> {
    return this.lockOperation(() => this.advance(-1));
  }

  /**
   * Select an entry and play it. Out-of-range positions are ignored
   */
  async playAt(index: number): Promise<void> {
    return this.lockOperation(async () => {
      if (!this.playlist.select(index)) {
        logger.debug({ index, length: this.playlist.length }, 'Ignoring playAt');
        return;
      }
      await this.startAt(index);
    });
  }

  /**
   * Restart at an offset in seconds. Ignored while stopped or when the
   * track length is unknown; a paused player stays paused.
   */
  seek(offsetSeconds: number): void {
    const offset = validateSafe(FiniteNumberSchema, offsetSeconds);
    if (offset === null) {
      logger.debug({ offsetSeconds }, 'Ignoring non-finite seek');
      return;
    }

    if (this.clock.seek(offset)) {
      this.events.emit('seek', { offset: this.clock.elapsed() });
    }
  }

  // ============================================================================
  // Volume Controls
  // ============================================================================

  setVolume(volume: number): void {
    const value = validateSafe(FiniteNumberSchema, volume);
    if (value === null) {
      logger.debug({ volume }, 'Ignoring non-finite volume');
      return;
    }

    this.events.emit('volumechange', this.applyVolume(value));
  }

  /**
   * Nudge the volume by a delta, as the arrow keys do
   */
  adjustVolume(delta: number): void {
    this.setVolume(this.readVolume() + delta);
  }

  // ============================================================================
  // Shuffle & Repeat
  // ============================================================================

  toggleShuffle(): boolean {
    const enabled = this.playlist.toggleShuffle();
    this.events.emit('shufflechange', enabled);
    this.emitPlaylistChange();
    return enabled;
  }

  toggleRepeat(): RepeatMode {
    const mode = this.playlist.toggleRepeat();
    this.events.emit('repeatchange', mode);
    return mode;
  }

  // ============================================================================
  // Playlist Management
  // ============================================================================

  /**
   * @returns number of supported files added
   */
  addTracks(paths: readonly string[]): number {
    const added = this.playlist.addTracks(paths);
    this.afterAdd(added);
    return added;
  }

  /**
   * @returns number of supported files found below the folder
   * @throws PlaylistError when the folder cannot be read
   */
  async addFolder(folder: string): Promise<number> {
    const added = await this.playlist.addFolder(folder);
    this.afterAdd(added);
    return added;
  }

  removeItems(indices: readonly number[]): void {
    this.playlist.removeItems(indices);

    if (this.playlist.isEmpty()) {
      this.stop();
    }
    this.emitPlaylistChange();
  }

  clearPlaylist(): void {
    this.playlist.clear();
    this.stop();
    this.emitPlaylistChange();
  }

  // ============================================================================
  // Event System
  // ============================================================================

  on<K extends keyof PlayerEvents>(event: K, listener: EventListener<PlayerEvents[K]>): this {
    this.events.on(event, listener);
    return this;
  }

  off<K extends keyof PlayerEvents>(event: K, listener: EventListener<PlayerEvents[K]>): this {
    this.events.off(event, listener);
    return this;
  }

  once<K extends keyof PlayerEvents>(event: K, listener: EventListener<PlayerEvents[K]>): this {
    this.events.once(event, listener);
    return this;
  }

  /**
   * Stop playback and drop all listeners
   */
  destroy(): void {
    this.stop();
    this.events.removeAllListeners();
    logger.debug('Destroyed');
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async handleTrackEnd(): Promise<void> {
    if (this.playlist.isEmpty()) {
      logger.info('Playlist exhausted');
      return;
    }

    if (this.playlist.repeatMode === 'one') {
      await this.startAt(this.playlist.currentIndex);
    } else {
      await this.advance(1);
    }
  }

  private async advance(direction: 1 | -1): Promise<void> {
    if (this.playlist.isEmpty()) {
      return;
    }

    const target = direction === 1 ? this.playlist.nextIndex() : this.playlist.prevIndex();
    if (!this.playlist.select(target)) {
      return;
    }
    await this.startAt(target);
  }

  /**
   * Load and play one entry. A load failure is reported through the
   * loaderror event and leaves the cursor on the failed entry.
   */
  private async startAt(index: number): Promise<void> {
    const path = this.playlist.trackAt(index);
    if (path === null) {
      return;
    }

    try {
      if (await this.clock.loadAndPlay(path)) {
        logger.info({ track: trackName(path), index }, 'Now playing');
        this.events.emit('trackchange', {
          track: path,
          index,
          trackLength: this.clock.trackLength,
        });
      }
    } catch (error) {
      if (!(error instanceof LoadError)) {
        throw error;
      }
      this.events.emit('loaderror', { error, index });
    } finally {
      this.notifyPhase();
    }
  }

  private afterAdd(added: number): void {
    if (added === 0) {
      return;
    }
    if (this.playlist.currentIndex === -1) {
      this.playlist.select(0);
    }
    this.emitPlaylistChange();
  }

  private applyVolume(volume: number): number {
    const clamped = clamp(volume, 0, 1);
    try {
      this.backend.setVolume(clamped);
    } catch (error) {
      logger.warn({ volume: clamped, err: error }, 'Backend rejected volume');
    }
    return clamped;
  }

  private readVolume(): number {
    try {
      return this.backend.currentVolume();
    } catch (error) {
      logger.warn({ err: error }, 'Backend volume unavailable');
      return 0;
    }
  }

  /**
   * Report the clock phase when it differs from the last one reported
   */
  private notifyPhase(): void {
    const phase = this.clock.phase;
    const previous = this.reportedPhase;
    if (phase !== previous) {
      this.reportedPhase = phase;
      this.events.emit('phasechange', { phase, previous });
    }
  }

  private emitPlaylistChange(): void {
    this.events.emit('playlistchange', this.playlist.snapshot());
  }

  private lockOperation<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.operationQueue.then(operation);
    this.operationQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
