/**
 * Playback types and interfaces
 */

import type { LoadError } from './errors';

/**
 * Transport phase of the playback clock
 */
export type PlaybackPhase = 'stopped' | 'playing' | 'paused';

/**
 * Repeat mode
 */
export type RepeatMode = 'off' | 'one';

/**
 * Track reference: a file path. Duplicates are allowed.
 */
export type TrackRef = string;

/**
 * Playlist state as seen by callers
 */
export interface PlaylistSnapshot {
  /** Tracks in play order */
  tracks: readonly TrackRef[];
  /** Order before shuffling */
  originalOrder: readonly TrackRef[];
  /** Selected entry, -1 when none */
  currentIndex: number;
  repeat: RepeatMode;
  shuffle: boolean;
}

/**
 * Playlist search hit
 */
export interface PlaylistMatch {
  /** Position in the current play order */
  index: number;
  /** File name of the track */
  name: string;
}

/**
 * Combined player state
 */
export interface PlayerState {
  phase: PlaybackPhase;
  /** Seconds since position zero, derived from the clock */
  elapsed: number;
  /** Track length in seconds, 0 when unknown */
  trackLength: number;
  /** Path of the loaded track */
  currentTrack: TrackRef | null;
  volume: number;
  playlist: PlaylistSnapshot;
}

/**
 * Result of one scheduler tick
 */
export interface TickReport {
  phase: PlaybackPhase;
  elapsed: number;
  trackLength: number;
  currentTrack: TrackRef | null;
  /** The track finished during this tick */
  ended: boolean;
}

/**
 * Progress display values
 */
export interface PlaybackProgress {
  elapsed: number;
  trackLength: number;
  /** elapsed / trackLength in [0, 1], null when the length is unknown */
  fraction: number | null;
  /** "mm:ss / mm:ss", or "mm:ss / --:--" when the length is unknown */
  label: string;
}

/**
 * Player configuration
 */
export interface PlayerConfig {
  /** Initial volume (0-1) */
  volume?: number;
  /** Initial repeat mode */
  repeat?: RepeatMode;
  /** Start with shuffle enabled */
  shuffle?: boolean;
  /** Period of the tick scheduler in milliseconds */
  tickIntervalMs?: number;
}

/**
 * Player events, keyed by name with the payload type
 */
export type PlayerEvents = {
  phasechange: { phase: PlaybackPhase; previous: PlaybackPhase };
  trackchange: { track: TrackRef; index: number; trackLength: number };
  loaderror: { error: LoadError; index: number };
  ended: { track: TrackRef; index: number };
  playlistchange: PlaylistSnapshot;
  shufflechange: boolean;
  repeatchange: RepeatMode;
  volumechange: number;
  seek: { offset: number };
};
