/**
 * Type definitions for the player core
 */

export type {
  PlaybackPhase,
  RepeatMode,
  TrackRef,
  PlaylistSnapshot,
  PlaylistMatch,
  PlayerState,
  TickReport,
  PlaybackProgress,
  PlayerConfig,
  PlayerEvents,
} from './playback';

export type { AudioBackend, DurationProbe, TimeSource, RandomSource } from './backend';

export { PlayerError, LoadError, PlaylistError, ValidationError } from './errors';
