/**
 * @turntable/player
 *
 * Playlist and playback-clock core of a local audio player
 *
 * @packageDocumentation
 */

// Main entry point
export { AudioPlayer, type PlayerOptions } from './player';

// Types
export type {
  // Playback
  PlaybackPhase,
  RepeatMode,
  TrackRef,
  PlayerState,
  PlaybackProgress,
  TickReport,
  PlayerConfig,
  PlayerEvents,

  // Playlist
  PlaylistSnapshot,
  PlaylistMatch,

  // Host contracts
  AudioBackend,
  DurationProbe,
  TimeSource,
  RandomSource,
} from './types';

// Errors
export { PlayerError, LoadError, PlaylistError, ValidationError } from './types';

// Playlist Module
export {
  PlaylistStore,
  AUDIO_EXTENSIONS,
  isSupportedAudioFile,
  trackName,
  findAudioFiles,
  type PlaylistStoreOptions,
} from './playlist';

// Playback Module
export {
  PlaybackClock,
  systemTime,
  MetadataDurationProbe,
  DecodedDurationProbe,
  ChainedDurationProbe,
  createDefaultProbe,
  MIN_DECODED_LENGTH,
  TickScheduler,
  type PlaybackClockOptions,
  type TickHandler,
} from './playback';

// Utilities
export { logger, createLogger, type Logger } from './utils/logger';
export { EventEmitter, type EventListener, type EventMap } from './utils/events';
export { formatTime } from './utils/format';
export { PlayerConfigSchema, RepeatModeSchema } from './utils/validators';

// Version
export const VERSION = '0.1.0';
