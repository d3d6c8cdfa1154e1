/**
 * Playback Module
 *
 * Playback clock, duration probes and the tick scheduler
 */

export { PlaybackClock, systemTime, type PlaybackClockOptions } from './PlaybackClock';
export {
  MetadataDurationProbe,
  DecodedDurationProbe,
  ChainedDurationProbe,
  createDefaultProbe,
  MIN_DECODED_LENGTH,
} from './durationProbe';
export { TickScheduler, type TickHandler } from './TickScheduler';
