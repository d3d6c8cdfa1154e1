/**
 * Contracts the core consumes from its host
 */

/**
 * Audio output engine. Decoding and mixing happen behind this interface;
 * the core only drives transport and never reads a position from it.
 */
export interface AudioBackend {
  /** Open a file for playback. Rejects when the file is unreadable or unsupported */
  load(path: string): Promise<void>;
  /** (Re)start the loaded file at the given offset in seconds */
  playFromOffset(seconds: number): void;
  pause(): void;
  resume(): void;
  stop(): void;
  /** Volume in the range 0..1 */
  setVolume(volume: number): void;
  currentVolume(): number;
  /** True while producing audio; false once the track finished or was stopped */
  isBusy(): boolean;
  /**
   * Length in seconds measured by fully decoding the file.
   * Optional: backends that cannot decode ahead of playback leave it out.
   */
  decodedLength?(path: string): Promise<number>;
}

/**
 * Best-effort track length estimator
 */
export interface DurationProbe {
  /** Length in seconds, or 0 when unknown */
  probe(path: string): Promise<number>;
}

/**
 * Time source in seconds. Only differences between readings are meaningful.
 */
export type TimeSource = () => number;

/**
 * Random source in [0, 1), used for shuffling
 */
export type RandomSource = () => number;
