/**
 * PlaylistStore - ordered track list with cursor, shuffle and repeat
 *
 * Shuffle is reversible through a snapshot of the original order rather
 * than a stored permutation: leaving shuffle copies the snapshot back and
 * relocates the cursor onto the track that was current.
 */

import type {
  PlaylistMatch,
  PlaylistSnapshot,
  RandomSource,
  RepeatMode,
  TrackRef,
} from '../types';
import { PlaylistError } from '../types';
import { createLogger } from '../utils/logger';
import { isSupportedAudioFile, trackName } from './formats';
import { findAudioFiles } from './scanner';

const logger = createLogger('PlaylistStore');

export interface PlaylistStoreOptions {
  repeat?: RepeatMode;
  random?: RandomSource;
}

export class PlaylistStore {
  private tracks: TrackRef[] = [];
  private originalOrder: TrackRef[] = [];
  private cursor = -1;
  private repeat: RepeatMode;
  private shuffle = false;
  private readonly random: RandomSource;

  constructor(options?: PlaylistStoreOptions) {
    this.repeat = options?.repeat ?? 'off';
    this.random = options?.random ?? Math.random;
  }

  // ============================================================================
  // Accessors
  // ============================================================================

  get length(): number {
    return this.tracks.length;
  }

  get currentIndex(): number {
    return this.cursor;
  }

  get repeatMode(): RepeatMode {
    return this.repeat;
  }

  get shuffleMode(): boolean {
    return this.shuffle;
  }

  isEmpty(): boolean {
    return this.tracks.length === 0;
  }

  trackAt(index: number): TrackRef | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.tracks.length) {
      return null;
    }
    return this.tracks[index] ?? null;
  }

  currentTrack(): TrackRef | null {
    return this.trackAt(this.cursor);
  }

  getTracks(): TrackRef[] {
    return [...this.tracks];
  }

  snapshot(): PlaylistSnapshot {
    return {
      tracks: [...this.tracks],
      originalOrder: [...this.originalOrder],
      currentIndex: this.cursor,
      repeat: this.repeat,
      shuffle: this.shuffle,
    };
  }

  // ============================================================================
  // Editing
  // ============================================================================

  /**
   * Append supported files; anything else is skipped.
   * @returns number of tracks added
   */
  addTracks(paths: readonly string[]): number {
    const accepted = paths.filter((p) => isSupportedAudioFile(p));
    this.append(accepted);

    if (accepted.length !== paths.length) {
      logger.debug({ skipped: paths.length - accepted.length }, 'Skipped unsupported files');
    }
    return accepted.length;
  }

  /**
   * Append every supported file found below a folder.
   * @returns number of tracks added
   * @throws PlaylistError when the folder cannot be read
   */
  async addFolder(folder: string): Promise<number> {
    let found: string[];
    try {
      found = await findAudioFiles(folder);
    } catch (error) {
      throw new PlaylistError(`Could not read folder: ${folder}`, error, { folder });
    }

    this.append(found);
    logger.debug({ folder, added: found.length }, 'Added folder');
    return found.length;
  }

  /**
   * Remove entries by position. Indices are handled from highest to lowest
   * so earlier positions stay valid; out-of-range ones are ignored.
   */
  removeItems(indices: readonly number[]): void {
    const ordered = [...new Set(indices)]
      .filter((i) => Number.isInteger(i) && i >= 0 && i < this.tracks.length)
      .sort((a, b) => b - a);

    const removed: TrackRef[] = [];
    for (const index of ordered) {
      removed.push(...this.tracks.splice(index, 1));

      if (index === this.cursor) {
        this.cursor = -1;
      } else if (index < this.cursor) {
        this.cursor--;
      }
    }

    if (this.shuffle) {
      for (const track of removed) {
        const originalIndex = this.originalOrder.indexOf(track);
        if (originalIndex !== -1) {
          this.originalOrder.splice(originalIndex, 1);
        }
      }
    } else {
      this.takeSnapshot();
    }

    if (this.cursor >= this.tracks.length) {
      this.cursor = this.tracks.length - 1;
    }
  }

  clear(): void {
    this.tracks = [];
    this.originalOrder = [];
    this.cursor = -1;
  }

  /**
   * Move the cursor. Out-of-range positions are ignored
   * @returns whether the cursor moved to the index
   */
  select(index: number): boolean {
    if (this.trackAt(index) === null) {
      return false;
    }
    this.cursor = index;
    return true;
  }

  /**
   * Case-insensitive substring search over file names
   */
  search(query: string): PlaylistMatch[] {
    const needle = query.trim().toLowerCase();
    const matches: PlaylistMatch[] = [];

    this.tracks.forEach((track, index) => {
      const name = trackName(track);
      if (!needle || name.toLowerCase().includes(needle)) {
        matches.push({ index, name });
      }
    });

    return matches;
  }

  // ============================================================================
  // Shuffle & Repeat
  // ============================================================================

  toggleShuffle(): boolean {
    this.shuffle = !this.shuffle;

    if (this.shuffle) {
      this.applyShuffle();
    } else {
      this.restoreOriginalOrder();
    }

    logger.debug({ shuffle: this.shuffle, currentIndex: this.cursor }, 'Shuffle toggled');
    return this.shuffle;
  }

  setRepeatMode(mode: RepeatMode): void {
    this.repeat = mode;
  }

  toggleRepeat(): RepeatMode {
    const modes: RepeatMode[] = ['off', 'one'];
    const next = modes[(modes.indexOf(this.repeat) + 1) % modes.length] ?? 'off';
    this.repeat = next;
    return next;
  }

  // ============================================================================
  // Navigation
  // ============================================================================

  /**
   * Position after the cursor, wrapping to the start. Repeat-one stays put
   */
  nextIndex(): number {
    return this.step(1);
  }

  /**
   * Position before the cursor, wrapping to the end. Repeat-one stays put
   */
  prevIndex(): number {
    return this.step(-1);
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private step(delta: 1 | -1): number {
    const count = this.tracks.length;
    if (count === 0) {
      return -1;
    }
    if (this.repeat === 'one') {
      return this.cursor;
    }
    return (((this.cursor + delta) % count) + count) % count;
  }

  private append(paths: readonly TrackRef[]): void {
    this.tracks.push(...paths);

    if (this.shuffle) {
      this.originalOrder.push(...paths);
    } else {
      this.takeSnapshot();
    }
  }

  private applyShuffle(): void {
    if (this.tracks.length === 0) {
      return;
    }

    const current = this.currentTrack();
    const remainder = [...this.tracks];

    if (current !== null) {
      remainder.splice(this.cursor, 1);
      this.tracks = [current, ...this.shuffleArray(remainder)];
      this.cursor = 0;
    } else {
      this.tracks = this.shuffleArray(remainder);
    }
  }

  private restoreOriginalOrder(): void {
    const current = this.currentTrack();
    this.tracks = [...this.originalOrder];

    if (current !== null) {
      this.cursor = this.tracks.indexOf(current);
    }
  }

  private takeSnapshot(): void {
    this.originalOrder = [...this.tracks];
  }

  private shuffleArray<T>(array: T[]): T[] {
    const shuffled = [...array];
    for (let i = shuffled.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }
    return shuffled;
  }
}
