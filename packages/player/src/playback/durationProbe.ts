/**
 * Track length probes
 *
 * Length is advisory: every probe resolves 0 instead of failing, and a
 * length of 0 only turns the progress display into an open-ended counter.
 */

import { parseFile } from 'music-metadata';
import type { AudioBackend, DurationProbe } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('DurationProbe');

/** Decoded lengths at or below this are treated as a failed decode */
export const MIN_DECODED_LENGTH = 0.2;

function usableLength(seconds: number | undefined): number {
  return seconds !== undefined && Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
}

/**
 * Reads the length from container/tag metadata
 */
export class MetadataDurationProbe implements DurationProbe {
  async probe(path: string): Promise<number> {
    try {
      const metadata = await parseFile(path, { duration: true, skipCovers: true });
      return usableLength(metadata.format.duration);
    } catch (error) {
      logger.debug({ path, err: error }, 'Metadata probe failed');
      return 0;
    }
  }
}

/**
 * Asks the backend to decode the whole file. Tracker modules usually
 * only have a length this way.
 */
export class DecodedDurationProbe implements DurationProbe {
  constructor(
    private readonly backend: Pick<AudioBackend, 'decodedLength'>,
    private readonly minLength = MIN_DECODED_LENGTH
  ) {}

  async probe(path: string): Promise<number> {
    if (!this.backend.decodedLength) {
      return 0;
    }

    try {
      const length = usableLength(await this.backend.decodedLength(path));
      return length > this.minLength ? length : 0;
    } catch (error) {
      logger.debug({ path, err: error }, 'Decode probe failed');
      return 0;
    }
  }
}

/**
 * Tries each probe in order; the first positive length wins
 */
export class ChainedDurationProbe implements DurationProbe {
  constructor(private readonly probes: readonly DurationProbe[]) {}

  async probe(path: string): Promise<number> {
    for (const probe of this.probes) {
      try {
        const length = usableLength(await probe.probe(path));
        if (length > 0) {
          return length;
        }
      } catch (error) {
        logger.debug({ path, err: error }, 'Probe rejected');
      }
    }

    logger.debug({ path }, 'Track length unknown');
    return 0;
  }
}

/**
 * Metadata first, then a full decode through the backend
 */
export function createDefaultProbe(backend: AudioBackend): DurationProbe {
  return new ChainedDurationProbe([new MetadataDurationProbe(), new DecodedDurationProbe(backend)]);
}
