/**
 * Tests for folder scanning and format detection
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { findAudioFiles } from '../scanner';
import { isSupportedAudioFile, trackName } from '../formats';
import { PlaylistStore } from '../PlaylistStore';
import { PlaylistError } from '../../types';

describe('isSupportedAudioFile', () => {
  it('should accept every supported extension in any case', () => {
    for (const file of ['a.mp3', 'b.OGG', 'c.wav', 'd.Flac', 'e.mod', 'f.XM', 'g.it', 'h.s3m']) {
      expect(isSupportedAudioFile(file)).toBe(true);
    }
  });

  it('should reject other files', () => {
    expect(isSupportedAudioFile('cover.jpg')).toBe(false);
    expect(isSupportedAudioFile('mp3')).toBe(false);
    expect(isSupportedAudioFile('/music/archive.mp3.zip')).toBe(false);
  });
});

describe('trackName', () => {
  it('should return the file name', () => {
    expect(trackName('/music/albums/first/01 - Opening.flac')).toBe('01 - Opening.flac');
  });
});

describe('findAudioFiles', () => {
  let root: string;

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'turntable-scan-'));
    await fs.mkdir(path.join(root, 'sub', 'deeper'), { recursive: true });
    await fs.mkdir(path.join(root, 'empty'));
    await fs.writeFile(path.join(root, 'b.mp3'), '');
    await fs.writeFile(path.join(root, 'a.txt'), '');
    await fs.writeFile(path.join(root, 'sub', 'c.FLAC'), '');
    await fs.writeFile(path.join(root, 'sub', 'cover.png'), '');
    await fs.writeFile(path.join(root, 'sub', 'deeper', 'd.xm'), '');
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should find supported files recursively in name order', async () => {
    const files = await findAudioFiles(root);

    expect(files).toEqual([
      path.join(root, 'b.mp3'),
      path.join(root, 'sub', 'c.FLAC'),
      path.join(root, 'sub', 'deeper', 'd.xm'),
    ]);
  });

  it('should return nothing for a folder without audio', async () => {
    expect(await findAudioFiles(path.join(root, 'empty'))).toEqual([]);
  });

  it('should let PlaylistStore.addFolder append and count the files', async () => {
    const store = new PlaylistStore();
    store.addTracks(['/music/first.mp3']);

    const added = await store.addFolder(root);

    expect(added).toBe(3);
    expect(store.length).toBe(4);
    expect(store.snapshot().originalOrder).toHaveLength(4);
  });

  it('should raise PlaylistError for a missing folder', async () => {
    const store = new PlaylistStore();

    await expect(store.addFolder(path.join(root, 'missing'))).rejects.toBeInstanceOf(PlaylistError);
    expect(store.length).toBe(0);
  });
});
