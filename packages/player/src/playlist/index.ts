/**
 * Playlist Module
 */

export { PlaylistStore, type PlaylistStoreOptions } from './PlaylistStore';
export { AUDIO_EXTENSIONS, isSupportedAudioFile, trackName } from './formats';
export { findAudioFiles } from './scanner';
