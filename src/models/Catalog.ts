import { TargetTrack, TrackRef } from './Track.js';
import { PlaylistSummary, SourcePlaylist, Visibility } from './Playlist.js';

/**
 * Catálogo de origen: solo lectura desde el punto de vista del núcleo
 */
export interface SourceCatalog {
  fetchPlaylist(idOrUrl: string): Promise<SourcePlaylist>;
  fetchLikedTracks(): Promise<SourcePlaylist>;
  fetchUserPlaylists(userId: string): Promise<PlaylistSummary[]>;
  fetchSavedPlaylists(): Promise<PlaylistSummary[]>;
  // Álbumes guardados, con ids de origen armados por `albumSourceId`
  fetchSavedAlbums(): Promise<PlaylistSummary[]>;
  fetchAlbum(idOrUrl: string): Promise<SourcePlaylist>;
  fetchTrack(idOrUrl: string): Promise<TrackRef>;
}

/**
 * Catálogo destino: búsqueda y escritura de playlists
 */
export interface TargetCatalog {
  search(query: string): Promise<TargetTrack[]>;
  createPlaylist(name: string, description: string, visibility: Visibility): Promise<string>;
  addTracks(playlistId: string, trackIds: string[]): Promise<void>;
  removeTracks(playlistId: string, trackIds: string[]): Promise<void>;
  listPlaylistTracks(playlistId: string): Promise<string[]>;
  rateTracks(trackIds: string[]): Promise<void>;
  listPlaylists(): Promise<PlaylistSummary[]>;
  deletePlaylist(playlistId: string): Promise<void>;
  trackUrl(trackId: string): string;
  playlistUrl(playlistId: string): string;
}
