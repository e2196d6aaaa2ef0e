import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { SourceCatalog, TargetCatalog } from '../../models/Catalog.js';
import { albumIdFromSource, PlaylistSummary, SourcePlaylist, Visibility } from '../../models/Playlist.js';
import { TargetTrack, TrackRef } from '../../models/Track.js';
import { PermanentExternalError } from '../../utils/ErrorHandler.js';

export interface FakeTargetPlaylist {
  id: string;
  name: string;
  description: string;
  visibility: Visibility;
  tracks: string[];
}

/**
 * Catálogo destino en memoria. Las búsquedas se resuelven con `results` por query exacta.
 */
export class FakeTargetCatalog implements TargetCatalog {
  readonly playlists = new Map<string, FakeTargetPlaylist>();
  readonly results = new Map<string, TargetTrack[]>();
  readonly searches: string[] = [];
  readonly rated: string[] = [];
  readonly addCalls: Array<{ playlistId: string; trackIds: string[] }> = [];
  readonly removeCalls: Array<{ playlistId: string; trackIds: string[] }> = [];
  searchError?: Error;
  private nextId = 1;

  addPlaylist(name: string, tracks: string[] = []): FakeTargetPlaylist {
    const playlist: FakeTargetPlaylist = {
      id: `pl-${this.nextId++}`,
      name,
      description: '',
      visibility: 'PRIVATE',
      tracks: [...tracks]
    };
    this.playlists.set(playlist.id, playlist);
    return playlist;
  }

  async search(query: string): Promise<TargetTrack[]> {
    this.searches.push(query);
    if (this.searchError) {
      throw this.searchError;
    }
    return this.results.get(query) ?? [];
  }

  async createPlaylist(name: string, description: string, visibility: Visibility): Promise<string> {
    const playlist = this.addPlaylist(name);
    playlist.description = description;
    playlist.visibility = visibility;
    return playlist.id;
  }

  async addTracks(playlistId: string, trackIds: string[]): Promise<void> {
    this.addCalls.push({ playlistId, trackIds: [...trackIds] });
    this.get(playlistId).tracks.push(...trackIds);
  }

  async removeTracks(playlistId: string, trackIds: string[]): Promise<void> {
    this.removeCalls.push({ playlistId, trackIds: [...trackIds] });
    const playlist = this.get(playlistId);
    const removed = new Set(trackIds);
    playlist.tracks = playlist.tracks.filter(id => !removed.has(id));
  }

  async listPlaylistTracks(playlistId: string): Promise<string[]> {
    return [...this.get(playlistId).tracks];
  }

  async rateTracks(trackIds: string[]): Promise<void> {
    this.rated.push(...trackIds);
  }

  async listPlaylists(): Promise<PlaylistSummary[]> {
    return [...this.playlists.values()].map(playlist => ({
      id: playlist.id,
      name: playlist.name,
      description: playlist.description,
      owner: { id: 'target-user', displayName: 'Target User' },
      isPublic: playlist.visibility === 'PUBLIC',
      totalTracks: playlist.tracks.length
    }));
  }

  async deletePlaylist(playlistId: string): Promise<void> {
    this.get(playlistId);
    this.playlists.delete(playlistId);
  }

  trackUrl(trackId: string): string {
    return `https://target.test/track/${trackId}`;
  }

  playlistUrl(playlistId: string): string {
    return `https://target.test/playlist/${playlistId}`;
  }

  private get(playlistId: string): FakeTargetPlaylist {
    const playlist = this.playlists.get(playlistId);
    if (!playlist) {
      throw new PermanentExternalError(`Playlist ${playlistId} no encontrada`, 404);
    }
    return playlist;
  }
}

/**
 * Catálogo de origen en memoria
 */
export class FakeSourceCatalog implements SourceCatalog {
  readonly playlists = new Map<string, SourcePlaylist>();
  readonly userPlaylists = new Map<string, string[]>();
  readonly saved: string[] = [];
  readonly savedAlbums: string[] = [];
  savedAlbumsError?: Error;
  readonly tracks = new Map<string, TrackRef>();
  liked: SourcePlaylist = sourcePlaylist('liked', 'Liked Songs', []);

  add(playlist: SourcePlaylist): SourcePlaylist {
    this.playlists.set(playlist.id, playlist);
    return playlist;
  }

  async fetchPlaylist(idOrUrl: string): Promise<SourcePlaylist> {
    const playlist = this.playlists.get(idOrUrl);
    if (!playlist) {
      throw new PermanentExternalError(`Playlist ${idOrUrl} no encontrada`, 404);
    }
    return playlist;
  }

  async fetchLikedTracks(): Promise<SourcePlaylist> {
    return this.liked;
  }

  async fetchUserPlaylists(userId: string): Promise<PlaylistSummary[]> {
    return (this.userPlaylists.get(userId) ?? []).map(id => this.summary(id));
  }

  async fetchSavedPlaylists(): Promise<PlaylistSummary[]> {
    return this.saved.map(id => this.summary(id));
  }

  async fetchSavedAlbums(): Promise<PlaylistSummary[]> {
    if (this.savedAlbumsError) {
      throw this.savedAlbumsError;
    }
    return this.savedAlbums.map(id => this.summary(id));
  }

  // Los álbumes se cargan con `add` usando un id armado por `albumSourceId`
  async fetchAlbum(idOrUrl: string): Promise<SourcePlaylist> {
    const album = [...this.playlists.values()].find(playlist => albumIdFromSource(playlist.id) === idOrUrl);
    if (!album) {
      throw new PermanentExternalError(`Álbum ${idOrUrl} no encontrado`, 404);
    }
    return album;
  }

  async fetchTrack(idOrUrl: string): Promise<TrackRef> {
    const track = this.tracks.get(idOrUrl);
    if (!track) {
      throw new PermanentExternalError(`Canción ${idOrUrl} no encontrada`, 404);
    }
    return track;
  }

  private summary(id: string): PlaylistSummary {
    const playlist = this.playlists.get(id);
    if (!playlist) {
      throw new Error(`fixture sin playlist ${id}`);
    }
    return {
      id: playlist.id,
      name: playlist.name,
      description: playlist.description,
      owner: playlist.owner,
      isPublic: playlist.isPublic,
      totalTracks: playlist.entries.length
    };
  }
}

export function track(sourceId: string, title: string, artist: string, durationSeconds: number): TrackRef {
  return { sourceId, title, artist, durationSeconds };
}

export function candidate(id: string, title: string, artists: string[], durationSeconds: number | null): TargetTrack {
  return { id, title, artists, durationSeconds };
}

export function sourcePlaylist(id: string, name: string, entries: TrackRef[]): SourcePlaylist {
  return {
    id,
    name,
    owner: { id: 'source-user', displayName: 'Source User' },
    isPublic: false,
    entries
  };
}

export async function makeTempDir(prefix: string = 'playlist-mirror-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
