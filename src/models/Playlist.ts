import { TrackRef } from './Track.js';

export interface PlaylistOwner {
  id: string;
  displayName: string;
}

/**
 * Estado de una playlist: el deseado (canciones de origen) o el observado (ids del destino)
 */
export interface PlaylistSnapshot<TEntry> {
  id: string;
  name: string;
  description?: string;
  owner: PlaylistOwner;
  isPublic: boolean;
  entries: TEntry[];
}

export type SourcePlaylist = PlaylistSnapshot<TrackRef>;
export type TargetPlaylist = PlaylistSnapshot<string>;

/**
 * Resumen de una playlist sin sus canciones, como lo listan los catálogos
 */
export interface PlaylistSummary {
  id: string;
  name: string;
  description?: string;
  owner: PlaylistOwner;
  isPublic: boolean;
  totalTracks: number;
}

export type Visibility = 'PUBLIC' | 'PRIVATE';

// Id de la colección de canciones guardadas, que se trata como una playlist más
export const LIKED_PLAYLIST_ID = 'liked';

// Los álbumes guardados se registran con este prefijo para distinguirlos de las playlists
const ALBUM_SOURCE_PREFIX = 'album:';

export function albumSourceId(albumId: string): string {
  return `${ALBUM_SOURCE_PREFIX}${albumId}`;
}

export function albumIdFromSource(sourceId: string): string | null {
  return sourceId.startsWith(ALBUM_SOURCE_PREFIX) ? sourceId.slice(ALBUM_SOURCE_PREFIX.length) : null;
}
