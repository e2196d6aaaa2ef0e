import axios, { AxiosInstance } from 'axios';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { SourceCatalog } from '../models/Catalog.js';
import { albumSourceId, LIKED_PLAYLIST_ID, PlaylistSummary, SourcePlaylist } from '../models/Playlist.js';
import { TrackRef } from '../models/Track.js';
import { ErrorHandler, FatalConfigurationError } from '../utils/ErrorHandler.js';

const API_ROOT = 'https://api.spotify.com/v1';

export interface SpotifyUser {
  id: string;
  display_name: string | null;
}

export interface SpotifyPlaylist {
  id: string;
  name: string;
  description: string | null;
  tracks: { total: number };
  owner: { id: string; display_name: string | null };
  public: boolean | null;
}

export interface SpotifyTrackResponse {
  id: string | null;
  name: string;
  artists: Array<{ id: string; name: string }>;
  // Las canciones de un álbum llegan sin este campo
  album?: {
    id: string;
    name: string;
  };
  duration_ms: number;
}

export interface SpotifyAlbum {
  id: string;
  name: string;
  artists: Array<{ id: string; name: string }>;
  total_tracks: number;
}

interface SpotifyPage<TItem> {
  items: TItem[];
  next: string | null;
  total: number;
}

export type SpotifyResourceKind = 'album' | 'playlist' | 'track' | 'user';

export interface SpotifyServiceOptions {
  client?: AxiosInstance;
  errorHandler?: ErrorHandler;
}

/**
 * Extraer el id de un link de open.spotify.com, una URI `spotify:` o un id pelado
 */
export function parseSpotifyId(input: string, kind: SpotifyResourceKind): string {
  const value = input.trim();

  const urlMatch = new RegExp(`open\\.spotify\\.com/(?:intl-[a-z]{2}(?:-[a-z]{2})?/)?${kind}/([^/?#]+)`, 'i').exec(value);
  const uriMatch = new RegExp(`^spotify:${kind}:([^:]+)$`, 'i').exec(value);
  const id = urlMatch?.[1] ?? uriMatch?.[1] ?? value;

  const valid = kind === 'user' ? /^[\w.-]+$/.test(id) : /^[0-9A-Za-z]{22}$/.test(id);
  if (!valid) {
    throw new FatalConfigurationError(`"${input}" no es un identificador válido de ${kind} de Spotify`, 'ID_INVALIDO');
  }

  return id;
}

/**
 * Servicio para interactuar con la API de Spotify
 */
export class SpotifyService implements SourceCatalog {
  private client: AxiosInstance;
  private errorHandler: ErrorHandler;

  constructor(accessToken: string, options: SpotifyServiceOptions = {}) {
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.client = options.client ?? axios.create({
      baseURL: API_ROOT,
      headers: {
        'Authorization': `Bearer ${accessToken}`,
        'Content-Type': 'application/json',
      },
      timeout: DEFAULT_CONFIG.REQUEST_TIMEOUT,
    });
  }

  /**
   * Obtener perfil del usuario actual
   */
  async getUserProfile(): Promise<SpotifyUser> {
    return this.errorHandler.executeWithRetry(async () => {
      const response = await this.client.get<SpotifyUser>('/me');
      return response.data;
    }, 'spotify', 'getUserProfile');
  }

  async fetchPlaylist(idOrUrl: string): Promise<SourcePlaylist> {
    const playlistId = parseSpotifyId(idOrUrl, 'playlist');

    const response = await this.errorHandler.executeWithRetry(
      () => this.client.get<SpotifyPlaylist>(`/playlists/${playlistId}`, {
        params: { fields: 'id,name,description,public,owner(id,display_name),tracks(total)' }
      }),
      'spotify',
      'fetchPlaylist'
    );

    const summary = convertSpotifyPlaylist(response.data);
    const entries = await this.collectPages<{ track: SpotifyTrackResponse | null }, TrackRef>(
      `/playlists/${playlistId}/tracks`,
      100,
      'fetchPlaylistTracks',
      // Canciones locales o eliminadas llegan sin id
      item => item.track ? convertSpotifyTrack(item.track) : null
    );

    return {
      id: summary.id,
      name: summary.name,
      description: summary.description,
      owner: summary.owner,
      isPublic: summary.isPublic,
      entries
    };
  }

  /**
   * Canciones guardadas ("Me gusta") del usuario como una playlist más
   */
  async fetchLikedTracks(): Promise<SourcePlaylist> {
    const user = await this.getUserProfile();
    const entries = await this.collectPages<{ track: SpotifyTrackResponse | null }, TrackRef>(
      '/me/tracks',
      50,
      'fetchLikedTracks',
      item => item.track ? convertSpotifyTrack(item.track) : null
    );

    return {
      id: LIKED_PLAYLIST_ID,
      name: 'Liked Songs',
      owner: { id: user.id, displayName: user.display_name || user.id },
      isPublic: false,
      entries
    };
  }

  async fetchUserPlaylists(userId: string): Promise<PlaylistSummary[]> {
    const id = parseSpotifyId(userId, 'user');
    return this.collectPages(`/users/${encodeURIComponent(id)}/playlists`, 50, 'fetchUserPlaylists', convertPlaylistItem);
  }

  /**
   * Playlists propias y seguidas por el usuario actual
   */
  async fetchSavedPlaylists(): Promise<PlaylistSummary[]> {
    return this.collectPages('/me/playlists', 50, 'fetchSavedPlaylists', convertPlaylistItem);
  }

  async fetchSavedAlbums(): Promise<PlaylistSummary[]> {
    return this.collectPages<{ album: SpotifyAlbum }, PlaylistSummary>(
      '/me/albums',
      50,
      'fetchSavedAlbums',
      item => convertSpotifyAlbum(item.album)
    );
  }

  /**
   * Un álbum como playlist de origen; el id resultante lleva el prefijo de álbum
   */
  async fetchAlbum(idOrUrl: string): Promise<SourcePlaylist> {
    const albumId = parseSpotifyId(idOrUrl, 'album');

    const response = await this.errorHandler.executeWithRetry(
      () => this.client.get<SpotifyAlbum>(`/albums/${albumId}`),
      'spotify',
      'fetchAlbum'
    );

    const summary = convertSpotifyAlbum(response.data);
    const entries = await this.collectPages<SpotifyTrackResponse, TrackRef>(
      `/albums/${albumId}/tracks`,
      50,
      'fetchAlbumTracks',
      item => {
        const track = convertSpotifyTrack(item);
        return track ? { ...track, album: response.data.name } : null;
      }
    );

    return {
      id: summary.id,
      name: summary.name,
      description: summary.description,
      owner: summary.owner,
      isPublic: summary.isPublic,
      entries
    };
  }

  async fetchTrack(idOrUrl: string): Promise<TrackRef> {
    const trackId = parseSpotifyId(idOrUrl, 'track');

    const response = await this.errorHandler.executeWithRetry(
      () => this.client.get<SpotifyTrackResponse>(`/tracks/${trackId}`),
      'spotify',
      'fetchTrack'
    );

    const track = convertSpotifyTrack(response.data);
    if (!track) {
      throw new FatalConfigurationError(`La canción ${trackId} no está disponible en Spotify`, 'ID_INVALIDO');
    }

    return track;
  }

  private async collectPages<TItem, TResult>(
    path: string,
    limit: number,
    operationName: string,
    convert: (item: TItem) => TResult | null
  ): Promise<TResult[]> {
    const results: TResult[] = [];
    let url: string | null = path;
    let params: { limit: number } | undefined = { limit };

    while (url) {
      const pageUrl: string = url;
      const pageParams = params;
      const response = await this.errorHandler.executeWithRetry(
        () => this.client.get<SpotifyPage<TItem>>(pageUrl, { params: pageParams }),
        'spotify',
        operationName
      );

      for (const item of response.data.items) {
        const converted = convert(item);
        if (converted !== null) {
          results.push(converted);
        }
      }

      url = nextPage(response.data.next);
      params = undefined;
    }

    return results;
  }
}

function nextPage(next: string | null): string | null {
  return next ? next.replace(API_ROOT, '') : null;
}

function convertPlaylistItem(item: SpotifyPlaylist | null): PlaylistSummary | null {
  return item ? convertSpotifyPlaylist(item) : null;
}

/**
 * Convertir álbum de Spotify a resumen de playlist; el dueño es el artista principal
 */
export function convertSpotifyAlbum(album: SpotifyAlbum): PlaylistSummary {
  const artist = album.artists[0];
  const artistName = artist?.name ?? 'Desconocido';

  return {
    id: albumSourceId(album.id),
    name: album.name,
    description: `Álbum de ${artistName}`,
    owner: { id: artist?.id ?? '', displayName: artistName },
    isPublic: false,
    totalTracks: album.total_tracks,
  };
}

/**
 * Convertir playlist de Spotify al formato interno
 */
function convertSpotifyPlaylist(spotifyPlaylist: SpotifyPlaylist): PlaylistSummary {
  return {
    id: spotifyPlaylist.id,
    name: spotifyPlaylist.name,
    description: spotifyPlaylist.description || undefined,
    owner: {
      id: spotifyPlaylist.owner.id,
      displayName: spotifyPlaylist.owner.display_name || spotifyPlaylist.owner.id,
    },
    isPublic: spotifyPlaylist.public === true,
    totalTracks: spotifyPlaylist.tracks.total,
  };
}

/**
 * Convertir canción de Spotify al formato interno; el primer artista es el principal
 */
export function convertSpotifyTrack(spotifyTrack: SpotifyTrackResponse): TrackRef | null {
  const [mainArtist] = spotifyTrack.artists;
  if (!spotifyTrack.id || !mainArtist) {
    return null;
  }

  return {
    sourceId: spotifyTrack.id,
    title: spotifyTrack.name,
    artist: mainArtist.name,
    durationSeconds: Math.round(spotifyTrack.duration_ms / 1000),
    album: spotifyTrack.album?.name || undefined,
  };
}
