import axios, { AxiosInstance } from 'axios';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { TargetCatalog } from '../models/Catalog.js';
import { PlaylistSummary, Visibility } from '../models/Playlist.js';
import { TargetTrack } from '../models/Track.js';
import {
  TidalCreatePlaylistRequest,
  TidalPlaylistItemsResponse,
  TidalPlaylistResponse,
  TidalRelationshipRequest,
  TidalResourceIdentifier,
  TidalSearchTracksResponse,
  TidalTrackResponse,
  TidalUserPlaylistsResponse,
  TidalUserResponse
} from '../models/TidalTypes.js';
import { ErrorHandler, PermanentExternalError } from '../utils/ErrorHandler.js';

const BASE_URL = 'https://openapi.tidal.com/v2';

export interface TidalServiceOptions {
  client?: AxiosInstance;
  errorHandler?: ErrorHandler;
}

interface TidalUserInfo {
  id: string;
  countryCode: string;
  username: string;
}

/**
 * Servicio para interactuar con la API de Tidal (OpenAPI v2, formato JSON:API)
 */
export class TidalService implements TargetCatalog {
  private client: AxiosInstance;
  private errorHandler: ErrorHandler;
  private userInfo?: TidalUserInfo;

  constructor(accessToken: string, options: TidalServiceOptions = {}) {
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.client = options.client ?? axios.create({
      baseURL: BASE_URL,
      headers: {
        'Authorization': `Bearer ${accessToken}`,
        'Accept': 'application/vnd.api+json',
        'Content-Type': 'application/vnd.api+json'
      },
      timeout: DEFAULT_CONFIG.REQUEST_TIMEOUT
    });
  }

  /**
   * Conseguir información del usuario actual (ID y country code). Se pide una sola vez.
   */
  async getUserInfo(): Promise<TidalUserInfo> {
    if (this.userInfo) {
      return this.userInfo;
    }

    const userInfo = await this.errorHandler.executeWithRetry(async () => {
      const response = await this.client.get<TidalUserResponse>('/users/me');
      const userData = response.data.data;

      return {
        id: userData.id,
        countryCode: userData.attributes?.country || 'US', // Default a US si no hay country
        username: userData.attributes?.username || userData.id
      };
    }, 'tidal', 'getUserInfo');

    this.userInfo = userInfo;
    return userInfo;
  }

  /**
   * Buscar canciones y traer el detalle de los primeros resultados
   */
  async search(query: string): Promise<TargetTrack[]> {
    const { countryCode } = await this.getUserInfo();
    const encodedQuery = encodeURIComponent(query).replace(/'/g, '%27');

    const response = await this.errorHandler.executeWithRetry(
      () => this.client.get<TidalSearchTracksResponse>(`/searchResults/${encodedQuery}/relationships/tracks`, {
        params: { countryCode }
      }),
      'tidal',
      'search'
    );

    const ids = response.data.data
      .filter(item => item.type === 'tracks')
      .slice(0, DEFAULT_CONFIG.SEARCH_CANDIDATES)
      .map(item => item.id);

    const candidates: TargetTrack[] = [];
    for (const id of ids) {
      const track = await this.getTrack(id);
      if (track) {
        candidates.push(track);
      }
    }

    return candidates;
  }

  /**
   * Detalle de una canción; null si Tidal la rechaza (por ejemplo, no disponible en el país)
   */
  async getTrack(trackId: string): Promise<TargetTrack | null> {
    const { countryCode } = await this.getUserInfo();

    try {
      const response = await this.errorHandler.executeWithRetry(
        () => this.client.get<TidalTrackResponse>(`/tracks/${trackId}`, {
          params: { countryCode, include: 'artists,albums' }
        }),
        'tidal',
        'getTrack'
      );

      return convertTidalTrack(response.data);
    } catch (error) {
      if (error instanceof PermanentExternalError) {
        console.log(`❌ Track ${trackId} no encontrado o no disponible`);
        return null;
      }
      throw error;
    }
  }

  async createPlaylist(name: string, description: string, visibility: Visibility): Promise<string> {
    const { countryCode } = await this.getUserInfo();

    const requestData: TidalCreatePlaylistRequest = {
      data: {
        attributes: {
          accessType: visibility === 'PUBLIC' ? 'PUBLIC' : 'UNLISTED',
          description,
          name
        },
        type: 'playlists'
      }
    };

    const response = await this.errorHandler.executeWithRetry(
      () => this.client.post<TidalPlaylistResponse>('/playlists', requestData, { params: { countryCode } }),
      'tidal',
      'createPlaylist'
    );

    console.log(`✅ Playlist creada: ${name}`);
    return response.data.data.id;
  }

  async addTracks(playlistId: string, trackIds: string[]): Promise<void> {
    const { countryCode } = await this.getUserInfo();

    // La API acepta hasta 20 canciones por request
    for (const chunk of chunked(trackIds, DEFAULT_CONFIG.ADD_TRACKS_CHUNK)) {
      const requestData: TidalRelationshipRequest = {
        data: chunk.map(id => ({ id, type: 'tracks' }))
      };

      await this.errorHandler.executeWithRetry(
        () => this.client.post(`/playlists/${playlistId}/relationships/items`, requestData, { params: { countryCode } }),
        'tidal',
        'addTracks'
      );
    }
  }

  /**
   * Quitar canciones de una playlist. Tidal identifica cada aparición por su `itemId`,
   * así que primero se listan los items para resolverlo.
   */
  async removeTracks(playlistId: string, trackIds: string[]): Promise<void> {
    if (trackIds.length === 0) {
      return;
    }

    const { countryCode } = await this.getUserInfo();
    const wanted = new Set(trackIds);
    const items = (await this.listPlaylistItems(playlistId)).filter(item => wanted.has(item.id));

    for (const chunk of chunked(items, DEFAULT_CONFIG.ADD_TRACKS_CHUNK)) {
      const requestData: TidalRelationshipRequest = {
        data: chunk.map(item => ({ id: item.id, type: 'tracks', meta: { itemId: item.meta?.itemId } }))
      };

      await this.errorHandler.executeWithRetry(
        () => this.client.delete(`/playlists/${playlistId}/relationships/items`, {
          data: requestData,
          params: { countryCode }
        }),
        'tidal',
        'removeTracks'
      );
    }
  }

  async listPlaylistTracks(playlistId: string): Promise<string[]> {
    const items = await this.listPlaylistItems(playlistId);
    return items.filter(item => item.type === 'tracks').map(item => item.id);
  }

  /**
   * Marcar canciones como favoritas en la colección del usuario
   */
  async rateTracks(trackIds: string[]): Promise<void> {
    const { id: userId, countryCode } = await this.getUserInfo();

    for (const chunk of chunked(trackIds, DEFAULT_CONFIG.ADD_TRACKS_CHUNK)) {
      const requestData: TidalRelationshipRequest = {
        data: chunk.map(id => ({ id, type: 'tracks' }))
      };

      await this.errorHandler.executeWithRetry(
        () => this.client.post(`/userCollections/${userId}/relationships/tracks`, requestData, { params: { countryCode } }),
        'tidal',
        'rateTracks'
      );
    }
  }

  /**
   * Playlists de la colección del usuario
   */
  async listPlaylists(): Promise<PlaylistSummary[]> {
    const user = await this.getUserInfo();
    const playlists: PlaylistSummary[] = [];
    let url: string | null = `/userCollections/${user.id}/relationships/playlists`;
    let params: Record<string, string> | undefined = { countryCode: user.countryCode, include: 'playlists' };

    while (url) {
      const pageUrl: string = url;
      const pageParams = params;
      const response = await this.errorHandler.executeWithRetry(
        () => this.client.get<TidalUserPlaylistsResponse>(pageUrl, { params: pageParams }),
        'tidal',
        'listPlaylists'
      );

      for (const item of response.data.included ?? []) {
        if (item.type !== 'playlists') {
          continue;
        }

        playlists.push({
          id: item.id,
          name: item.attributes.name,
          description: item.attributes.description || undefined,
          owner: { id: user.id, displayName: user.username },
          isPublic: item.attributes.accessType === 'PUBLIC',
          totalTracks: item.attributes.numberOfItems ?? 0
        });
      }

      // El link `next` ya trae los parámetros de la página siguiente
      url = response.data.links?.next ?? null;
      params = undefined;
    }

    return playlists;
  }

  async deletePlaylist(playlistId: string): Promise<void> {
    await this.errorHandler.executeWithRetry(
      () => this.client.delete(`/playlists/${playlistId}`),
      'tidal',
      'deletePlaylist'
    );
  }

  trackUrl(trackId: string): string {
    return `https://tidal.com/browse/track/${trackId}`;
  }

  playlistUrl(playlistId: string): string {
    return `https://tidal.com/browse/playlist/${playlistId}`;
  }

  private async listPlaylistItems(playlistId: string): Promise<TidalResourceIdentifier[]> {
    const { countryCode } = await this.getUserInfo();
    const items: TidalResourceIdentifier[] = [];
    let url: string | null = `/playlists/${playlistId}/relationships/items`;
    let params: Record<string, string> | undefined = { countryCode };

    while (url) {
      const pageUrl: string = url;
      const pageParams = params;
      const response = await this.errorHandler.executeWithRetry(
        () => this.client.get<TidalPlaylistItemsResponse>(pageUrl, { params: pageParams }),
        'tidal',
        'listPlaylistItems'
      );

      items.push(...response.data.data);
      url = response.data.links?.next ?? null;
      params = undefined;
    }

    return items;
  }
}

/**
 * Duración ISO 8601 de Tidal ("PT3M25S", "PT1H2M") a segundos
 */
export function parseIsoDuration(value: string | undefined): number | null {
  if (!value) {
    return null;
  }

  const match = /^PT(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?$/.exec(value);
  if (!match || (!match[1] && !match[2] && !match[3])) {
    return null;
  }

  const hours = Number(match[1] ?? 0);
  const minutes = Number(match[2] ?? 0);
  const seconds = Number(match[3] ?? 0);

  return Math.round(hours * 3600 + minutes * 60 + seconds);
}

export function convertTidalTrack(response: TidalTrackResponse): TargetTrack {
  const included = response.included ?? [];
  const artistOrder = response.data.relationships?.artists?.data.map(artist => artist.id) ?? [];

  // Respetar el orden de la relación (artista principal primero)
  const artists = included
    .filter(item => item.type === 'artists')
    .sort((a, b) => orderOf(artistOrder, a.id) - orderOf(artistOrder, b.id))
    .map(artist => artist.attributes.name || 'Unknown Artist');

  const { title, version } = response.data.attributes;

  return {
    id: response.data.id,
    title: version ? `${title} (${version})` : title,
    artists,
    durationSeconds: parseIsoDuration(response.data.attributes.duration)
  };
}

function orderOf(order: string[], id: string): number {
  const index = order.indexOf(id);
  return index === -1 ? order.length : index;
}

function chunked<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
