export interface TidalResourceIdentifier {
  id: string;
  type: string;
  meta?: {
    itemId?: string;
    addedAt?: string;
  };
}

export interface TidalLinks {
  self?: string;
  next?: string;
}

export interface TidalUserResponse {
  data: {
    id: string;
    type: string;
    attributes?: {
      country?: string;
      username?: string;
    };
  };
}

export interface TidalSearchTracksResponse {
  data: TidalResourceIdentifier[];
  links?: TidalLinks;
}

export interface TidalPlaylistItemsResponse {
  data: TidalResourceIdentifier[];
  links?: TidalLinks;
}

export interface TidalPlaylistAttributes {
  name: string;
  description?: string;
  numberOfItems?: number;
  accessType?: 'PUBLIC' | 'UNLISTED' | 'PRIVATE';
  createdAt?: string;
  lastModifiedAt?: string;
}

export interface TidalPlaylistResource {
  id: string;
  type: string;
  attributes: TidalPlaylistAttributes;
}

export interface TidalPlaylistResponse {
  data: TidalPlaylistResource;
}

export interface TidalUserPlaylistsResponse {
  data: TidalResourceIdentifier[];
  included?: TidalPlaylistResource[];
  links?: TidalLinks;
}

export interface TidalCreatePlaylistRequest {
  data: {
    attributes: {
      accessType: string;
      description: string;
      name: string;
    };
    type: 'playlists';
  };
}

export interface TidalRelationshipRequest {
  data: TidalResourceIdentifier[];
}

// Respuesta de /tracks/{id}?include=artists,albums
export interface TidalTrackResponse {
  data: {
    id: string;
    type: string;
    attributes: {
      title: string;
      version?: string | null;
      isrc?: string;
      duration: string; // ISO 8601, por ejemplo "PT2M39S"
      explicit: boolean;
      popularity?: number;
      availability?: string[];
    };
    relationships?: {
      albums?: { data: TidalResourceIdentifier[] };
      artists?: { data: TidalResourceIdentifier[] };
    };
  };
  included?: Array<{
    id: string;
    type: string;
    attributes: {
      name?: string; // artistas
      title?: string; // álbumes
      releaseDate?: string;
    };
  }>;
}
