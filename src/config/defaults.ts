/**
 * Configuración por defecto para el CLI
 */
export const DEFAULT_CONFIG = {
  // Archivo de credenciales por defecto
  CREDENTIALS_FILE: 'credentials.txt',

  // Archivos persistentes dentro del directorio de configuración
  CACHE_FILE: 'lookup.json',
  JOURNAL_FILE: 'playlist_operations.jsonl',
  NOT_FOUND_FILE: 'noresults.txt',

  // Configuración de reintentos
  MAX_RETRIES: 3,
  RETRY_BASE_DELAY: 1000,
  RETRY_MAX_DELAY: 30000,

  // Configuración de lotes (playlists por lote y segundos entre lotes)
  BATCH_SIZE: 5,
  BATCH_DELAY_SECONDS: 2,

  // Límites de la API de Tidal
  ADD_TRACKS_CHUNK: 20,
  SEARCH_CANDIDATES: 5,
  MAX_PLAYLIST_TRACKS: 5000,

  // Timeouts
  REQUEST_TIMEOUT: 10000,

  // Sincronización
  TOLERANCE: 0.9,
} as const;

export interface MatchWeights {
  title: number;
  artist: number;
  duration: number;
}

export interface MatchPolicy {
  weights: MatchWeights;
  threshold: number;
  // diferencia (segundos) con cercanía 1.0
  durationWindowSeconds: number;
  // por encima de esta diferencia el candidato se descarta
  maxDurationDiffSeconds: number;
}

/**
 * Pesos y umbral del matching. Título y artista dominan; la duración desempata o veta.
 */
export const DEFAULT_MATCH_POLICY: MatchPolicy = {
  weights: {
    title: 0.45,
    artist: 0.4,
    duration: 0.15
  },
  threshold: 0.75,
  durationWindowSeconds: 2,
  maxDurationDiffSeconds: 10
};

/**
 * Mensajes de ayuda y información
 */
export const HELP_MESSAGES = {
  DESCRIPTION: 'Migra y mantiene sincronizadas tus playlists de Spotify en Tidal',

  CREDENTIALS_MISSING: `
❌ No se encontró el archivo de credenciales.

Completá el archivo con tus tokens de acceso en este formato:

SPOTIFY_ACCESS_TOKEN = tu_token_de_spotify
TIDAL_ACCESS_TOKEN = tu_token_de_tidal

Los tokens se obtienen desde:
- Spotify: https://developer.spotify.com/dashboard
- Tidal: https://developer.tidal.com/
`
} as const;
