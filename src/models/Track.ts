/**
 * Canción de origen tal como llega del catálogo fuente.
 * La identidad es `sourceId`; para el matching la igualdad es difusa.
 */
export interface TrackRef {
  sourceId: string;
  title: string;
  artist: string;
  durationSeconds: number; // en segundos
  album?: string;
}

/**
 * Candidato devuelto por la búsqueda del catálogo destino
 */
export interface TargetTrack {
  id: string;
  title: string;
  artists: string[];
  durationSeconds: number | null; // null si el catálogo no informa duración
}

export function describeTrack(track: Pick<TrackRef, 'artist' | 'title'>): string {
  return `${track.artist} - ${track.title}`;
}
