import { Fingerprint } from '../models/MatchResult.js';
import { TrackRef } from '../models/Track.js';

// Sufijos tipo "Song - Remastered 2011" o "Song - Live at Wembley"
const VERSION_SUFFIX = /\s+-\s+.*\b(remaster(ed)?|live|version|edit|mix|mono|stereo|acoustic)\b.*$/i;

/**
 * Quitar acentos y diacríticos ("Beyoncé" -> "Beyonce")
 */
export function stripDiacritics(value: string): string {
  return value.normalize('NFD').replace(/\p{M}/gu, '');
}

/**
 * Limpiar título removiendo "(feat. ...)", "[Remix]", "(Remastered)" y sufijos de versión
 */
export function cleanTitle(title: string): string {
  return title
    .replace(/\s*[([][^)\]]*[)\]]/g, '')
    .replace(VERSION_SUFFIX, '')
    .replace(/\s+feat\.?\s+.*$/i, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Normalizar una cadena para comparación: minúsculas, sin diacríticos ni puntuación
 */
export function normalizeText(value: string): string {
  return stripDiacritics(value)
    .toLowerCase()
    .replace(/['’`]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function normalizeTitle(title: string): string {
  const cleaned = cleanTitle(title);
  // Si el título era solo un paréntesis, no lo dejamos vacío
  return normalizeText(cleaned.length > 0 ? cleaned : title);
}

/**
 * Clave de cache derivada de (título, artista). Pura y determinística.
 */
export function fingerprint(track: Pick<TrackRef, 'title' | 'artist'>): Fingerprint {
  return `${normalizeText(track.artist)}|${normalizeTitle(track.title)}`;
}
