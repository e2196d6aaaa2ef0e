import { DEFAULT_MATCH_POLICY, MatchPolicy, MatchWeights } from '../config/defaults.js';
import { TargetTrack, TrackRef } from '../models/Track.js';
import { normalizeText, normalizeTitle } from './Fingerprint.js';

export interface ScoredCandidate {
  candidate: TargetTrack;
  score: number;
  index: number;
  durationDiff: number | null;
}

/**
 * Distancia de Levenshtein entre dos cadenas
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        current[j - 1] + 1, // inserción
        previous[j] + 1, // eliminación
        previous[j - 1] + substitution // sustitución
      );
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Similitud en [0,1] a partir de la distancia de Levenshtein
 */
export function stringSimilarity(a: string, b: string): number {
  if (a === b) return 1.0;
  if (a.length === 0 || b.length === 0) return 0.0;

  const distance = levenshteinDistance(a, b);
  return 1 - distance / Math.max(a.length, b.length);
}

export function titleSimilarity(sourceTitle: string, candidateTitle: string): number {
  return stringSimilarity(normalizeTitle(sourceTitle), normalizeTitle(candidateTitle));
}

/**
 * Mejor similitud entre el artista de origen y los artistas del candidato (individuales o juntos)
 */
export function artistSimilarity(sourceArtist: string, candidateArtists: string[]): number {
  if (candidateArtists.length === 0) return 0.0;

  const source = normalizeText(sourceArtist);
  const options = [...candidateArtists, candidateArtists.join(' ')];

  return options.reduce(
    (best, artist) => Math.max(best, stringSimilarity(source, normalizeText(artist))),
    0
  );
}

/**
 * 1.0 dentro de la ventana, decae linealmente hasta 0 en el máximo; null = vetado
 */
export function durationCloseness(
  diffSeconds: number,
  policy: Pick<MatchPolicy, 'durationWindowSeconds' | 'maxDurationDiffSeconds'> = DEFAULT_MATCH_POLICY
): number | null {
  const diff = Math.abs(diffSeconds);

  if (diff > policy.maxDurationDiffSeconds) return null;
  if (diff <= policy.durationWindowSeconds) return 1.0;

  const span = policy.maxDurationDiffSeconds - policy.durationWindowSeconds;
  return span > 0 ? (policy.maxDurationDiffSeconds - diff) / span : 0;
}

/**
 * Puntuación compuesta: promedio ponderado de título, artista y cercanía de duración
 */
export function compositeScore(
  titleSim: number,
  artistSim: number,
  closeness: number,
  weights: MatchWeights = DEFAULT_MATCH_POLICY.weights
): number {
  const total = weights.title + weights.artist + weights.duration;
  if (total <= 0) return 0;

  const score = (titleSim * weights.title + artistSim * weights.artist + closeness * weights.duration) / total;
  return Math.min(1.0, Math.max(0.0, score));
}

/**
 * Puntuar un candidato contra la canción de origen. Devuelve null si la duración lo veta.
 */
export function scoreCandidate(
  track: TrackRef,
  candidate: TargetTrack,
  policy: MatchPolicy = DEFAULT_MATCH_POLICY
): number | null {
  let closeness = 0.5; // neutral si falta la duración

  if (candidate.durationSeconds !== null) {
    const value = durationCloseness(candidate.durationSeconds - track.durationSeconds, policy);
    if (value === null) {
      return null;
    }
    closeness = value;
  }

  return compositeScore(
    titleSimilarity(track.title, candidate.title),
    artistSimilarity(track.artist, candidate.artists),
    closeness,
    policy.weights
  );
}

/**
 * Elegir el mejor candidato por encima del umbral.
 * Empates: gana la duración más cercana y después el que vino primero en la búsqueda.
 */
export function selectBestCandidate(
  track: TrackRef,
  candidates: TargetTrack[],
  policy: MatchPolicy = DEFAULT_MATCH_POLICY
): ScoredCandidate | null {
  let best: ScoredCandidate | null = null;

  for (const [index, candidate] of candidates.entries()) {
    const score = scoreCandidate(track, candidate, policy);
    if (score === null) {
      continue;
    }

    const durationDiff = candidate.durationSeconds === null
      ? null
      : Math.abs(candidate.durationSeconds - track.durationSeconds);

    if (best === null || score > best.score || (score === best.score && closerThan(durationDiff, best.durationDiff))) {
      best = { candidate, score, index, durationDiff };
    }
  }

  return best !== null && best.score >= policy.threshold ? best : null;
}

function closerThan(diff: number | null, other: number | null): boolean {
  if (diff === null) return false;
  if (other === null) return true;
  return diff < other;
}
