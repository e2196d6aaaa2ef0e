/**
 * Resultado de emparejar una canción de origen contra el catálogo destino.
 * `targetId = null` significa "sin coincidencia aceptable" y también se guarda en cache.
 */
export interface MatchResult {
  targetId: string | null;
  score: number;
  matchedAt: string;
}

export type Fingerprint = string;

export function noMatch(score: number = 0, matchedAt: Date = new Date()): MatchResult {
  return { targetId: null, score, matchedAt: matchedAt.toISOString() };
}
