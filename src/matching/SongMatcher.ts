import { DEFAULT_MATCH_POLICY, MatchPolicy } from '../config/defaults.js';
import { TargetCatalog } from '../models/Catalog.js';
import { MatchResult, noMatch } from '../models/MatchResult.js';
import { describeTrack, TargetTrack, TrackRef } from '../models/Track.js';
import { FatalConfigurationError, TransientExternalError } from '../utils/ErrorHandler.js';
import { NotFoundSink } from '../utils/NotFoundLog.js';
import { cleanTitle, fingerprint } from './Fingerprint.js';
import { MatchCache } from './MatchCache.js';
import { selectBestCandidate } from './TrackScorer.js';

export interface SongMatcherOptions {
  // Consultar la cache antes de buscar; sin esto la cache solo se escribe
  useCached: boolean;
  policy?: MatchPolicy;
  clock?: () => Date;
}

export class SongMatcher {
  private readonly policy: MatchPolicy;
  private readonly clock: () => Date;

  constructor(
    private target: TargetCatalog,
    private cache: MatchCache,
    private notFound: NotFoundSink,
    private options: SongMatcherOptions
  ) {
    this.policy = options.policy ?? DEFAULT_MATCH_POLICY;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Encontrar la mejor coincidencia en el catálogo destino para una canción de origen.
   * Los errores transitorios y de configuración (credenciales vencidas) se propagan sin tocar la cache;
   * cualquier otro error es "sin coincidencia".
   */
  async findBestMatch(track: TrackRef): Promise<MatchResult> {
    const key = fingerprint(track);

    if (this.options.useCached) {
      const cached = this.cache.lookup(key);
      if (cached) {
        if (cached.targetId === null) {
          await this.notFound.record(track);
        }
        return cached;
      }
    }

    let result: MatchResult;

    try {
      const candidates = await this.target.search(buildSearchQuery(track));
      result = this.matchCandidates(track, candidates);
    } catch (error) {
      if (error instanceof TransientExternalError || error instanceof FatalConfigurationError) {
        throw error;
      }
      console.warn(`La búsqueda falló para "${describeTrack(track)}": ${error instanceof Error ? error.message : String(error)}`);
      result = noMatch(0, this.clock());
    }

    await this.cache.store(key, result);

    if (result.targetId === null) {
      await this.notFound.record(track);
    }

    return result;
  }

  /**
   * Elegir entre candidatos ya obtenidos, sin I/O
   */
  matchCandidates(track: TrackRef, candidates: TargetTrack[]): MatchResult {
    const best = selectBestCandidate(track, candidates, this.policy);
    const matchedAt = this.clock().toISOString();

    if (!best) {
      return { targetId: null, score: 0, matchedAt };
    }

    return { targetId: best.candidate.id, score: best.score, matchedAt };
  }
}

/**
 * Query de búsqueda: título limpio + artista
 */
export function buildSearchQuery(track: Pick<TrackRef, 'title' | 'artist'>): string {
  return `${cleanTitle(track.title)} ${track.artist}`
    .replace(/\s&\s/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
