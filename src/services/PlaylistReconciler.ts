import { DEFAULT_CONFIG } from '../config/defaults.js';
import { SongMatcher } from '../matching/SongMatcher.js';
import { SourcePlaylist, TargetPlaylist } from '../models/Playlist.js';
import { TrackRef } from '../models/Track.js';

export interface ReconciliationPlan {
  toAdd: string[];
  toRemove: string[];
  unchanged: string[];
  // ids observados que no se desean pero se conservan por ser append-only
  retained: string[];
  unresolved: TrackRef[];
}

export interface ResolveProgress {
  current: number;
  total: number;
  matched: number;
  unmatched: number;
  track: TrackRef;
}

export type ResolveListener = (progress: ResolveProgress) => void;

export interface PlanOptions {
  tolerance: number;
  appendOnly: boolean;
  onProgress?: ResolveListener;
}

export interface ResolvedTracks {
  resolvedIds: string[];
  unresolved: TrackRef[];
}

/**
 * Calcular el plan a partir de ids ya resueltos. Puro.
 */
export function computePlan(
  resolvedIds: string[],
  observedIds: string[],
  appendOnly: boolean = false,
  unresolved: TrackRef[] = []
): ReconciliationPlan {
  const desired = dedupe(resolvedIds);
  const observed = dedupe(observedIds);
  const desiredSet = new Set(desired);
  const observedSet = new Set(observed);

  const extras = observed.filter(id => !desiredSet.has(id));

  return {
    toAdd: desired.filter(id => !observedSet.has(id)),
    toRemove: appendOnly ? [] : extras,
    unchanged: desired.filter(id => observedSet.has(id)),
    retained: appendOnly ? extras : [],
    unresolved
  };
}

/**
 * La playlist se considera al día si |unchanged| / |desired resueltos| >= tolerancia.
 * Sin canciones resueltas no hay nada que escribir.
 */
export function isUpToDate(plan: Pick<ReconciliationPlan, 'toAdd' | 'unchanged'>, tolerance: number): boolean {
  const resolvedDesired = plan.toAdd.length + plan.unchanged.length;
  if (resolvedDesired === 0) {
    return true;
  }

  return plan.unchanged.length / resolvedDesired >= tolerance;
}

export function hasChanges(plan: Pick<ReconciliationPlan, 'toAdd' | 'toRemove'>): boolean {
  return plan.toAdd.length > 0 || plan.toRemove.length > 0;
}

export class PlaylistReconciler {
  constructor(private matcher: SongMatcher) {}

  /**
   * Resolver cada canción deseada a un id del destino, en orden
   */
  async resolve(desired: SourcePlaylist, onProgress?: ResolveListener): Promise<ResolvedTracks> {
    const resolvedIds: string[] = [];
    const unresolved: TrackRef[] = [];

    for (const [index, track] of desired.entries.entries()) {
      const match = await this.matcher.findBestMatch(track);
      if (match.targetId === null) {
        unresolved.push(track);
      } else {
        resolvedIds.push(match.targetId);
      }

      onProgress?.({
        current: index + 1,
        total: desired.entries.length,
        matched: resolvedIds.length,
        unmatched: unresolved.length,
        track
      });
    }

    return { resolvedIds: dedupe(resolvedIds), unresolved };
  }

  async plan(
    desired: SourcePlaylist,
    observed: TargetPlaylist,
    options: PlanOptions = { tolerance: DEFAULT_CONFIG.TOLERANCE, appendOnly: false }
  ): Promise<ReconciliationPlan & { upToDate: boolean }> {
    const { resolvedIds, unresolved } = await this.resolve(desired, options.onProgress);
    const plan = computePlan(resolvedIds, observed.entries, options.appendOnly, unresolved);

    return { ...plan, upToDate: isUpToDate(plan, options.tolerance) };
  }
}

function dedupe(ids: string[]): string[] {
  return [...new Set(ids)];
}
