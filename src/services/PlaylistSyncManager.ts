import chalk from 'chalk';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { SongMatcher } from '../matching/SongMatcher.js';
import { SourceCatalog, TargetCatalog } from '../models/Catalog.js';
import { JournalEntry, JournalPlaylistRef, JournalTrackRef, OperationKind } from '../models/Journal.js';
import { MatchResult } from '../models/MatchResult.js';
import { albumIdFromSource, LIKED_PLAYLIST_ID, PlaylistSummary, SourcePlaylist } from '../models/Playlist.js';
import { describeTrack, TrackRef } from '../models/Track.js';
import { FatalConfigurationError, PermanentExternalError, SleepFn, UnitFailure } from '../utils/ErrorHandler.js';
import { NotFoundLog } from '../utils/NotFoundLog.js';
import { OperationJournal, TrackedPlaylist } from '../utils/OperationJournal.js';
import { findSimilarName } from '../utils/playlistNames.js';
import { PlaylistSyncResult, ProgressReporter } from '../utils/ProgressReporter.js';
import { BatchScheduler, countOutcomes, Outcome } from './BatchScheduler.js';
import { computePlan, PlaylistReconciler, ReconciliationPlan } from './PlaylistReconciler.js';

export interface CreateOptions {
  name?: string;
  info?: string;
  date?: boolean;
  public?: boolean;
  like?: boolean;
}

export interface UpdateOptions {
  appendOnly: boolean;
  tolerance: number;
}

export interface BatchRunOptions {
  batchSize: number;
  delaySeconds: number;
}

export interface SyncManagerDeps {
  source: SourceCatalog;
  target: TargetCatalog;
  matcher: SongMatcher;
  journal: OperationJournal;
  notFound: NotFoundLog;
  reporter: ProgressReporter;
  confirm: (message: string) => Promise<boolean>;
  clock?: () => Date;
  sleep?: SleepFn;
}

export interface InitialSetupSummary {
  linked: number;
  alreadyTracked: number;
  unmatched: number;
}

export interface AppliedPlan {
  added: number;
  removed: number;
}

export class PlaylistSyncManager {
  private readonly reconciler: PlaylistReconciler;
  private readonly clock: () => Date;

  constructor(private deps: SyncManagerDeps) {
    this.reconciler = new PlaylistReconciler(deps.matcher);
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Crear en el destino una playlist nueva con las canciones encontradas
   */
  async createFromSource(playlist: SourcePlaylist, options: CreateOptions = {}): Promise<PlaylistSyncResult> {
    const { target, reporter } = this.deps;
    const name = (options.name ?? playlist.name) + (options.date ? ` ${formatDate(this.clock())}` : '');
    const description = options.info ?? playlist.description ?? '';

    reporter.startProgress(playlist.entries.length, name);

    try {
      const { resolvedIds, unresolved } = await this.reconciler.resolve(
        playlist,
        progress => reporter.updateProgress(progress)
      );

      let targetId: string;
      try {
        targetId = await target.createPlaylist(name, description, options.public ? 'PUBLIC' : 'PRIVATE');
      } catch (error) {
        await this.record('create', { targetId: '', targetName: name, sourceId: playlist.id, sourceName: playlist.name }, null, error);
        throw error;
      }

      const ref: JournalPlaylistRef = { targetId, targetName: name, sourceId: playlist.id, sourceName: playlist.name };
      await this.record('create', ref, null);

      const applied = await this.applyPlan(ref, computePlan(resolvedIds, [], false, unresolved));

      if (options.like) {
        await this.likeTracks(ref, resolvedIds);
      }

      const result: PlaylistSyncResult = {
        playlistName: name,
        targetId,
        action: 'created',
        totalTracks: playlist.entries.length,
        matchedTracks: resolvedIds.length,
        unmatchedTracks: unresolved.length,
        added: applied.added,
        removed: applied.removed
      };

      reporter.finishProgress(result, target.playlistUrl(targetId));
      this.reportUnmatched(unresolved.length);
      return result;
    } catch (error) {
      reporter.failProgress(`❌ No se pudo crear "${name}": ${errorMessage(error)}`);
      throw error;
    }
  }

  async create(playlistIdOrUrl: string, options: CreateOptions = {}): Promise<PlaylistSyncResult> {
    const playlist = await this.deps.source.fetchPlaylist(playlistIdOrUrl);
    return this.createFromSource(playlist, options);
  }

  async liked(options: CreateOptions = {}): Promise<PlaylistSyncResult> {
    const playlist = await this.deps.source.fetchLikedTracks();
    return this.createFromSource(playlist, options);
  }

  /**
   * Actualizar una playlist existente del destino (buscada por nombre) a partir de una de origen
   */
  async update(playlistIdOrUrl: string, targetName: string, options: UpdateOptions): Promise<PlaylistSyncResult> {
    const playlist = await this.deps.source.fetchPlaylist(playlistIdOrUrl);
    const existing = await this.deps.target.listPlaylists();
    const match = existing.find(candidate => candidate.name.toLowerCase() === targetName.toLowerCase());

    if (!match) {
      const failure = new UnitFailure(`No existe una playlist llamada "${targetName}" en el destino`);
      await this.record('update', { targetId: '', targetName, sourceId: playlist.id, sourceName: playlist.name }, null, failure);
      throw failure;
    }

    return this.syncExisting(
      playlist,
      { targetId: match.id, targetName: match.name, sourceId: playlist.id, sourceName: playlist.name },
      options
    );
  }

  /**
   * Reconciliar una playlist ya existente: primero se quitan las sobrantes y después se agregan las faltantes
   */
  async syncExisting(playlist: SourcePlaylist, ref: JournalPlaylistRef, options: UpdateOptions): Promise<PlaylistSyncResult> {
    const { target, reporter } = this.deps;

    reporter.startProgress(playlist.entries.length, ref.targetName);

    try {
      const observed = await target.listPlaylistTracks(ref.targetId);
      const plan = await this.reconciler.plan(
        playlist,
        { id: ref.targetId, name: ref.targetName, owner: { id: '', displayName: '' }, isPublic: false, entries: observed },
        { ...options, onProgress: progress => reporter.updateProgress(progress) }
      );

      const result: PlaylistSyncResult = {
        playlistName: ref.targetName,
        targetId: ref.targetId,
        action: 'skipped',
        totalTracks: playlist.entries.length,
        matchedTracks: plan.toAdd.length + plan.unchanged.length,
        unmatchedTracks: plan.unresolved.length,
        added: 0,
        removed: 0
      };

      if (plan.upToDate) {
        await this.recordUnresolved(ref, plan.unresolved);
        result.reason = `al día (${plan.unchanged.length}/${result.matchedTracks} canciones, tolerancia ${Math.round(options.tolerance * 100)}%)`;
        reporter.finishProgress(result);
        this.reportUnmatched(plan.unresolved.length);
        return result;
      }

      const applied = await this.applyPlan(ref, plan);
      await this.record('update', ref, null, undefined, `+${applied.added} -${applied.removed}`);

      result.action = 'updated';
      result.added = applied.added;
      result.removed = applied.removed;

      reporter.finishProgress(result, target.playlistUrl(ref.targetId));
      this.reportUnmatched(plan.unresolved.length);
      return result;
    } catch (error) {
      reporter.failProgress(`❌ No se pudo actualizar "${ref.targetName}": ${errorMessage(error)}`);
      await this.record('update', ref, null, error);
      throw error;
    }
  }

  /**
   * Ejecutar un plan contra el destino, registrando cada canción quitada y agregada
   */
  async applyPlan(ref: JournalPlaylistRef, plan: ReconciliationPlan): Promise<AppliedPlan> {
    const { target } = this.deps;

    if (plan.toRemove.length > 0) {
      try {
        await target.removeTracks(ref.targetId, plan.toRemove);
      } catch (error) {
        await this.recordEach('remove', ref, plan.toRemove, error);
        throw error;
      }
      await this.recordEach('remove', ref, plan.toRemove);
    }

    if (plan.toAdd.length > 0) {
      try {
        await target.addTracks(ref.targetId, plan.toAdd);
      } catch (error) {
        await this.recordEach('add', ref, plan.toAdd, error);
        throw error;
      }
      await this.recordEach('add', ref, plan.toAdd);
    }

    await this.recordUnresolved(ref, plan.unresolved);

    return { added: plan.toAdd.length, removed: plan.toRemove.length };
  }

  /**
   * Migrar todas las playlists públicas de un usuario de origen
   */
  async all(userId: string, options: CreateOptions, batch: BatchRunOptions): Promise<Outcome<PlaylistSyncResult>[]> {
    const summaries = await this.deps.source.fetchUserPlaylists(userId);
    this.deps.reporter.log(`${summaries.length} playlists encontradas. Empezando la migración...`);

    return this.runBatch('Migración completa', summaries, batch, async summary => {
      const playlist = await this.deps.source.fetchPlaylist(summary.id);
      const result = await this.createFromSource(playlist, {
        like: options.like,
        public: options.public ?? summary.isPublic
      });
      return { status: 'success', value: result };
    });
  }

  /**
   * Migrar las playlists y álbumes guardados (y opcionalmente las playlists de otro usuario), salteando las que ya
   * tienen una playlist de nombre parecido en el destino o son demasiado grandes
   */
  async allSaved(options: CreateOptions & { targetUser?: string }, batch: BatchRunOptions): Promise<Outcome<PlaylistSyncResult>[]> {
    const { target, reporter } = this.deps;
    const candidates = await this.collectSourcePlaylists(options.targetUser);
    const existing = await target.listPlaylists();
    const existingNames = existing.map(playlist => playlist.name);

    reporter.log(`Total: ${candidates.length} playlists para procesar. Empezando la migración...`);

    return this.runBatch('Migración de playlists guardadas', candidates, batch, async summary => {
      const similar = findSimilarName(summary.name, existingNames, name => name);
      if (similar !== undefined) {
        const reason = similar === summary.name ? 'ya existe' : `parecida a "${similar}"`;
        reporter.log(`⏭️  "${summary.name}": ${reason}`);
        return { status: 'skipped', reason };
      }

      if (summary.totalTracks > DEFAULT_CONFIG.MAX_PLAYLIST_TRACKS) {
        const reason = `demasiado grande (${summary.totalTracks} canciones)`;
        reporter.log(`⏭️  "${summary.name}": ${reason}`);
        return { status: 'skipped', reason };
      }

      const playlist = await this.fetchSource(summary.id);
      const result = await this.createFromSource(playlist, { public: options.public, like: options.like });
      existingNames.push(result.playlistName);
      return { status: 'success', value: result };
    });
  }

  /**
   * Actualizar todas las playlists registradas en el journal contra su origen
   */
  async updateAll(options: UpdateOptions, batch: BatchRunOptions): Promise<Outcome<PlaylistSyncResult>[]> {
    const { journal, reporter } = this.deps;
    const tracked = journal.trackedPlaylists();

    if (tracked.length === 0) {
      reporter.log('❌ No hay playlists registradas. Ejecutá "initial-setup" o creá alguna con "create" primero.');
      return [];
    }

    reporter.log(`📋 ${tracked.length} playlists registradas`);

    return this.runBatch('Actualización completa', tracked, batch, async entry => {
      let playlist: SourcePlaylist;
      try {
        playlist = await this.fetchSource(entry.sourceId);
      } catch (error) {
        if (error instanceof PermanentExternalError) {
          const reason = `la playlist de origen "${entry.sourceName ?? entry.sourceId}" ya no existe`;
          reporter.log(`⚠️  ${entry.targetName}: ${reason}`);
          return { status: 'skipped', reason };
        }
        throw error;
      }

      const result = await this.syncExisting(playlist, toRef(entry), options);
      return result.action === 'skipped'
        ? { status: 'skipped', reason: result.reason ?? 'sin cambios' }
        : { status: 'success', value: result };
    });
  }

  /**
   * Asociar playlists del destino que todavía no están registradas con playlists de origen de nombre parecido
   */
  async initialSetup(options: { targetUser?: string } = {}): Promise<InitialSetupSummary> {
    const { target, journal, reporter } = this.deps;

    reporter.log('🔍 Buscando playlists existentes en el destino...');
    const targets = await target.listPlaylists();
    const sources = await this.collectSourcePlaylists(options.targetUser);
    const trackedIds = new Set(journal.trackedPlaylists().map(entry => entry.targetId));

    const summary: InitialSetupSummary = { linked: 0, alreadyTracked: 0, unmatched: 0 };

    for (const playlist of targets) {
      if (trackedIds.has(playlist.id)) {
        reporter.log(`⏭️  "${playlist.name}" ya está registrada`);
        summary.alreadyTracked++;
        continue;
      }

      const match = findSimilarName(playlist.name, sources, candidate => candidate.name);
      if (!match) {
        reporter.log(`❓ "${playlist.name}" sin playlist de origen parecida`);
        summary.unmatched++;
        continue;
      }

      await this.record(
        'link',
        { targetId: playlist.id, targetName: playlist.name, sourceId: match.id, sourceName: match.name },
        null,
        undefined,
        `origen: ${match.totalTracks} canciones, destino: ${playlist.totalTracks} canciones`
      );
      reporter.log(`✅ "${playlist.name}" → origen: "${match.name}"`);
      summary.linked++;
    }

    reporter.log(`\n📊 Asociadas: ${summary.linked}, ya registradas: ${summary.alreadyTracked}, sin asociar: ${summary.unmatched}`);
    return summary;
  }

  /**
   * Buscar una sola canción de origen en el destino
   */
  async search(trackIdOrUrl: string): Promise<{ track: TrackRef; match: MatchResult }> {
    const track = await this.deps.source.fetchTrack(trackIdOrUrl);
    const match = await this.deps.matcher.findBestMatch(track);

    if (match.targetId === null) {
      this.deps.reporter.log(chalk.yellow(`❌ Sin coincidencia para "${describeTrack(track)}"`));
    } else {
      this.deps.reporter.log(`${chalk.green('✅')} ${describeTrack(track)} (${Math.round(match.score * 100)}%)`);
      this.deps.reporter.log(`   🔗 ${chalk.cyan(this.deps.target.trackUrl(match.targetId))}`);
    }

    return { track, match };
  }

  /**
   * Borrar las playlists del destino cuyo nombre coincide con una expresión regular
   */
  async remove(pattern: string, options: { yes?: boolean } = {}): Promise<string[]> {
    const { target, reporter } = this.deps;

    let regex: RegExp;
    try {
      regex = new RegExp(pattern);
    } catch (error) {
      throw new FatalConfigurationError(`Expresión regular inválida: ${pattern}`, 'PATRON_INVALIDO', error instanceof Error ? error : undefined);
    }

    const matches = (await target.listPlaylists()).filter(playlist => regex.test(playlist.name));
    if (matches.length === 0) {
      reporter.log('No hay playlists que coincidan con el patrón.');
      return [];
    }

    reporter.log('Se van a borrar estas playlists:');
    for (const playlist of matches) {
      reporter.log(`  - ${playlist.name}`);
    }

    const confirmed = options.yes === true || await this.deps.confirm(`¿Borrar ${matches.length} playlists?`);
    if (!confirmed) {
      reporter.log('Operación cancelada.');
      return [];
    }

    const removed: string[] = [];
    for (const playlist of matches) {
      await target.deletePlaylist(playlist.id);
      reporter.log(`🗑️  ${playlist.name}`);
      removed.push(playlist.id);
    }

    return removed;
  }

  private async collectSourcePlaylists(targetUser?: string): Promise<PlaylistSummary[]> {
    const { source, reporter } = this.deps;
    const saved = await source.fetchSavedPlaylists();
    reporter.log(`${saved.length} playlists guardadas en el origen`);

    let albums: PlaylistSummary[] = [];
    try {
      albums = await source.fetchSavedAlbums();
      reporter.log(`${albums.length} álbumes guardados en el origen`);
    } catch (error) {
      if (!(error instanceof PermanentExternalError)) {
        throw error;
      }
      reporter.log(chalk.yellow(`⚠️  No se pudieron obtener los álbumes guardados: ${error.message}`));
    }

    const extra = targetUser ? await source.fetchUserPlaylists(targetUser) : [];
    if (targetUser) {
      reporter.log(`${extra.length} playlists públicas del usuario "${targetUser}"`);
    }

    const seen = new Set<string>();
    return [...saved, ...albums, ...extra].filter(playlist => {
      if (seen.has(playlist.id)) {
        return false;
      }
      seen.add(playlist.id);
      return true;
    });
  }

  /**
   * Traer un origen por su id registrado: canciones guardadas, álbum o playlist
   */
  private async fetchSource(sourceId: string): Promise<SourcePlaylist> {
    const { source } = this.deps;

    if (sourceId === LIKED_PLAYLIST_ID) {
      return source.fetchLikedTracks();
    }

    const albumId = albumIdFromSource(sourceId);
    return albumId === null ? source.fetchPlaylist(sourceId) : source.fetchAlbum(albumId);
  }

  private async runBatch<I>(
    title: string,
    items: readonly I[],
    batch: BatchRunOptions,
    worker: (item: I) => Promise<{ status: 'success'; value: PlaylistSyncResult } | { status: 'skipped'; reason: string }>
  ): Promise<Outcome<PlaylistSyncResult>[]> {
    const startedAt = Date.now();
    const scheduler = new BatchScheduler({ ...batch, sleep: this.deps.sleep });
    const outcomes = await scheduler.runInBatches(items, worker);

    this.deps.reporter.displayBatchSummary({
      title,
      ...countOutcomes(outcomes),
      processingTime: Date.now() - startedAt
    });

    return outcomes;
  }

  private reportUnmatched(count: number): void {
    if (count > 0) {
      this.deps.reporter.log(chalk.gray(`   ${count} canciones sin coincidencia anotadas en ${this.deps.notFound.location}`));
    }
  }

  private async recordUnresolved(ref: JournalPlaylistRef, unresolved: TrackRef[]): Promise<void> {
    for (const track of unresolved) {
      await this.record('match-fail', ref, { sourceId: track.sourceId, label: describeTrack(track) }, undefined, 'sin coincidencia aceptable');
    }
  }

  private async likeTracks(ref: JournalPlaylistRef, trackIds: string[]): Promise<void> {
    if (trackIds.length === 0) {
      return;
    }

    try {
      await this.deps.target.rateTracks(trackIds);
    } catch (error) {
      await this.recordEach('like', ref, trackIds, error);
      throw error;
    }
    await this.recordEach('like', ref, trackIds);
  }

  private async recordEach(kind: OperationKind, ref: JournalPlaylistRef, trackIds: string[], error?: unknown): Promise<void> {
    for (const targetId of trackIds) {
      await this.record(kind, ref, { targetId }, error);
    }
  }

  private async record(
    kind: OperationKind,
    playlist: JournalPlaylistRef,
    track: JournalTrackRef | null,
    error?: unknown,
    detail?: string
  ): Promise<void> {
    const entry: JournalEntry = {
      timestamp: this.clock().toISOString(),
      kind,
      playlist,
      track,
      outcome: error === undefined ? 'success' : 'failure'
    };

    const message = error === undefined ? detail : errorMessage(error);
    if (message !== undefined) {
      entry.detail = message;
    }

    await this.deps.journal.append(entry);
  }
}

function toRef(entry: TrackedPlaylist): JournalPlaylistRef {
  return {
    targetId: entry.targetId,
    targetName: entry.targetName,
    sourceId: entry.sourceId,
    sourceName: entry.sourceName
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fecha MM/DD/YYYY para el sufijo --date
 */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${month}/${day}/${date.getFullYear()}`;
}
