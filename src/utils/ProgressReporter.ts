import { createSpinner } from 'nanospinner';
import chalk from 'chalk';
import { JournalStats } from '../models/Journal.js';
import { ResolveProgress } from '../services/PlaylistReconciler.js';
import { OutcomeCounts } from '../services/BatchScheduler.js';

type Spinner = ReturnType<typeof createSpinner>;

export interface PlaylistSyncResult {
  playlistName: string;
  targetId?: string;
  action: 'created' | 'updated' | 'skipped';
  totalTracks: number;
  matchedTracks: number;
  unmatchedTracks: number;
  added: number;
  removed: number;
  reason?: string;
}

export interface BatchSummary extends OutcomeCounts {
  title: string;
  processingTime: number;
}

export interface ProgressReporterOptions {
  // Sin spinner ni salida por consola (tests y salidas redirigidas)
  silent?: boolean;
}

export class ProgressReporter {
  private spinner: Spinner | null = null;
  private startTime: Date;
  private readonly silent: boolean;

  constructor(options: ProgressReporterOptions = {}) {
    this.startTime = new Date();
    this.silent = options.silent ?? false;
  }

  log(message: string = ''): void {
    if (!this.silent) {
      console.log(message);
    }
  }

  /**
   * Inicializar seguimiento de progreso para la búsqueda de canciones de una playlist
   */
  startProgress(total: number, playlistName: string): void {
    this.startTime = new Date();

    if (this.silent) {
      return;
    }

    this.spinner = createSpinner(`Buscando 0/${total} canciones de ${chalk.magenta(playlistName)}...`).start();
  }

  updateProgress(status: ResolveProgress): void {
    if (!this.spinner) {
      return;
    }

    const percentage = Math.round((status.current / status.total) * 100);
    const message = `Buscando ${status.current}/${status.total} canciones (${percentage}%) - ` +
      `✅ ${status.matched} encontradas, ❌ ${status.unmatched} sin coincidencia - ${status.track.artist} - ${status.track.title}`;

    this.spinner.update({ text: message });
  }

  /**
   * Cerrar el spinner y mostrar el resultado de una playlist
   */
  finishProgress(result: PlaylistSyncResult, url?: string): void {
    const seconds = Math.round(this.getElapsedTime() / 1000);
    const text = describeResult(result, seconds);

    if (this.spinner) {
      if (result.unmatchedTracks === 0) {
        this.spinner.success({ text });
      } else {
        this.spinner.warn({ text });
      }
      this.spinner = null;
    } else {
      this.log(text);
    }

    if (url) {
      this.log(`   🔗 ${chalk.cyan(url)}`);
    }
  }

  /**
   * Detener el spinner si una playlist falló a mitad de camino
   */
  failProgress(message: string): void {
    if (this.spinner) {
      this.spinner.error({ text: message });
      this.spinner = null;
    } else if (!this.silent) {
      console.error(chalk.red(message));
    }
  }

  displayBatchSummary(summary: BatchSummary): void {
    const seconds = Math.round(summary.processingTime / 1000);

    this.log('\n' + chalk.bold(`🎵 ${summary.title}`));
    this.log('═'.repeat(50));
    this.log(`   Completadas: ${chalk.green(summary.success)}`);
    this.log(`   Omitidas: ${chalk.yellow(summary.skipped)}`);
    this.log(`   Fallidas: ${chalk.red(summary.failed)}`);
    this.log(`   Tiempo de procesamiento: ${chalk.yellow(seconds + 's')}`);
    this.log('═'.repeat(50));
  }

  displayJournalStats(stats: JournalStats, location: string): void {
    this.log(chalk.bold('📊 Estadísticas de operaciones'));
    this.log('='.repeat(40));
    this.log(`Total de operaciones: ${chalk.cyan(stats.totalOperations)}`);
    this.log(`Playlists registradas: ${chalk.cyan(stats.playlists.size)}`);
    this.log(`Operaciones exitosas: ${chalk.green(stats.successfulOperations)}`);
    this.log(`Operaciones fallidas: ${chalk.red(stats.failedOperations)}`);

    if (stats.lastOperation) {
      this.log(`Última operación: ${stats.lastOperation.slice(0, 19)}`);
    }

    const kinds = Object.entries(stats.operationsByKind).filter(([, count]) => count > 0);
    if (kinds.length > 0) {
      this.log('\nOperaciones por tipo:');
      for (const [kind, count] of kinds) {
        this.log(`  ${kind}: ${count}`);
      }
    }

    this.log(`\nRegistro: ${chalk.gray(location)}`);
  }

  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  getElapsedTime(): number {
    return Date.now() - this.startTime.getTime();
  }
}

export function describeResult(result: PlaylistSyncResult, seconds: number): string {
  switch (result.action) {
    case 'created':
      return `✅ Playlist "${result.playlistName}" creada: ${result.matchedTracks}/${result.totalTracks} canciones en ${seconds}s`;
    case 'updated':
      return `🔄 Playlist "${result.playlistName}" actualizada: +${result.added} / -${result.removed} (${result.matchedTracks}/${result.totalTracks} encontradas) en ${seconds}s`;
    case 'skipped':
      return `⏭️  Playlist "${result.playlistName}" omitida: ${result.reason ?? 'sin cambios'}`;
  }
}
