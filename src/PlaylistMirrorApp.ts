import chalk from 'chalk';
import inquirer from 'inquirer';
import { CLIOptions, CommandName } from './cli/parseArguments.js';
import { ConfigManager, Credentials } from './config/ConfigManager.js';
import { MatchCache } from './matching/MatchCache.js';
import { SongMatcher } from './matching/SongMatcher.js';
import { SourceCatalog, TargetCatalog } from './models/Catalog.js';
import { Outcome } from './services/BatchScheduler.js';
import { BatchRunOptions, PlaylistSyncManager } from './services/PlaylistSyncManager.js';
import { SpotifyService } from './services/SpotifyService.js';
import { TidalService } from './services/TidalService.js';
import { ConfigPaths } from './utils/ConfigPaths.js';
import { FatalConfigurationError, SleepFn } from './utils/ErrorHandler.js';
import { NotFoundLog } from './utils/NotFoundLog.js';
import { OperationJournal } from './utils/OperationJournal.js';
import { PlaylistSyncResult, ProgressReporter } from './utils/ProgressReporter.js';

export interface Catalogs {
  source: SourceCatalog;
  target: TargetCatalog;
}

export interface AppDependencies {
  createCatalogs: (credentials: Credentials) => Catalogs;
  confirm: (message: string) => Promise<boolean>;
  reporter: ProgressReporter;
  clock?: () => Date;
  sleep?: SleepFn;
}

async function confirmWithPrompt(message: string): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    { type: 'confirm', name: 'confirmed', message, default: false }
  ]);
  return confirmed;
}

export const defaultDependencies = (): AppDependencies => ({
  createCatalogs: credentials => ({
    source: new SpotifyService(credentials.SPOTIFY_ACCESS_TOKEN),
    target: new TidalService(credentials.TIDAL_ACCESS_TOKEN)
  }),
  confirm: confirmWithPrompt,
  reporter: new ProgressReporter()
});

/**
 * Arma los servicios para una ejecución, abre cache, journal y archivo de no encontradas,
 * despacha el comando y devuelve el código de salida
 */
export class PlaylistMirrorApp {
  constructor(private deps: AppDependencies = defaultDependencies()) {}

  async run(options: CLIOptions): Promise<number> {
    const { reporter } = this.deps;
    const command = options.command;

    if (!command) {
      throw new FatalConfigurationError('Falta el comando. Usá --help para ver los comandos disponibles.', 'ARGUMENTO_INVALIDO');
    }

    ConfigPaths.ensureConfigDir();

    // No se abre la cache existente: tiene que poder borrarse aunque esté corrupta
    if (command === 'cache-clear') {
      const cache = MatchCache.empty(ConfigPaths.getCachePath());
      await cache.clear();
      reporter.log(`🧹 Cache vaciada: ${cache.location}`);
      return 0;
    }

    const journal = await OperationJournal.open(ConfigPaths.getJournalPath());

    if (command === 'log-stats') {
      reporter.displayJournalStats(journal.aggregate(), journal.location);
      return 0;
    }

    const credentials = await new ConfigManager(options.credentialsPath).loadCredentials();
    const catalogs = this.deps.createCatalogs(credentials);
    const cache = await MatchCache.open(ConfigPaths.getCachePath());
    const notFound = new NotFoundLog(ConfigPaths.getNotFoundPath());
    await notFound.reset();

    const manager = new PlaylistSyncManager({
      ...catalogs,
      matcher: new SongMatcher(catalogs.target, cache, notFound, { useCached: options.useCached, clock: this.deps.clock }),
      journal,
      notFound,
      reporter,
      confirm: this.deps.confirm,
      clock: this.deps.clock,
      sleep: this.deps.sleep
    });

    try {
      return await this.dispatch(command, options, manager);
    } finally {
      reporter.stop();
      if (notFound.count > 0) {
        reporter.log(chalk.yellow(`\n📄 ${notFound.count} canciones sin coincidencia en: ${notFound.location}`));
      }
    }
  }

  private async dispatch(command: Exclude<CommandName, 'cache-clear' | 'log-stats'>, options: CLIOptions, manager: PlaylistSyncManager): Promise<number> {
    const createOptions = {
      name: options.name,
      info: options.info,
      date: options.date,
      public: options.public,
      like: options.like
    };
    const updateOptions = { appendOnly: options.append, tolerance: options.tolerance };
    const batch: BatchRunOptions = { batchSize: options.batchSize, delaySeconds: options.batchDelay };
    const [first = '', second = ''] = options.args;

    switch (command) {
      case 'create':
        await manager.create(first, createOptions);
        return 0;

      case 'update':
        await manager.update(first, second, updateOptions);
        return 0;

      case 'liked':
        await manager.liked(createOptions);
        return 0;

      case 'all':
        return exitCodeFor(await manager.all(first, { like: options.like, public: options.public }, batch));

      case 'all-saved':
        return exitCodeFor(await manager.allSaved(
          { like: options.like, public: options.public, targetUser: options.targetUser },
          batch
        ));

      case 'update-all':
        return exitCodeFor(await manager.updateAll(updateOptions, batch));

      case 'initial-setup':
        await manager.initialSetup({ targetUser: options.targetUser });
        return 0;

      case 'search': {
        const { match } = await manager.search(first);
        return match.targetId === null ? 1 : 0;
      }

      case 'remove':
        await manager.remove(first, { yes: options.yes });
        return 0;
    }
  }
}

/**
 * Código de salida de un comando por lotes: 1 si alguna unidad falló
 */
export function exitCodeFor(outcomes: Outcome<PlaylistSyncResult>[]): number {
  return outcomes.some(outcome => outcome.status === 'failed') ? 1 : 0;
}
