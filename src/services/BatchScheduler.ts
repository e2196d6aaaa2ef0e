import chalk from 'chalk';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { FatalConfigurationError, SleepFn, sleep } from '../utils/ErrorHandler.js';

export type WorkerResult<T> =
  | { status: 'success'; value: T }
  | { status: 'skipped'; reason: string };

export type Outcome<T> =
  | { index: number; status: 'success'; value: T }
  | { index: number; status: 'skipped'; reason: string }
  | { index: number; status: 'failed'; reason: string; error: unknown };

export interface BatchOptions {
  batchSize: number;
  delaySeconds: number;
  sleep?: SleepFn;
}

export interface OutcomeCounts {
  success: number;
  skipped: number;
  failed: number;
}

/**
 * Procesa unidades de trabajo en lotes secuenciales con una pausa entre lotes.
 * Una unidad que falla queda como `failed` y no corta a las demás; un error de
 * configuración sí corta toda la ejecución.
 */
export class BatchScheduler {
  private readonly batchSize: number;
  private readonly delaySeconds: number;
  private readonly wait: SleepFn;

  constructor(options: BatchOptions = { batchSize: DEFAULT_CONFIG.BATCH_SIZE, delaySeconds: DEFAULT_CONFIG.BATCH_DELAY_SECONDS }) {
    if (!Number.isInteger(options.batchSize) || options.batchSize <= 0) {
      throw new FatalConfigurationError(`El tamaño de lote debe ser un entero positivo (recibido: ${options.batchSize})`);
    }
    if (!Number.isFinite(options.delaySeconds) || options.delaySeconds < 0) {
      throw new FatalConfigurationError(`La pausa entre lotes no puede ser negativa (recibido: ${options.delaySeconds})`);
    }

    this.batchSize = options.batchSize;
    this.delaySeconds = options.delaySeconds;
    this.wait = options.sleep ?? sleep;
  }

  async runInBatches<I, T>(
    items: readonly I[],
    worker: (item: I, index: number) => Promise<WorkerResult<T>>
  ): Promise<Outcome<T>[]> {
    const outcomes: Outcome<T>[] = [];
    const totalBatches = Math.ceil(items.length / this.batchSize);

    for (let start = 0; start < items.length; start += this.batchSize) {
      const batchNumber = start / this.batchSize + 1;
      const batch = items.slice(start, start + this.batchSize);
      const batchOutcomes: Outcome<T>[] = [];

      for (const [offset, item] of batch.entries()) {
        const index = start + offset;
        batchOutcomes.push(await this.runUnit(item, index, worker));
      }

      outcomes.push(...batchOutcomes);

      const counts = countOutcomes(batchOutcomes);
      console.log(chalk.gray(
        `📦 Lote ${batchNumber}/${totalBatches}: ${counts.success} ok, ${counts.skipped} omitidas, ${counts.failed} fallidas`
      ));

      if (batchNumber < totalBatches && this.delaySeconds > 0) {
        console.log(chalk.gray(`⏳ Esperando ${this.delaySeconds}s antes del siguiente lote...`));
        await this.wait(this.delaySeconds * 1000);
      }
    }

    return outcomes;
  }

  private async runUnit<I, T>(
    item: I,
    index: number,
    worker: (item: I, index: number) => Promise<WorkerResult<T>>
  ): Promise<Outcome<T>> {
    try {
      const result = await worker(item, index);
      return { index, ...result };
    } catch (error) {
      if (error instanceof FatalConfigurationError) {
        throw error;
      }

      const reason = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`❌ Unidad ${index + 1} falló: ${reason}`));
      return { index, status: 'failed', reason, error };
    }
  }
}

export function countOutcomes<T>(outcomes: readonly Outcome<T>[]): OutcomeCounts {
  const counts: OutcomeCounts = { success: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}
