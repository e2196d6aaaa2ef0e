import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { Fingerprint, MatchResult } from '../models/MatchResult.js';
import { FatalConfigurationError } from '../utils/ErrorHandler.js';
import { isMissingFile } from '../utils/ConfigPaths.js';

const MatchResultSchema = z.object({
  targetId: z.string().nullable(),
  score: z.number().min(0).max(1),
  matchedAt: z.string()
});

const CacheFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.string(), MatchResultSchema)
});

/**
 * Cache persistente Fingerprint -> MatchResult.
 * Se abre una vez al inicio de la ejecución; cada `store` se escribe a disco (último que escribe gana).
 */
export class MatchCache {
  private constructor(
    private readonly filePath: string,
    private entries: Map<Fingerprint, MatchResult>
  ) {}

  static async open(filePath: string): Promise<MatchCache> {
    let content: string;

    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return MatchCache.empty(filePath);
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new FatalConfigurationError(
        `El archivo de cache ${filePath} está corrupto. Ejecutá "cache-clear" para reiniciarlo.`,
        'CACHE_CORRUPTA',
        error instanceof Error ? error : undefined
      );
    }

    const parsed = CacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new FatalConfigurationError(
        `El archivo de cache ${filePath} tiene un formato inválido: ${parsed.error.issues[0]?.message ?? 'desconocido'}`,
        'CACHE_CORRUPTA'
      );
    }

    return new MatchCache(filePath, new Map(Object.entries(parsed.data.entries)));
  }

  static empty(filePath: string): MatchCache {
    return new MatchCache(filePath, new Map());
  }

  get size(): number {
    return this.entries.size;
  }

  get location(): string {
    return this.filePath;
  }

  lookup(fp: Fingerprint): MatchResult | undefined {
    const result = this.entries.get(fp);
    return result ? { ...result } : undefined;
  }

  async store(fp: Fingerprint, result: MatchResult): Promise<void> {
    this.entries.set(fp, { ...result });
    await this.flush();
  }

  async clear(): Promise<void> {
    this.entries = new Map();

    try {
      await fs.unlink(this.filePath);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }

  private async flush(): Promise<void> {
    const payload: z.infer<typeof CacheFileSchema> = {
      version: 1,
      entries: Object.fromEntries(this.entries)
    };

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    // Escritura atómica: archivo temporal + rename
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(payload, null, 2), 'utf-8');
    await fs.rename(tmpPath, this.filePath);
  }
}
