import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  JournalEntry,
  JournalStats,
  OPERATION_KINDS,
  OperationKind,
  PlaylistHistory
} from '../models/Journal.js';
import { isMissingFile } from './ConfigPaths.js';

const JournalEntrySchema = z.object({
  timestamp: z.string(),
  kind: z.enum(OPERATION_KINDS),
  playlist: z.object({
    targetId: z.string(),
    targetName: z.string(),
    sourceId: z.string().optional(),
    sourceName: z.string().optional()
  }),
  track: z.object({
    sourceId: z.string().optional(),
    targetId: z.string().optional(),
    label: z.string().optional()
  }).nullable(),
  outcome: z.enum(['success', 'failure']),
  detail: z.string().optional()
});

// Operaciones que dejan una playlist asociada a su origen
const TRACKING_KINDS: ReadonlySet<OperationKind> = new Set<OperationKind>(['create', 'update', 'link']);

export interface TrackedPlaylist {
  targetId: string;
  targetName: string;
  sourceId: string;
  sourceName?: string;
}

/**
 * Registro de operaciones en formato JSON Lines. Solo crece: `append` es el único mutador.
 */
export class OperationJournal {
  private constructor(
    private readonly filePath: string,
    private readonly loaded: JournalEntry[]
  ) {}

  static async open(filePath: string): Promise<OperationJournal> {
    let content: string;

    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return new OperationJournal(filePath, []);
      }
      throw error;
    }

    const entries: JournalEntry[] = [];
    const lines = content.split('\n');

    lines.forEach((line, lineIndex) => {
      if (line.trim().length === 0) {
        return;
      }

      const entry = parseLine(line);
      if (entry) {
        entries.push(entry);
      } else {
        console.warn(`⚠️ Línea ${lineIndex + 1} del registro de operaciones ignorada (formato inválido)`);
      }
    });

    return new OperationJournal(filePath, entries);
  }

  get location(): string {
    return this.filePath;
  }

  get entries(): readonly JournalEntry[] {
    return this.loaded;
  }

  async append(entry: JournalEntry): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
    this.loaded.push(entry);
  }

  aggregate(): JournalStats {
    return aggregateJournal(this.loaded);
  }

  /**
   * Playlists del destino asociadas a una playlist de origen, con la asociación más reciente
   */
  trackedPlaylists(): TrackedPlaylist[] {
    const tracked = new Map<string, TrackedPlaylist>();

    for (const entry of this.loaded) {
      if (entry.outcome !== 'success' || !TRACKING_KINDS.has(entry.kind) || !entry.playlist.sourceId) {
        continue;
      }

      tracked.set(entry.playlist.targetId, {
        targetId: entry.playlist.targetId,
        targetName: entry.playlist.targetName,
        sourceId: entry.playlist.sourceId,
        sourceName: entry.playlist.sourceName
      });
    }

    return [...tracked.values()];
  }
}

function parseLine(line: string): JournalEntry | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }

  const parsed = JournalEntrySchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function aggregateJournal(entries: readonly JournalEntry[]): JournalStats {
  const operationsByKind: Record<OperationKind, number> = {
    create: 0,
    update: 0,
    add: 0,
    remove: 0,
    'match-fail': 0,
    link: 0,
    like: 0
  };

  const playlists = new Map<string, PlaylistHistory>();
  let successfulOperations = 0;
  let lastOperation: string | null = null;

  for (const entry of entries) {
    operationsByKind[entry.kind]++;

    if (entry.outcome === 'success') {
      successfulOperations++;
    }

    if (lastOperation === null || entry.timestamp > lastOperation) {
      lastOperation = entry.timestamp;
    }

    const history = playlists.get(entry.playlist.targetId);
    if (history) {
      history.targetName = entry.playlist.targetName;
      history.sourceId = entry.playlist.sourceId ?? history.sourceId;
      history.sourceName = entry.playlist.sourceName ?? history.sourceName;
      if (entry.timestamp > history.lastUpdated) {
        history.lastUpdated = entry.timestamp;
      }
      history.entries.push(entry);
    } else {
      playlists.set(entry.playlist.targetId, {
        targetId: entry.playlist.targetId,
        targetName: entry.playlist.targetName,
        sourceId: entry.playlist.sourceId,
        sourceName: entry.playlist.sourceName,
        lastUpdated: entry.timestamp,
        entries: [entry]
      });
    }
  }

  return {
    totalOperations: entries.length,
    successfulOperations,
    failedOperations: entries.length - successfulOperations,
    lastOperation,
    operationsByKind,
    playlists
  };
}
