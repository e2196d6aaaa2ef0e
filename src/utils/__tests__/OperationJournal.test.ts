import { promises as fs } from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { JournalEntry } from '../../models/Journal.js';
import { makeTempDir, removeTempDir } from '../../__tests__/helpers/fakeCatalogs.js';
import { aggregateJournal, OperationJournal } from '../OperationJournal.js';

const entry = (overrides: Partial<JournalEntry>): JournalEntry => ({
  timestamp: '2024-05-01T10:00:00.000Z',
  kind: 'add',
  playlist: { targetId: 'pl-1', targetName: 'Mix', sourceId: 'src-1' },
  track: null,
  outcome: 'success',
  ...overrides
});

describe('OperationJournal', () => {
  let dir: string;
  let journalPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    journalPath = path.join(dir, 'playlist_operations.jsonl');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('arranca vacío si no hay archivo', async () => {
    const journal = await OperationJournal.open(journalPath);

    expect(journal.entries).toEqual([]);
    expect(journal.aggregate().totalOperations).toBe(0);
    expect(journal.aggregate().lastOperation).toBeNull();
  });

  it('agrega líneas JSON y las vuelve a leer', async () => {
    const journal = await OperationJournal.open(journalPath);
    await journal.append(entry({ kind: 'create' }));
    await journal.append(entry({ track: { sourceId: 's1', targetId: 't1' } }));

    const content = await fs.readFile(journalPath, 'utf-8');
    expect(content.split('\n')).toHaveLength(3);

    const reopened = await OperationJournal.open(journalPath);
    expect(reopened.entries).toHaveLength(2);
    expect(reopened.entries[1].track).toEqual({ sourceId: 's1', targetId: 't1' });
  });

  it('ignora líneas mal formadas y avisa', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const valid = JSON.stringify(entry({}));
    await fs.writeFile(
      journalPath,
      `${valid}\n{ roto\n${JSON.stringify({ kind: 'desconocido' })}\n\n${valid}\n`,
      'utf-8'
    );

    const journal = await OperationJournal.open(journalPath);

    expect(journal.entries).toHaveLength(2);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith('⚠️ Línea 2 del registro de operaciones ignorada (formato inválido)');
  });

  it('trackedPlaylists devuelve la asociación más reciente por playlist', async () => {
    const journal = await OperationJournal.open(journalPath);
    await journal.append(entry({ kind: 'create', playlist: { targetId: 'pl-1', targetName: 'Mix', sourceId: 'src-1' } }));
    await journal.append(entry({ kind: 'update', playlist: { targetId: 'pl-1', targetName: 'Mix 2', sourceId: 'src-1' } }));
    await journal.append(entry({ kind: 'link', playlist: { targetId: 'pl-2', targetName: 'Rock', sourceId: 'src-2', sourceName: 'Rock' } }));
    await journal.append(entry({ kind: 'create', outcome: 'failure', playlist: { targetId: 'pl-3', targetName: 'Roto', sourceId: 'src-3' } }));
    await journal.append(entry({ kind: 'add', playlist: { targetId: 'pl-4', targetName: 'Sin crear', sourceId: 'src-4' } }));
    await journal.append(entry({ kind: 'create', playlist: { targetId: 'pl-5', targetName: 'Sin origen' } }));

    expect(journal.trackedPlaylists()).toEqual([
      { targetId: 'pl-1', targetName: 'Mix 2', sourceId: 'src-1', sourceName: undefined },
      { targetId: 'pl-2', targetName: 'Rock', sourceId: 'src-2', sourceName: 'Rock' }
    ]);
  });

  describe('aggregateJournal', () => {
    it('cuenta por tipo y resultado', () => {
      const stats = aggregateJournal([
        entry({ kind: 'create', timestamp: '2024-05-01T10:00:00.000Z' }),
        entry({ kind: 'add', timestamp: '2024-05-01T10:00:01.000Z' }),
        entry({ kind: 'add', outcome: 'failure', timestamp: '2024-05-01T10:00:02.000Z' }),
        entry({ kind: 'match-fail', timestamp: '2024-05-01T09:00:00.000Z' }),
        entry({ kind: 'remove', playlist: { targetId: 'pl-2', targetName: 'Otra' }, timestamp: '2024-05-02T08:00:00.000Z' })
      ]);

      expect(stats.totalOperations).toBe(5);
      expect(stats.successfulOperations).toBe(4);
      expect(stats.failedOperations).toBe(1);
      expect(stats.lastOperation).toBe('2024-05-02T08:00:00.000Z');
      expect(stats.operationsByKind).toEqual({
        create: 1,
        update: 0,
        add: 2,
        remove: 1,
        'match-fail': 1,
        link: 0,
        like: 0
      });
      expect([...stats.playlists.keys()]).toEqual(['pl-1', 'pl-2']);
      expect(stats.playlists.get('pl-1')?.entries).toHaveLength(4);
      expect(stats.playlists.get('pl-1')?.lastUpdated).toBe('2024-05-01T10:00:02.000Z');
    });
  });
});
