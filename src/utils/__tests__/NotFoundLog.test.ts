import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempDir, removeTempDir, track } from '../../__tests__/helpers/fakeCatalogs.js';
import { NotFoundLog } from '../NotFoundLog.js';

describe('NotFoundLog', () => {
  let dir: string;
  let log: NotFoundLog;

  beforeEach(async () => {
    dir = await makeTempDir();
    log = new NotFoundLog(path.join(dir, 'noresults.txt'));
    await log.reset();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('anota cada canción una sola vez', async () => {
    await log.record(track('s1', 'Song A', 'Artist X', 200));
    await log.record(track('s1', 'Song A', 'Artist X', 200));

    expect(await log.readAll()).toEqual(['Artist X - Song A']);
    expect(log.count).toBe(1);
  });

  it('anota por separado canciones distintas con el mismo nombre', async () => {
    await log.record(track('s1', 'Intro', 'Artist X', 60));
    await log.record(track('s2', 'Intro', 'Artist X', 95));

    expect(await log.readAll()).toEqual(['Artist X - Intro', 'Artist X - Intro']);
    expect(log.count).toBe(2);
  });

  it('reset vacía el archivo', async () => {
    await log.record(track('s1', 'Song A', 'Artist X', 200));

    await log.reset();

    expect(await log.readAll()).toEqual([]);
    expect(log.count).toBe(0);
  });
});
