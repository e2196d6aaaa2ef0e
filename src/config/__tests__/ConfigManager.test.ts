import { promises as fs } from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempDir, removeTempDir } from '../../__tests__/helpers/fakeCatalogs.js';
import { FatalConfigurationError } from '../../utils/ErrorHandler.js';
import { ConfigManager, parseKeyValueFile } from '../ConfigManager.js';

describe('ConfigManager', () => {
  let dir: string;
  let credentialsPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    credentialsPath = path.join(dir, 'credentials.txt');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('parseKeyValueFile', () => {
    it('ignora comentarios y líneas vacías', () => {
      const values = parseKeyValueFile('# tokens\nspotify_access_token = abc \n\nTIDAL_ACCESS_TOKEN=def=ghi\n');

      expect(values).toEqual({ SPOTIFY_ACCESS_TOKEN: 'abc', TIDAL_ACCESS_TOKEN: 'def=ghi' });
    });
  });

  it('lee credenciales válidas', async () => {
    await fs.writeFile(credentialsPath, 'SPOTIFY_ACCESS_TOKEN=test-secret\nTIDAL_ACCESS_TOKEN=test-secret-2\n', 'utf8');

    const credentials = await new ConfigManager(credentialsPath).loadCredentials();

    expect(credentials).toEqual({ SPOTIFY_ACCESS_TOKEN: 'test-secret', TIDAL_ACCESS_TOKEN: 'test-secret-2' });
  });

  it('informa cada credencial faltante', () => {
    const manager = new ConfigManager(credentialsPath);

    expect(() => manager.parseCredentials('SPOTIFY_ACCESS_TOKEN=test-secret\n')).toThrow('TIDAL_ACCESS_TOKEN: falta el valor');
  });

  it('rechaza los valores de ejemplo', () => {
    const manager = new ConfigManager(credentialsPath);

    expect(() => manager.parseCredentials('SPOTIFY_ACCESS_TOKEN=tu_spotify_token_aqui\nTIDAL_ACCESS_TOKEN=test-secret\n'))
      .toThrow('SPOTIFY_ACCESS_TOKEN: todavía tiene el valor de ejemplo');
  });

  it('crea el template si no hay archivo y corta la ejecución', async () => {
    const manager = new ConfigManager(credentialsPath);

    await expect(manager.loadCredentials()).rejects.toMatchObject({ code: 'CREDENCIALES_FALTANTES' });

    const template = await fs.readFile(credentialsPath, 'utf8');
    expect(template).toContain('SPOTIFY_ACCESS_TOKEN=tu_spotify_token_aqui');
    expect(template).toContain('TIDAL_ACCESS_TOKEN=tu_tidal_token_aqui');

    // El template sin completar tampoco sirve
    await expect(manager.loadCredentials()).rejects.toBeInstanceOf(FatalConfigurationError);
    await expect(manager.loadCredentials()).rejects.toMatchObject({ code: 'CREDENCIALES_INVALIDAS' });
  });
});
