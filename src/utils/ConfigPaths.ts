import os from 'os';
import path from 'path';
import fs from 'fs';
import { DEFAULT_CONFIG } from '../config/defaults.js';

/**
 * Utilidad para manejar rutas de configuración del sistema
 */
export class ConfigPaths {
    private static readonly APP_NAME = 'playlist-mirror';

    /**
     * Obtiene la ruta del directorio de configuración de la aplicación.
     * PLAYLIST_MIRROR_HOME pisa la ruta por defecto.
     */
    static getConfigDir(): string {
        const override = process.env.PLAYLIST_MIRROR_HOME;
        if (override) {
            return override;
        }

        switch (os.platform()) {
            case 'win32':
                return path.join(os.homedir(), 'AppData', 'Roaming', this.APP_NAME);
            case 'darwin':
                return path.join(os.homedir(), 'Library', 'Application Support', this.APP_NAME);
            default: // Linux y otros Unix
                return path.join(os.homedir(), '.config', this.APP_NAME);
        }
    }

    static getCredentialsPath(): string {
        return path.join(this.getConfigDir(), DEFAULT_CONFIG.CREDENTIALS_FILE);
    }

    static getCachePath(): string {
        return path.join(this.getConfigDir(), DEFAULT_CONFIG.CACHE_FILE);
    }

    static getJournalPath(): string {
        return path.join(this.getConfigDir(), DEFAULT_CONFIG.JOURNAL_FILE);
    }

    static getNotFoundPath(): string {
        return path.join(this.getConfigDir(), DEFAULT_CONFIG.NOT_FOUND_FILE);
    }

    /**
     * Crea el directorio de configuración si no existe
     */
    static ensureConfigDir(): void {
        fs.mkdirSync(this.getConfigDir(), { recursive: true });
    }

    /**
     * Crea el archivo de credenciales template si no existe
     */
    static createCredentialsTemplate(credentialsPath: string = this.getCredentialsPath()): string {
        if (!fs.existsSync(credentialsPath)) {
            const template = `# Tokens de acceso para Playlist Mirror
# Completá los valores con tus tokens reales

# === SPOTIFY API ===
# Scopes: playlist-read-private user-library-read
SPOTIFY_ACCESS_TOKEN=tu_spotify_token_aqui

# === TIDAL API ===
# Scopes: playlists.read playlists.write collection.write search.read
TIDAL_ACCESS_TOKEN=tu_tidal_token_aqui
`;

            fs.mkdirSync(path.dirname(credentialsPath), { recursive: true });
            fs.writeFileSync(credentialsPath, template, 'utf8');
        }

        return credentialsPath;
    }
}

export function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
