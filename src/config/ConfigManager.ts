import { promises as fs } from 'fs';
import { z } from 'zod';
import { ConfigPaths, isMissingFile } from '../utils/ConfigPaths.js';
import { FatalConfigurationError } from '../utils/ErrorHandler.js';
import { HELP_MESSAGES } from './defaults.js';

const isPlaceholder = (value: string): boolean =>
  value.includes('tu_') || value.includes('_aqui') || value.includes('your_') || value.includes('_here');

const tokenSchema = z
  .string({ required_error: 'falta el valor' })
  .trim()
  .min(1, 'el valor está vacío')
  .refine(value => !isPlaceholder(value), 'todavía tiene el valor de ejemplo');

const CredentialsSchema = z.object({
  SPOTIFY_ACCESS_TOKEN: tokenSchema,
  TIDAL_ACCESS_TOKEN: tokenSchema
});

export type Credentials = z.infer<typeof CredentialsSchema>;

/**
 * Parsear líneas KEY=VALUE; se ignoran comentarios (#) y líneas vacías
 */
export function parseKeyValueFile(content: string): Record<string, string> {
  const values: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) {
      continue;
    }

    const match = /^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/.exec(trimmed);
    if (match?.[1] !== undefined) {
      values[match[1].toUpperCase()] = (match[2] ?? '').trim();
    }
  }

  return values;
}

export class ConfigManager {
  constructor(private readonly credentialsPath: string = ConfigPaths.getCredentialsPath()) {}

  get location(): string {
    return this.credentialsPath;
  }

  /**
   * Lee y valida el archivo de credenciales. Si no existe, crea el template y corta la ejecución.
   */
  async loadCredentials(): Promise<Credentials> {
    let content: string;

    try {
      content = await fs.readFile(this.credentialsPath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        const created = ConfigPaths.createCredentialsTemplate(this.credentialsPath);
        throw new FatalConfigurationError(
          `${HELP_MESSAGES.CREDENTIALS_MISSING}\nSe creó un template en: ${created}`,
          'CREDENCIALES_FALTANTES'
        );
      }
      throw error;
    }

    return this.parseCredentials(content);
  }

  parseCredentials(content: string): Credentials {
    const parsed = CredentialsSchema.safeParse(parseKeyValueFile(content));

    if (!parsed.success) {
      const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new FatalConfigurationError(
        `Credenciales inválidas en ${this.credentialsPath}:\n  - ${problems.join('\n  - ')}`,
        'CREDENCIALES_INVALIDAS'
      );
    }

    return parsed.data;
  }
}
