import axios, { AxiosError } from 'axios';
import { DEFAULT_CONFIG } from '../config/defaults.js';

export type ServiceName = 'spotify' | 'tidal';

export class MirrorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly originalError?: Error,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'MirrorError';
  }
}

/**
 * Límite de velocidad, timeout o caída temporal. Lo reintenta la capa que llama.
 * `exhausted` indica que ya se agotaron los reintentos.
 */
export class TransientExternalError extends MirrorError {
  constructor(
    message: string,
    service: ServiceName,
    originalError?: Error,
    public readonly retryAfterMs?: number,
    public readonly exhausted: boolean = false
  ) {
    super(message, `TRANSITORIO_${service.toUpperCase()}`, originalError, !exhausted);
    this.name = 'TransientExternalError';
  }
}

export class RateLimitError extends TransientExternalError {
  constructor(message: string, retryAfterMs: number, service: ServiceName, originalError?: Error) {
    super(message, service, originalError, retryAfterMs);
    this.name = 'RateLimitError';
  }
}

export class PermanentExternalError extends MirrorError {
  constructor(message: string, public readonly status: number, originalError?: Error) {
    super(message, `ERROR_CLIENTE_${status}`, originalError, false);
    this.name = 'PermanentExternalError';
  }
}

/**
 * Credenciales faltantes o identificadores mal formados: corta la ejecución completa
 */
export class FatalConfigurationError extends MirrorError {
  constructor(message: string, code: string = 'CONFIGURACION_INVALIDA', originalError?: Error) {
    super(message, code, originalError, false);
    this.name = 'FatalConfigurationError';
  }
}

export class AuthenticationError extends FatalConfigurationError {
  constructor(message: string, service: ServiceName, originalError?: Error) {
    super(message, `ERROR_AUTH_${service.toUpperCase()}`, originalError);
    this.name = 'AuthenticationError';
  }
}

/**
 * Falla completa de una unidad de trabajo (por ejemplo, una playlist). Se aísla por lote.
 */
export class UnitFailure extends MirrorError {
  constructor(message: string, originalError?: Error) {
    super(message, 'FALLA_UNIDAD', originalError, false);
    this.name = 'UnitFailure';
  }
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: DEFAULT_CONFIG.MAX_RETRIES,
  baseDelay: DEFAULT_CONFIG.RETRY_BASE_DELAY,
  maxDelay: DEFAULT_CONFIG.RETRY_MAX_DELAY,
  backoffMultiplier: 2,
  jitter: true
};

const NETWORK_ERROR_CODES = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN'
];

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export class ErrorHandler {
  constructor(
    private config: RetryConfig = DEFAULT_RETRY_CONFIG,
    private wait: SleepFn = sleep
  ) {}

  classify(error: unknown, service: ServiceName): MirrorError {
    if (error instanceof MirrorError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      return this.classifyAxiosError(error, service);
    }

    if (error instanceof Error) {
      if (this.isNetworkError(error)) {
        return new TransientExternalError(`Error de red: ${error.message}`, service, error);
      }

      return new MirrorError(error.message, 'ERROR_DESCONOCIDO', error, false);
    }

    return new MirrorError('Ocurrió un error desconocido', 'ERROR_DESCONOCIDO', undefined, false);
  }

  private classifyAxiosError(error: AxiosError, service: ServiceName): MirrorError {
    const status = error.response?.status;
    const statusText = error.response?.statusText || '';

    // Sin respuesta: error de red o timeout
    if (!error.response || status === undefined) {
      return new TransientExternalError(`Error de red: ${error.message}`, service, error);
    }

    if (status === 429) {
      const retryAfter = this.retryAfterDelay(error);
      return new RateLimitError(
        `Límite de velocidad alcanzado en ${service}. Reintentar después de ${retryAfter}ms`,
        retryAfter,
        service,
        error
      );
    }

    if (status === 401 || status === 403) {
      const message = readErrorMessage(error.response.data) ||
        (status === 401
          ? 'Autenticación fallida - token inválido o expirado'
          : 'Acceso prohibido - permisos insuficientes');
      return new AuthenticationError(message, service, error);
    }

    if (status >= 500) {
      return new TransientExternalError(
        `Servicio ${service} no disponible (${status}): ${statusText}`,
        service,
        error
      );
    }

    const message = readErrorMessage(error.response.data) || `Error del cliente (${status}): ${statusText}`;
    return new PermanentExternalError(message, status, error);
  }

  /**
   * Ejecutar una operación con reintentos y retroceso exponencial
   */
  async executeWithRetry<T>(
    operation: () => Promise<T>,
    service: ServiceName,
    operationName?: string
  ): Promise<T> {
    let lastError: MirrorError | undefined;
    const label = operationName ? ` para ${operationName}` : '';

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = this.classify(error, service);

        if (!lastError.retryable) {
          throw lastError;
        }

        if (attempt === this.config.maxRetries) {
          break;
        }

        const delay = lastError instanceof TransientExternalError && lastError.retryAfterMs !== undefined
          ? lastError.retryAfterMs
          : this.backoffDelay(attempt);

        console.warn(
          `${lastError.name}${label}. Reintentando en ${delay}ms (intento ${attempt}/${this.config.maxRetries}): ${lastError.message}`
        );

        await this.wait(delay);
      }
    }

    throw new TransientExternalError(
      `Falló después de ${this.config.maxRetries} intentos${label}. Último error: ${lastError?.message ?? 'sin detalles'}`,
      service,
      lastError,
      undefined,
      true
    );
  }

  private backoffDelay(attempt: number): number {
    let delay = this.config.baseDelay * Math.pow(this.config.backoffMultiplier, attempt - 1);
    delay = Math.min(delay, this.config.maxDelay);

    if (this.config.jitter) {
      delay = delay * (0.5 + Math.random() * 0.5);
    }

    return Math.floor(delay);
  }

  private retryAfterDelay(error: AxiosError): number {
    const header: unknown = error.response?.headers['retry-after'];

    if (typeof header === 'string' || typeof header === 'number') {
      const seconds = parseInt(String(header), 10);
      if (!isNaN(seconds)) {
        return seconds * 1000;
      }
    }

    // 5 segundos si el servicio no manda el header
    return 5000;
  }

  private isNetworkError(error: Error): boolean {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return NETWORK_ERROR_CODES.some(candidate => error.message.includes(candidate) || code === candidate);
  }
}

function readErrorMessage(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) {
    return undefined;
  }

  if ('error_description' in data && typeof data.error_description === 'string') {
    return data.error_description;
  }

  if ('errors' in data && Array.isArray(data.errors)) {
    const [first]: unknown[] = data.errors;
    if (typeof first === 'object' && first !== null && 'detail' in first && typeof first.detail === 'string') {
      return first.detail;
    }
  }

  if ('error' in data) {
    if (typeof data.error === 'string') {
      return data.error;
    }
    if (typeof data.error === 'object' && data.error !== null && 'message' in data.error && typeof data.error.message === 'string') {
      return data.error.message;
    }
  }

  return undefined;
}

/**
 * Mensaje amigable para mostrar al usuario
 */
export function friendlyMessage(error: unknown): string {
  if (!(error instanceof MirrorError)) {
    return error instanceof Error ? error.message : 'Error desconocido';
  }

  switch (error.code) {
    case 'ERROR_AUTH_SPOTIFY':
      return 'La autenticación de Spotify falló. Revisá SPOTIFY_ACCESS_TOKEN en el archivo de credenciales.';

    case 'ERROR_AUTH_TIDAL':
      return 'La autenticación de Tidal falló. Revisá TIDAL_ACCESS_TOKEN en el archivo de credenciales.';

    case 'TRANSITORIO_SPOTIFY':
      return `Spotify no responde o limita las solicitudes: ${error.message}`;

    case 'TRANSITORIO_TIDAL':
      return `Tidal no responde o limita las solicitudes: ${error.message}`;

    default:
      return error.message;
  }
}
