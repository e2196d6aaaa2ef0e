import { DEFAULT_CONFIG } from '../config/defaults.js';
import { FatalConfigurationError } from '../utils/ErrorHandler.js';

export const COMMANDS = [
  'create',
  'update',
  'liked',
  'all',
  'all-saved',
  'update-all',
  'initial-setup',
  'search',
  'remove',
  'cache-clear',
  'log-stats'
] as const;

export type CommandName = typeof COMMANDS[number];

// Argumentos posicionales obligatorios por comando
const REQUIRED_ARGS: Record<CommandName, string[]> = {
  'create': ['playlist'],
  'update': ['playlist', 'target-name'],
  'liked': [],
  'all': ['user'],
  'all-saved': [],
  'update-all': [],
  'initial-setup': [],
  'search': ['track'],
  'remove': ['pattern'],
  'cache-clear': [],
  'log-stats': []
};

export interface CLIOptions {
  command?: CommandName;
  args: string[];
  help: boolean;
  credentialsPath?: string;
  name?: string;
  info?: string;
  date: boolean;
  public?: boolean;
  like: boolean;
  useCached: boolean;
  append: boolean;
  tolerance: number;
  batchSize: number;
  batchDelay: number;
  targetUser?: string;
  yes: boolean;
}

function isCommand(value: string): value is CommandName {
  return COMMANDS.some(command => command === value);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new FatalConfigurationError(`Falta el valor de ${flag}`, 'ARGUMENTO_INVALIDO');
  }
  return value;
}

function parseNumber(value: string, flag: string, valid: (n: number) => boolean): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || !valid(parsed)) {
    throw new FatalConfigurationError(`Valor inválido para ${flag}: ${value}`, 'ARGUMENTO_INVALIDO');
  }
  return parsed;
}

/**
 * Parse command line arguments
 */
export function parseArguments(args: string[]): CLIOptions {
  const options: CLIOptions = {
    args: [],
    help: false,
    date: false,
    like: false,
    useCached: false,
    append: false,
    tolerance: DEFAULT_CONFIG.TOLERANCE,
    batchSize: DEFAULT_CONFIG.BATCH_SIZE,
    batchDelay: DEFAULT_CONFIG.BATCH_DELAY_SECONDS,
    yes: false
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }

    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;

      case '--credentials':
      case '-c':
        options.credentialsPath = requireValue(args, i, arg);
        i++; // Saltar el valor
        break;

      case '--name':
      case '-n':
        options.name = requireValue(args, i, arg);
        i++;
        break;

      case '--info':
      case '-i':
        options.info = requireValue(args, i, arg);
        i++;
        break;

      case '--target-user':
        options.targetUser = requireValue(args, i, arg);
        i++;
        break;

      case '--tolerance':
        options.tolerance = parseNumber(requireValue(args, i, arg), arg, n => n >= 0 && n <= 1);
        i++;
        break;

      case '--batch-size':
        options.batchSize = parseNumber(requireValue(args, i, arg), arg, n => Number.isInteger(n) && n > 0);
        i++;
        break;

      case '--batch-delay':
        options.batchDelay = parseNumber(requireValue(args, i, arg), arg, n => n >= 0);
        i++;
        break;

      case '--date':
      case '-d':
        options.date = true;
        break;

      case '--public':
      case '-p':
        options.public = true;
        break;

      case '--like':
      case '-l':
        options.like = true;
        break;

      case '--use-cached':
        options.useCached = true;
        break;

      case '--append':
        options.append = true;
        break;

      case '--yes':
      case '-y':
        options.yes = true;
        break;

      default:
        if (arg.startsWith('-')) {
          throw new FatalConfigurationError(`Opción desconocida: ${arg}`, 'ARGUMENTO_INVALIDO');
        }

        if (options.command === undefined) {
          if (!isCommand(arg)) {
            throw new FatalConfigurationError(`Comando desconocido: ${arg}`, 'ARGUMENTO_INVALIDO');
          }
          options.command = arg;
        } else {
          options.args.push(arg);
        }
    }
  }

  if (options.command && !options.help) {
    const required = REQUIRED_ARGS[options.command];
    if (options.args.length < required.length) {
      const missing = required.slice(options.args.length).map(name => `<${name}>`).join(' ');
      throw new FatalConfigurationError(`Faltan argumentos para "${options.command}": ${missing}`, 'ARGUMENTO_INVALIDO');
    }
  }

  return options;
}
