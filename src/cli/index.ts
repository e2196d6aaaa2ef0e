#!/usr/bin/env node

import chalk from 'chalk';
import gradient from 'gradient-string';
import figlet from 'figlet';
import { PlaylistMirrorApp } from '../PlaylistMirrorApp.js';
import { DEFAULT_CONFIG, HELP_MESSAGES } from '../config/defaults.js';
import { ConfigPaths } from '../utils/ConfigPaths.js';
import { FatalConfigurationError, friendlyMessage } from '../utils/ErrorHandler.js';
import { parseArguments } from './parseArguments.js';

/**
 * Mostrar la ayuda con el banner
 */
function showHelp(): void {
    const title = figlet.textSync('Playlist Mirror', {
        font: 'Standard',
        horizontalLayout: 'default',
        verticalLayout: 'default'
    });

    console.log(gradient.pastel.multiline(title));
    console.log(gradient.pastel(HELP_MESSAGES.DESCRIPTION));

    console.log(chalk.bold('\nUso: playlist-mirror <comando> [opciones]\n'));
    console.log('Comandos:');
    console.log('  create <playlist>                 Crear una playlist en Tidal a partir de una de Spotify');
    console.log('  update <playlist> <nombre>        Actualizar una playlist existente de Tidal');
    console.log('  liked                             Migrar las canciones guardadas');
    console.log('  all <usuario>                     Migrar todas las playlists públicas de un usuario');
    console.log('  all-saved                         Migrar todas las playlists guardadas');
    console.log('  update-all                        Actualizar todas las playlists registradas');
    console.log('  initial-setup                     Registrar playlists de Tidal que ya existen');
    console.log('  search <canción>                  Buscar una canción de Spotify en Tidal');
    console.log('  remove <patrón>                   Borrar playlists de Tidal cuyo nombre coincide con el patrón');
    console.log('  cache-clear                       Vaciar la cache de búsquedas');
    console.log('  log-stats                         Mostrar estadísticas del registro de operaciones\n');
    console.log('Opciones:');
    console.log('  -n, --name <nombre>               Nombre de la playlist nueva');
    console.log('  -i, --info <texto>                Descripción de la playlist nueva');
    console.log('  -d, --date                        Agregar la fecha al nombre');
    console.log('  -p, --public                      Crear la playlist como pública');
    console.log('  -l, --like                        Marcar como favoritas las canciones encontradas');
    console.log('      --use-cached                  Reutilizar los resultados guardados en la cache');
    console.log('      --append                      No quitar canciones al actualizar');
    console.log(`      --tolerance <0..1>            Proporción mínima para considerar una playlist al día (por defecto: ${DEFAULT_CONFIG.TOLERANCE})`);
    console.log(`      --batch-size <num>            Playlists por lote (por defecto: ${DEFAULT_CONFIG.BATCH_SIZE})`);
    console.log(`      --batch-delay <segundos>      Pausa entre lotes (por defecto: ${DEFAULT_CONFIG.BATCH_DELAY_SECONDS})`);
    console.log('      --target-user <usuario>       Sumar las playlists públicas de otro usuario');
    console.log('  -y, --yes                         No pedir confirmación en remove');
    console.log('  -c, --credentials <ruta>          Ruta al archivo de credenciales');
    console.log(`                                    (por defecto: ${ConfigPaths.getCredentialsPath()})`);
    console.log('  -h, --help                        Mostrar este mensaje de ayuda\n');
    console.log('Ejemplos:');
    console.log('  playlist-mirror create https://open.spotify.com/playlist/<id> --public');
    console.log('  playlist-mirror update spotify:playlist:<id> "Mi playlist" --append');
    console.log('  playlist-mirror all-saved --batch-size 10 --batch-delay 5\n');
}

async function main(): Promise<number> {
    const options = parseArguments(process.argv.slice(2));

    if (options.help || !options.command) {
        showHelp();
        return 0;
    }

    const app = new PlaylistMirrorApp();

    process.on('SIGINT', () => {
        console.log(chalk.yellow('\n⚠️ Interrumpido. Cache y registro ya quedaron guardados.'));
        process.exit(130);
    });

    return app.run(options);
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        const prefix = error instanceof FatalConfigurationError ? '❌ Error de configuración:' : '❌ Ha ocurrido un error:';
        console.error(chalk.red(prefix));
        console.error(chalk.red(friendlyMessage(error)));
        process.exitCode = 1;
    });
