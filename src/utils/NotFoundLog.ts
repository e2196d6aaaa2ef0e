import { promises as fs } from 'fs';
import path from 'path';
import { describeTrack, TrackRef } from '../models/Track.js';
import { isMissingFile } from './ConfigPaths.js';

export interface NotFoundSink {
  record(track: TrackRef): Promise<void>;
}

/**
 * Archivo de texto plano con las canciones que terminaron sin coincidencia, una por línea.
 * Se vacía al empezar cada ejecución y cada canción (por id de origen) se anota una sola vez.
 */
export class NotFoundLog implements NotFoundSink {
  private readonly recorded = new Set<string>();

  constructor(private readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  get count(): number {
    return this.recorded.size;
  }

  async reset(): Promise<void> {
    this.recorded.clear();
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, '', 'utf-8');
  }

  async record(track: TrackRef): Promise<void> {
    if (this.recorded.has(track.sourceId)) {
      return;
    }

    this.recorded.add(track.sourceId);
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, `${describeTrack(track)}\n`, 'utf-8');
  }

  async readAll(): Promise<string[]> {
    try {
      const content = await fs.readFile(this.filePath, 'utf-8');
      return content.split('\n').filter(line => line.length > 0);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }
}
