/**
 * Transport local pour la lecture de fichiers sur disque.
 * Local transport for reading files from the filesystem.
 */

import { promises as fs, Stats } from 'fs';
import * as path from 'path';
import type { FileTransport, FileReadResult } from './FileTransport';

export class LocalTransport implements FileTransport {
  /**
   * @param baseDir Répertoire de base pour les chemins relatifs.
   */
  constructor(private baseDir: string) {}

  /**
   * Lit entièrement le fichier spécifié et retourne
   * son contenu ainsi que ses métadonnées.
   *
   * @param filePath Chemin relatif ou absolu vers le fichier.
   */
  public async readAll(filePath: string): Promise<FileReadResult> {
    const absPath = this.resolve(filePath);

    const stats: Stats = await fs.stat(absPath);
    const data: string = await fs.readFile(absPath, 'utf-8');
    return {
      data,
      metadata: {
        createdAt: stats.birthtime,
        updatedAt: stats.mtime,
      },
    };
  }

  public resolve(filePath: string): string {
    return path.isAbsolute(filePath) ? filePath : path.resolve(this.baseDir, filePath);
  }
}
