import * as path from 'path';
import { createHash } from 'crypto';

import { isSupportedFormat, parseContent } from './parsers';
import { AuditService } from './AuditService';
import type { FileTransport } from './transports/FileTransport';
import { LocalTransport } from './transports/LocalTransport';

/**
 * Métadonnées retournées par FileLoader.
 */
export interface FileMetadata {
  path: string;
  name: string;
  extension: string;
  createdAt: Date;
  updatedAt: Date;
  fingerprint: string;
  content?: unknown;
}

export interface LoadOptions {
  /**
   * Force le parseur (ex: '.ini' pour un fichier `.edgerc` sans extension).
   * Forces the parser for files whose name carries no usable extension.
   */
  format?: string;
}

/**
 * Chargement de fichiers de configuration avec audit et empreinte SHA-256.
 */
export class FileLoader {
  private static instance?: FileLoader;

  private constructor(
    private transport: FileTransport,
    private baseDir: string = process.cwd(),
  ) {}

  /** Récupère l’instance unique (et configure l'audit une seule fois). */
  public static getInstance(baseDir?: string, transport?: FileTransport): FileLoader {
    if (!FileLoader.instance) {
      const dir = baseDir ?? process.cwd();
      FileLoader.instance = new FileLoader(transport ?? new LocalTransport(dir), dir);
      // Première instanciation : config audit (sans transport si AUDIT_ENABLED != '1')
      AuditService.configureFromEnv();
    }
    return FileLoader.instance;
  }

  /** Oublie l'instance courante. */
  public static reset(): void {
    FileLoader.instance = undefined;
  }

  /**
   * Charge un fichier avec audit et empreinte.
   * @throws Error en cas d’échec I/O
   * @throws FileParsingError si le parsing JSON/INI échoue
   */
  public async load(filePath: string, options: LoadOptions = {}): Promise<FileMetadata> {
    const audit = AuditService.configureFromEnv();
    // Audit : début de chargement
    await audit.log({
      actor: 'FileLoader',
      event: 'FILE_LOAD_START',
      resource: filePath,
      status: 'INIT',
    });

    const abs = path.isAbsolute(filePath) ? filePath : path.resolve(this.baseDir, filePath);

    // 1) Lecture via transport
    let raw: string;
    let createdAt: Date;
    let updatedAt: Date;
    try {
      const result = await this.transport.readAll(abs);
      raw = result.data;
      createdAt = result.metadata.createdAt;
      updatedAt = result.metadata.updatedAt;
    } catch (err) {
      // Audit : erreur de lecture
      await audit.log({
        actor: 'FileLoader',
        event: 'FILE_LOAD_ERROR',
        resource: filePath,
        status: 'FAILURE',
        details: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }

    // 2) Calcul fingerprint
    const fingerprint = createHash('sha256').update(raw).digest('hex');

    // 3) Parsing si format supporté
    const ext = path.extname(abs).toLowerCase();
    const format = (options.format ?? ext).toLowerCase();
    const content = isSupportedFormat(format) ? parseContent(format, raw) : undefined;

    // 4) Assemblage métadonnées
    const metadata: FileMetadata = {
      path: abs,
      name: path.basename(abs),
      extension: ext,
      createdAt,
      updatedAt,
      fingerprint,
      content,
    };

    // Audit : chargement réussi
    await audit.log({
      actor: 'FileLoader',
      event: 'FILE_LOADED',
      resource: filePath,
      status: 'SUCCESS',
      details: { fingerprint },
    });

    return metadata;
  }
}
