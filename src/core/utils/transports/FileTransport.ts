/**
 * FileReadResult représente le résultat de la lecture complète d'un fichier.
 */
export interface FileReadResult {
  /** Contenu du fichier en mémoire (UTF-8). */
  data: string;
  /** Métadonnées du fichier lues depuis la source. */
  metadata: {
    /** Date de création du fichier (ou approximation). */
    createdAt: Date;
    /** Date de dernière modification du fichier. */
    updatedAt: Date;
  };
}

/**
 * FileTransport définit l'interface pour lire des fichiers de configuration
 * (bibliothèque d'endpoints, fichier .edgerc).
 */
export interface FileTransport {
  /**
   * Lit entièrement le fichier spécifié et retourne son contenu et ses métadonnées.
   *
   * @param filePath Chemin du fichier à lire.
   */
  readAll(filePath: string): Promise<FileReadResult>;
}
