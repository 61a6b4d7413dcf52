import { parse } from 'ini';

/**
 * Parse un fichier INI (format .edgerc) : une section par jeu d'identifiants.
 */
export function parseINI(raw: string): unknown {
  return parse(raw);
}
