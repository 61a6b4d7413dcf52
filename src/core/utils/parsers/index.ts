import { parseJSON } from './jsonParser';
import { parseINI } from './iniParser';

type ParserFn = (raw: string) => unknown;

const parsers: Record<string, ParserFn> = {
  '.json': parseJSON,
  '.ini': parseINI,
};

/**
 * Erreur de parsing d'un fichier dont le format est reconnu.
 */
export class FileParsingError extends Error {
  constructor(
    public readonly extension: string,
    cause: unknown,
  ) {
    super(`Erreur lors du parsing du fichier (${extension})`, { cause });
    this.name = 'FileParsingError';
  }
}

export function isSupportedFormat(extension: string): boolean {
  return extension.toLowerCase() in parsers;
}

export function parseContent(extension: string, raw: string): unknown {
  const parser = parsers[extension.toLowerCase()];
  if (!parser) return raw;

  try {
    return parser(raw);
  } catch (error) {
    throw new FileParsingError(extension, error);
  }
}
