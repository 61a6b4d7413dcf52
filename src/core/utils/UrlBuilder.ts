import { ValidationError } from './errors';

export type PathParams = Record<string, unknown>;

/**
 * Remplace les placeholders `{name}` du gabarit par les valeurs (encodées) des paramètres.
 * Un placeholder sans valeur lève une ValidationError.
 */
export function buildPath(operation: string, template: string, params: PathParams): string {
  const missing: string[] = [];
  const path = template.replace(/\{(\w+)\}/g, (_, name: string) => {
    const value = params[name];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return encodeURIComponent(String(value));
    }
    if (typeof value === 'string' && value !== '') {
      return encodeURIComponent(value);
    }
    missing.push(name);
    return '';
  });

  if (missing.length > 0) {
    throw new ValidationError(
      operation,
      missing.map((field) => ({ field, message: 'is required' })),
    );
  }
  return path;
}

/**
 * Ajoute les drapeaux fixes puis les paramètres optionnels non vides.
 */
export function appendQuery(path: string, fixed: Record<string, string> = {}, optional: Record<string, unknown> = {}): string {
  const search = new URLSearchParams();
  Object.entries(fixed).forEach(([key, value]) => search.set(key, value));
  Object.entries(optional).forEach(([key, value]) => {
    if (value === undefined || value === null || value === '') return;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      search.set(key, String(value));
    }
  });

  const qs = search.toString();
  return qs ? `${path}?${qs}` : path;
}
