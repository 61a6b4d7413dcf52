export function parseJSON(raw: string): unknown {
  return JSON.parse(raw);
}
