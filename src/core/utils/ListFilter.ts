/**
 * Filtre en mémoire d'une liste renvoyée par l'API, pour les identifiants que
 * l'API n'accepte pas comme filtre de requête.
 * In-memory filter for list responses, keyed on a field the API cannot filter on.
 *
 * Sans valeur recherchée (`undefined`, `''` ou `0`), la liste est rendue telle quelle.
 * Order is preserved; no match yields an empty list.
 */
export function filterByField<T, K extends string | number>(items: readonly T[], pick: (item: T) => K | undefined, wanted: K | undefined): T[] {
  if (wanted === undefined || wanted === '' || wanted === 0) {
    return [...items];
  }
  return items.filter((item) => pick(item) === wanted);
}
