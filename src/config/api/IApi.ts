/**
 * Bibliothèque d'endpoints de l'API Application Security.
 * Chaque opération du client est décrite ici (méthode, gabarit de chemin, codes de succès).
 */
export interface EndpointLibrary {
  product: string;
  version: number;
  timestamp: string;
  /** Racine commune des chemins (ex: "/appsec/v1"). */
  apiRoot: string;
  endPoints: EndpointDefinition[];
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * - none : aucun corps envoyé
 * - raw  : le JSON fourni par l'appelant est envoyé tel quel
 * - json : les champs de corps de la requête sont sérialisés
 */
export type BodyMode = 'none' | 'raw' | 'json';

export interface EndpointDefinition {
  name: string;
  method: HttpMethod;
  /** Gabarit relatif à apiRoot, placeholders `{name}`. */
  path: string;
  /** Drapeaux de requête toujours envoyés. */
  query?: Record<string, string>;
  /** Paramètres de requête envoyés seulement s'ils sont renseignés. */
  optionalQuery?: string[];
  successCodes: number[];
  body: BodyMode;
}
