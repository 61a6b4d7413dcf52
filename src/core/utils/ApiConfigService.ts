// src/core/utils/ApiConfigService.ts
import * as path from 'path';
import { z } from 'zod';
import { FileLoader, FileMetadata } from './FileLoader';
import type { EndpointDefinition, EndpointLibrary } from '../../config/api/IApi';
import { loadClientSettings } from '../../config/config';

/** Bibliothèque livrée avec le paquet (src/ et dist/ sont au même niveau). */
export const DEFAULT_API_LIB = path.resolve(__dirname, '../../../config/appsec-endpoints.json');

const endpointSchema = z.object({
  name: z.string().min(1),
  method: z.enum(['GET', 'POST', 'PUT', 'DELETE']),
  path: z.string().startsWith('/'),
  query: z.record(z.string(), z.string()).optional(),
  optionalQuery: z.array(z.string()).optional(),
  successCodes: z.array(z.number().int().min(100).max(599)).min(1),
  body: z.enum(['none', 'raw', 'json']),
});

const librarySchema = z.object({
  product: z.string(),
  version: z.number().int(),
  timestamp: z.string(),
  apiRoot: z.string(),
  endPoints: z.array(endpointSchema),
});

/**
 * Accès à la bibliothèque d'endpoints (fichier JSON validé au chargement).
 */
export class ApiConfigService {
  private constructor(
    private readonly library: EndpointLibrary,
    public readonly source: string,
  ) {}

  /**
   * Charge la bibliothèque via FileLoader.
   * @param apiLibPath Chemin du fichier JSON (APPSEC_API_LIB, sinon la bibliothèque livrée)
   */
  public static async load(apiLibPath: string = loadClientSettings().APPSEC_API_LIB || DEFAULT_API_LIB): Promise<ApiConfigService> {
    const meta: FileMetadata = await FileLoader.getInstance().load(apiLibPath, { format: '.json' });
    return ApiConfigService.fromContent(meta.content, meta.path);
  }

  public static fromContent(content: unknown, source = '<inline>'): ApiConfigService {
    const parsed = librarySchema.safeParse(content);
    if (!parsed.success) {
      throw new Error(`Le fichier ${source} n'est pas une bibliothèque d'endpoints valide : ${parsed.error.message}`);
    }

    const seen = new Set<string>();
    for (const ep of parsed.data.endPoints) {
      const key = ep.name.toLowerCase();
      if (seen.has(key)) {
        throw new Error(`Endpoint '${ep.name}' défini plusieurs fois dans ${source}.`);
      }
      seen.add(key);
    }
    return new ApiConfigService(parsed.data, source);
  }

  public get apiRoot(): string {
    return this.library.apiRoot;
  }

  public getEndpoints(): EndpointDefinition[] {
    return [...this.library.endPoints];
  }

  public getEndpoint(endpointName: string): EndpointDefinition | undefined {
    return this.library.endPoints.find((e) => e.name.toLowerCase() === endpointName.toLowerCase());
  }

  /**
   * Comme getEndpoint, mais un nom inconnu est une erreur de configuration.
   */
  public requireEndpoint(endpointName: string): EndpointDefinition {
    const endpoint = this.getEndpoint(endpointName);
    if (!endpoint) {
      throw new Error(`Endpoint '${endpointName}' introuvable dans ${this.source}.`);
    }
    return endpoint;
  }
}
