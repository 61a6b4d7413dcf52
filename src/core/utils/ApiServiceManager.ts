import { loadClientSettings, loadEdgeGridConfigFromEnv, loadEdgeGridConfigFromFile, DEFAULT_SECTION, EdgeGridConfig } from '../../config/config';
import type { HttpMethod } from '../../config/api/IApi';
import { EdgeGridSigner, RequestSigner } from './EdgeGridSigner';
import { ConsoleLogger, Logger } from './Logger';

/**
 * Requête prête à être signée et envoyée.
 */
export interface ApiRequest {
  method: HttpMethod;
  /** Chemin absolu côté API, requête comprise (ex: "/appsec/v1/configs/1/versions/2"). */
  path: string;
  body?: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface ExecResult {
  status: number;
  headers: Headers;
  /** Corps brut de la réponse, décodé par l'appelant une fois le statut vérifié. */
  text: string;
}

/**
 * Exécuteur HTTP authentifié partagé par toutes les opérations.
 */
export interface HttpExecutor {
  exec(request: ApiRequest): Promise<ExecResult>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ApiServiceManagerOptions {
  credentials: EdgeGridConfig;
  /** Implémentation fetch (fetch global par défaut). */
  fetch?: FetchLike;
  signer?: RequestSigner;
  /** Délai maximal par requête, 0 ou absent = aucun. */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Session API : signe les requêtes (EdgeGrid) et les exécute via fetch.
 * Aucun état partagé entre deux appels.
 */
export class ApiServiceManager implements HttpExecutor {
  private readonly baseURL: string;
  private readonly fetchImpl: FetchLike;
  private readonly signer: RequestSigner;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;

  constructor(options: ApiServiceManagerOptions) {
    this.baseURL = `https://${options.credentials.host}`;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.signer = options.signer ?? new EdgeGridSigner(options.credentials);
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? new ConsoleLogger('ApiServiceManager');
  }

  /**
   * Session construite depuis l'environnement (AKAMAI_* et APPSEC_TIMEOUT_MS).
   */
  public static fromEnv(section: string = DEFAULT_SECTION, options: Omit<ApiServiceManagerOptions, 'credentials'> = {}): ApiServiceManager {
    const settings = loadClientSettings();
    return new ApiServiceManager({
      credentials: loadEdgeGridConfigFromEnv(section),
      timeoutMs: settings.APPSEC_TIMEOUT_MS,
      ...options,
    });
  }

  /**
   * Session construite depuis une section d'un fichier .edgerc.
   */
  public static async fromEdgerc(filePath: string, section: string = DEFAULT_SECTION, options: Omit<ApiServiceManagerOptions, 'credentials'> = {}): Promise<ApiServiceManager> {
    const settings = loadClientSettings();
    return new ApiServiceManager({
      credentials: await loadEdgeGridConfigFromFile(filePath, section),
      timeoutMs: settings.APPSEC_TIMEOUT_MS,
      ...options,
    });
  }

  public async exec(request: ApiRequest): Promise<ExecResult> {
    // 1) Construire l'URL
    const url = new URL(request.path, this.baseURL);

    // 2) Préparer headers et signature
    const headers: Record<string, string> = { Accept: 'application/json', ...request.headers };
    headers['Authorization'] = this.signer.sign({ method: request.method, url, body: request.body });

    // 3) Envoyer, avec délai éventuel
    const { signal, dispose } = this.linkSignal(request.signal);
    try {
      this.logger.debug(`${request.method} ${url.pathname}${url.search}`);
      const res = await this.fetchImpl(url.toString(), {
        method: request.method,
        headers,
        body: request.body,
        signal,
      });
      const text = await res.text();
      this.logger.debug(`${request.method} ${url.pathname} -> ${res.status}`);

      return {
        status: res.status,
        headers: res.headers,
        text,
      };
    } finally {
      dispose();
    }
  }

  /**
   * Combine le signal de l'appelant avec le délai de la session.
   */
  private linkSignal(external?: AbortSignal): { signal?: AbortSignal; dispose: () => void } {
    if (!this.timeoutMs) {
      return { signal: external, dispose: () => undefined };
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort(external?.reason);
    if (external?.aborted) {
      controller.abort(external.reason);
    } else {
      external?.addEventListener('abort', onAbort, { once: true });
    }
    const timeoutMs = this.timeoutMs;
    const timer = setTimeout(() => controller.abort(new Error(`request timed out after ${timeoutMs} ms`)), timeoutMs);

    return {
      signal: controller.signal,
      dispose: () => {
        clearTimeout(timer);
        external?.removeEventListener('abort', onAbort);
      },
    };
  }
}
