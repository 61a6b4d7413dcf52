import { z } from 'zod';

import type { ApiConfigService } from '../core/utils/ApiConfigService';
import type { ExecResult, HttpExecutor } from '../core/utils/ApiServiceManager';
import type { AuditService } from '../core/utils/AuditService';
import type { Logger } from '../core/utils/Logger';
import { ApiError, TransportError, ValidationError } from '../core/utils/errors';
import { mapErrorResponse } from '../core/utils/ErrorMapper';
import { dropNulls } from '../core/utils/FlexibleDecoder';
import { appendQuery, buildPath } from '../core/utils/UrlBuilder';

/**
 * Options d'appel : annulation par AbortSignal.
 */
export interface OperationOptions {
  signal?: AbortSignal;
}

/**
 * Dépendances partagées par tous les gestionnaires de ressources.
 * Construit une fois, puis transmis explicitement.
 */
export interface AppSecContext {
  executor: HttpExecutor;
  endpoints: ApiConfigService;
  logger: Logger;
  audit?: AuditService;
}

export interface OperationCall<S extends z.ZodTypeAny> {
  /** Nom affiché dans les erreurs et les traces (ex: "GetAttackGroup"). */
  operation: string;
  /** Nom de l'endpoint dans la bibliothèque (ex: "getAttackGroup"). */
  endpoint: string;
  /** Requête validée : fournit les placeholders du chemin et la requête optionnelle. */
  params: Record<string, unknown>;
  body?: string;
  response: S;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** JSON d'une réponse acceptée ; 204 ou corps vide : objet vide. */
function parseBody(operation: string, result: ExecResult): unknown {
  if (result.status === 204 || result.text.trim() === '') return {};
  try {
    return JSON.parse(result.text);
  } catch (err) {
    throw new TransportError(operation, `failed to decode response: ${describe(err)}`, err);
  }
}

/**
 * Socle des gestionnaires de ressources : une opération = validation, URL,
 * appel unique via l'exécuteur, contrôle du statut, décodage typé.
 */
export default abstract class AppSecServiceManager {
  protected constructor(protected readonly context: AppSecContext) {}

  /**
   * Valide la requête avant tout appel réseau.
   * @throws ValidationError listant les champs manquants ou invalides
   */
  protected validate<S extends z.ZodTypeAny>(operation: string, schema: S, params: unknown): z.output<S> {
    const parsed = schema.safeParse(params);
    if (!parsed.success) {
      throw new ValidationError(
        operation,
        parsed.error.issues.map((issue) => ({ field: issue.path.join('.') || 'request', message: issue.message })),
      );
    }
    return parsed.data;
  }

  protected async call<S extends z.ZodTypeAny>(call: OperationCall<S>, options: OperationOptions = {}): Promise<z.output<S>> {
    const { operation } = call;
    const logger = this.context.logger.child(operation);
    logger.debug(operation);

    // 1) Endpoint et URL
    const endpoint = this.context.endpoints.requireEndpoint(call.endpoint);
    const template = `${this.context.endpoints.apiRoot}${endpoint.path}`;
    const optionalQuery = Object.fromEntries((endpoint.optionalQuery ?? []).map((name) => [name, call.params[name]]));
    const path = appendQuery(buildPath(operation, template, call.params), endpoint.query, optionalQuery);

    // 2) Corps (uniquement si l'endpoint en accepte un)
    const body = endpoint.body === 'none' ? undefined : call.body;
    const headers: Record<string, string> | undefined = body !== undefined ? { 'Content-Type': 'application/json' } : undefined;

    // 3) Annulation déjà demandée : rien n'est envoyé
    if (options.signal?.aborted) {
      throw new TransportError(operation, 'request aborted before it was sent', options.signal.reason);
    }

    const audit = this.context.audit;
    const started = audit ? await audit.beginOperation({ actor: 'AppSecClient', operation, method: endpoint.method, path }) : undefined;

    try {
      // 4) Appel unique
      let result: ExecResult;
      try {
        result = await this.context.executor.exec({ method: endpoint.method, path, body, headers, signal: options.signal });
      } catch (err) {
        throw new TransportError(operation, `request failed: ${describe(err)}`, err);
      }

      // 5) Statut attendu ?
      if (!endpoint.successCodes.includes(result.status)) {
        throw mapErrorResponse(operation, result);
      }

      // 6) Décodage typé ; un champ à null vaut absent
      const decoded = call.response.safeParse(dropNulls(parseBody(operation, result)));
      if (!decoded.success) {
        throw new TransportError(operation, `failed to decode response: ${decoded.error.message}`, decoded.error);
      }

      logger.debug(`${operation} -> ${result.status}`);
      if (audit && started) {
        await audit.endOperation(started.operationId, operation, 'SUCCESS', { httpStatus: result.status });
      }
      return decoded.data;
    } catch (err) {
      if (audit && started) {
        await audit.endOperation(started.operationId, operation, 'FAILURE', {
          httpStatus: err instanceof ApiError ? err.status : undefined,
          error: err,
        });
      }
      throw err;
    }
  }
}
