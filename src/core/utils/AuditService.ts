import * as fsp from 'fs/promises';
import * as fs from 'fs';
import { createHmac, randomUUID } from 'crypto';
import * as path from 'path';

// Stable JSON stringify to ensure deterministic HMAC across identical objects
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') return JSON.stringify(value) ?? 'null';
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  const record: Record<string, unknown> = { ...value };
  const keys = Object.keys(record)
    .filter((k) => record[k] !== undefined)
    .sort();
  const props = keys.map((k) => `${JSON.stringify(k)}:${stableStringify(record[k])}`);
  return `{${props.join(',')}}`;
}

/**
 * Structure d’un événement d’audit.
 */
export interface AuditEvent {
  timestamp: string; // ISO 8601 UTC
  actor: string; // composant émetteur (p.ex. "AppSecClient", "FileLoader")
  event: string; // type d’action (p.ex. "OPERATION_START")
  resource?: string; // cible (opération, chemin de fichier…)
  status?: string; // "SUCCESS" | "FAILURE" | "STARTED" | "INIT"
  details?: unknown; // champ libre pour infos additionnelles
  hmac?: string; // HMAC-SHA256 (champ canonique)
}

/**
 * Interface d’un transport d’audit (fichier, syslog…).
 */
export interface AuditTransport {
  /**
   * Envoie une entrée d’audit. Ne doit jamais rejeter (erreurs internes capturées).
   */
  log(event: AuditEvent): Promise<void>;
}

/**
 * Transport de base : écrit en JSONL dans un fichier append-only.
 */
export class FileAuditTransport implements AuditTransport {
  private filePath: string;

  constructor(filePath: string) {
    const dir = path.dirname(filePath);
    fs.mkdirSync(dir, { recursive: true });
    this.filePath = filePath;
  }

  async log(event: AuditEvent): Promise<void> {
    try {
      await fsp.appendFile(this.filePath, JSON.stringify(event) + '\n', 'utf-8');
    } catch (err) {
      console.error('AuditTransport(File) error:', err);
    }
  }
}

/**
 * Service d’audit singleton.
 * Sans transport configuré, les événements ne sont écrits nulle part.
 */
export class AuditService {
  private static instance?: AuditService;
  private transports: AuditTransport[];
  private hmacKey?: string;

  private constructor(transports: AuditTransport[], hmacKey?: string) {
    this.transports = transports;
    this.hmacKey = hmacKey;
  }

  /**
   * Renvoie l’unique instance.
   * @param transports Liste des transports à utiliser (ex. [new FileAuditTransport(...)])
   * @param hmacKey   Clé secrète pour générer la signature HMAC (optionnel)
   */
  public static getInstance(transports?: AuditTransport[], hmacKey?: string): AuditService {
    // Prefer explicit key, else fallback to environment
    const effectiveKey = hmacKey ?? process.env.AUDIT_HMAC_KEY;
    if (!AuditService.instance) {
      if (!transports) {
        throw new Error('AuditService must be initialized with transports');
      }
      AuditService.instance = new AuditService(transports, effectiveKey);
      return AuditService.instance;
    }

    // Refresh the key if instance had none but we now have one (explicit or via env)
    if (!AuditService.instance.hmacKey && effectiveKey) {
      AuditService.instance.hmacKey = effectiveKey;
    }
    return AuditService.instance;
  }

  /**
   * Initialise l'audit à partir des variables d'environnement (idempotent).
   * Utilise AUDIT_ENABLED, AUDIT_LOG_FILE et AUDIT_HMAC_KEY ; sans AUDIT_ENABLED=1,
   * l'instance est créée sans transport.
   */
  public static configureFromEnv(transports?: AuditTransport[]): AuditService {
    if (AuditService.instance) return AuditService.instance;
    if (process.env.AUDIT_ENABLED !== '1') {
      return AuditService.getInstance(transports ?? []);
    }
    const logFile = process.env.AUDIT_LOG_FILE || 'logs/audit.log';
    const t = transports ?? [new FileAuditTransport(logFile)];
    return AuditService.getInstance(t, process.env.AUDIT_HMAC_KEY);
  }

  /** Oublie l'instance courante (tests, reconfiguration). */
  public static reset(): void {
    AuditService.instance = undefined;
  }

  /**
   * Enregistre un événement d’audit.
   */
  public async log(event: Omit<AuditEvent, 'timestamp' | 'hmac'>): Promise<void> {
    const entry: AuditEvent = {
      timestamp: new Date().toISOString(),
      ...event,
    };

    // Calcul de la signature (déterministe) si une clé est fournie ; le champ hmac n'est pas signé
    if (this.hmacKey) {
      entry.hmac = createHmac('sha256', this.hmacKey).update(stableStringify(entry)).digest('hex');
    }

    // Envoi à tous les transports et attente de leur complétion
    await Promise.all(this.transports.map((t) => t.log(entry).catch((err: unknown) => console.error('AuditService transport error:', err))));
  }

  /**
   * Démarre une opération API et retourne un identifiant corrélable.
   * Journalise OPERATION_START.
   */
  public async beginOperation(info: { actor: string; operation: string; method: string; path: string }): Promise<{ operationId: string }> {
    const operationId = randomUUID();
    await this.log({
      actor: info.actor,
      event: 'OPERATION_START',
      resource: info.operation,
      status: 'STARTED',
      details: { method: info.method, path: info.path, operation_id: operationId },
    });
    return { operationId };
  }

  /** Termine une opération (OPERATION_SUCCESS / OPERATION_FAILURE) avec statut final. */
  public async endOperation(operationId: string, operation: string, status: 'SUCCESS' | 'FAILURE', details?: { httpStatus?: number; error?: unknown }): Promise<void> {
    const error = details?.error;
    await this.log({
      actor: 'system',
      event: status === 'SUCCESS' ? 'OPERATION_SUCCESS' : 'OPERATION_FAILURE',
      resource: operation,
      status,
      details: {
        operation_id: operationId,
        http_status: details?.httpStatus,
        error: error instanceof Error ? { name: error.name, message: error.message } : (error ?? null),
      },
    });
  }
}

export default AuditService;
