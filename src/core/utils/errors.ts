/**
 * Problem details renvoyés par l'API en cas d'échec (RFC 7807).
 * Problem details returned by the API on failure.
 */
export interface ProblemDetails {
  type?: string;
  title?: string;
  detail?: string;
  instance?: string;
  status?: number;
  [key: string]: unknown;
}

/**
 * Erreur de base de toutes les opérations : porte le nom de l'opération.
 */
export abstract class AppSecError extends Error {
  protected constructor(
    public readonly operation: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${operation}: ${message}`, options);
    this.name = new.target.name;
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Champs requis absents ou invalides, détectés avant tout appel réseau.
 */
export class ValidationError extends AppSecError {
  public readonly fields: string[];
  public readonly issues: FieldIssue[];

  constructor(operation: string, issues: FieldIssue[]) {
    super(operation, `invalid request: ${issues.map((i) => `${i.field} ${i.message}`).join('; ')}`);
    this.issues = issues;
    this.fields = [...new Set(issues.map((i) => i.field))];
  }
}

/**
 * Échec côté transport : construction de la requête, réseau, annulation, délai dépassé
 * ou corps de réponse illisible.
 */
export class TransportError extends AppSecError {
  constructor(operation: string, message: string, cause?: unknown) {
    super(operation, message, { cause });
  }
}

/**
 * Statut HTTP hors de l'ensemble attendu pour l'opération.
 */
export class ApiError extends AppSecError {
  constructor(
    operation: string,
    public readonly status: number,
    public readonly problem?: ProblemDetails,
    public readonly body?: string,
  ) {
    super(operation, ApiError.describe(status, problem));
  }

  private static describe(status: number, problem?: ProblemDetails): string {
    let message = `API error ${status}`;
    if (problem?.title) message += ` ${problem.title}`;
    if (problem?.detail) message += `: ${problem.detail}`;
    return message;
  }
}
