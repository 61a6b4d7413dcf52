import { z } from 'zod';
import { ApiError, ProblemDetails } from './errors';
import type { ExecResult } from './ApiServiceManager';

const problemSchema = z
  .object({
    type: z.string().optional(),
    title: z.string().optional(),
    detail: z.string().optional(),
    instance: z.string().optional(),
    status: z.number().optional(),
  })
  .passthrough();

function parseJsonText(text: string): unknown {
  if (text.trim() === '') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    // corps non JSON (page d'erreur HTML, texte brut) : conservé tel quel dans ApiError.body
    return undefined;
  }
}

/**
 * Convertit une réponse hors codes de succès en ApiError (problem details si présents).
 */
export function mapErrorResponse(operation: string, result: ExecResult): ApiError {
  const parsed = problemSchema.safeParse(parseJsonText(result.text));
  const problem: ProblemDetails | undefined = parsed.success ? parsed.data : undefined;
  return new ApiError(operation, result.status, problem, result.text);
}
