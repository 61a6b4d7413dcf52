import { z } from 'zod';

/**
 * Briques de schémas communes aux requêtes et réponses.
 * Un identifiant numérique à 0 ou une chaîne vide compte comme absent.
 */
export const requiredId = z
  .number({ required_error: 'is required', invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .positive('is required');

export const optionalId = z.number({ invalid_type_error: 'must be a number' }).int('must be an integer').nonnegative('must not be negative').optional();

export const requiredString = z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }).min(1, 'is required');

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/** JSON fourni par l'appelant, envoyé octet pour octet. */
export const rawJsonPayload = requiredString.refine(isJson, 'must be valid JSON');

export const bypassNetworkListSchema = z.object({
  name: z.string().optional(),
  id: z.string().optional(),
});

export const securityPolicyRefSchema = z.object({
  policyId: z.string().optional(),
});

export type BypassNetworkList = z.infer<typeof bypassNetworkListSchema>;
