import { z } from 'zod';
import { flexibleStringSchema } from '../../core/utils/FlexibleDecoder';
import { rawJsonPayload, requiredId, requiredString } from './Common';

// --- Requêtes -------------------------------------------------------------------

export const getCustomDenyListRequestSchema = z.object({
  configId: requiredId,
  version: requiredId,
  /** Filtre appliqué côté client, après normalisation de l'identifiant. */
  id: z.string().optional(),
});

export const getCustomDenyRequestSchema = z.object({
  configId: requiredId,
  version: requiredId,
  id: requiredString,
});

export const createCustomDenyRequestSchema = z.object({
  configId: requiredId,
  version: requiredId,
  jsonPayload: rawJsonPayload,
});

export const updateCustomDenyRequestSchema = z.object({
  configId: requiredId,
  version: requiredId,
  id: requiredString,
  jsonPayload: rawJsonPayload,
});

export const removeCustomDenyRequestSchema = getCustomDenyRequestSchema;

export type GetCustomDenyListRequest = z.infer<typeof getCustomDenyListRequestSchema>;
export type GetCustomDenyRequest = z.infer<typeof getCustomDenyRequestSchema>;
export type CreateCustomDenyRequest = z.infer<typeof createCustomDenyRequestSchema>;
export type UpdateCustomDenyRequest = z.infer<typeof updateCustomDenyRequestSchema>;
export type RemoveCustomDenyRequest = z.infer<typeof removeCustomDenyRequestSchema>;

// --- Réponses -------------------------------------------------------------------

export const customDenyParameterSchema = z.object({
  name: z.string().optional(),
  value: z.string().optional(),
});

/** `id` arrive en chaîne ou en nombre selon l'endpoint : toujours rendu en chaîne. */
export const customDenySchema = z.object({
  id: flexibleStringSchema,
  name: z.string().optional(),
  description: z.string().optional(),
  parameters: z.array(customDenyParameterSchema).optional(),
});

export const getCustomDenyListResponseSchema = z.object({
  customDenyList: z.array(customDenySchema).default([]),
});

export const getCustomDenyResponseSchema = customDenySchema;
export const createCustomDenyResponseSchema = customDenySchema;
export const updateCustomDenyResponseSchema = customDenySchema;
export const removeCustomDenyResponseSchema = z.object({});

export type CustomDenyParameter = z.infer<typeof customDenyParameterSchema>;
export type CustomDeny = z.infer<typeof customDenySchema>;
export type GetCustomDenyListResponse = z.infer<typeof getCustomDenyListResponseSchema>;
export type GetCustomDenyResponse = CustomDeny;
export type CreateCustomDenyResponse = CustomDeny;
export type UpdateCustomDenyResponse = CustomDeny;
export type RemoveCustomDenyResponse = z.infer<typeof removeCustomDenyResponseSchema>;
