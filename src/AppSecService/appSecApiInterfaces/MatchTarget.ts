import { z } from 'zod';
import { bypassNetworkListSchema, optionalId, rawJsonPayload, requiredId, securityPolicyRefSchema } from './Common';

// --- Requêtes -------------------------------------------------------------------

export const getMatchTargetsRequestSchema = z.object({
  configId: requiredId,
  configVersion: requiredId,
  /** Filtre appliqué côté client sur apiTargets et websiteTargets. */
  targetId: optionalId,
});

export const getMatchTargetRequestSchema = z.object({
  configId: requiredId,
  configVersion: requiredId,
  targetId: requiredId,
});

export const createMatchTargetRequestSchema = z.object({
  configId: requiredId,
  configVersion: requiredId,
  jsonPayload: rawJsonPayload,
});

export const updateMatchTargetRequestSchema = z.object({
  configId: requiredId,
  configVersion: requiredId,
  targetId: requiredId,
  jsonPayload: rawJsonPayload,
});

export const removeMatchTargetRequestSchema = getMatchTargetRequestSchema;

export type GetMatchTargetsRequest = z.infer<typeof getMatchTargetsRequestSchema>;
export type GetMatchTargetRequest = z.infer<typeof getMatchTargetRequestSchema>;
export type CreateMatchTargetRequest = z.infer<typeof createMatchTargetRequestSchema>;
export type UpdateMatchTargetRequest = z.infer<typeof updateMatchTargetRequestSchema>;
export type RemoveMatchTargetRequest = z.infer<typeof removeMatchTargetRequestSchema>;

// --- Réponses -------------------------------------------------------------------

const apiRefSchema = z.object({
  id: z.number().optional(),
  name: z.string().optional(),
});

/** Cible API : protège une liste d'API définies côté plateforme. */
export const apiTargetSchema = z.object({
  type: z.string().optional(),
  apis: z.array(apiRefSchema).optional(),
  sequence: z.number().optional(),
  targetId: z.number().optional(),
  configId: z.number().optional(),
  configVersion: z.number().optional(),
  securityPolicy: securityPolicyRefSchema.optional(),
  bypassNetworkLists: z.array(bypassNetworkListSchema).optional(),
});

/** Cible site web : hôtes, chemins et extensions de fichiers. */
export const websiteTargetSchema = z.object({
  type: z.string().optional(),
  configId: z.number().optional(),
  configVersion: z.number().optional(),
  defaultFile: z.string().optional(),
  isNegativeFileExtensionMatch: z.boolean().optional(),
  isNegativePathMatch: z.unknown().optional(),
  sequence: z.number().optional(),
  targetId: z.number().optional(),
  fileExtensions: z.array(z.string()).optional(),
  filePaths: z.array(z.string()).optional(),
  hostnames: z.array(z.string()).optional(),
  securityPolicy: securityPolicyRefSchema.optional(),
  bypassNetworkLists: z.array(bypassNetworkListSchema).optional(),
});

export const getMatchTargetsResponseSchema = z.object({
  matchTargets: z
    .object({
      apiTargets: z.array(apiTargetSchema).default([]),
      websiteTargets: z.array(websiteTargetSchema).default([]),
    })
    .default({}),
});

/** Une cible, quelle que soit sa variante (champs de l'une et de l'autre). */
export const matchTargetSchema = websiteTargetSchema.merge(apiTargetSchema.pick({ apis: true }));

export const getMatchTargetResponseSchema = matchTargetSchema;
export const createMatchTargetResponseSchema = matchTargetSchema;
export const updateMatchTargetResponseSchema = matchTargetSchema;
export const removeMatchTargetResponseSchema = matchTargetSchema;

export type ApiTarget = z.infer<typeof apiTargetSchema>;
export type WebsiteTarget = z.infer<typeof websiteTargetSchema>;
export type MatchTargetDetails = z.infer<typeof matchTargetSchema>;
export type GetMatchTargetsResponse = z.infer<typeof getMatchTargetsResponseSchema>;
export type GetMatchTargetResponse = MatchTargetDetails;
export type CreateMatchTargetResponse = MatchTargetDetails;
export type UpdateMatchTargetResponse = MatchTargetDetails;
export type RemoveMatchTargetResponse = MatchTargetDetails;
