import { z } from 'zod';
import { flexibleStringListSchema } from '../../core/utils/FlexibleDecoder';
import { optionalId, rawJsonPayload, requiredId } from './Common';

// --- Requêtes -------------------------------------------------------------------

export const getReputationProfilesRequestSchema = z.object({
  configId: requiredId,
  configVersion: requiredId,
  /** Filtre appliqué côté client sur `id`. */
  reputationProfileId: optionalId,
});

export const getReputationProfileRequestSchema = z.object({
  configId: requiredId,
  configVersion: requiredId,
  reputationProfileId: requiredId,
});

export const createReputationProfileRequestSchema = z.object({
  configId: requiredId,
  configVersion: requiredId,
  jsonPayload: rawJsonPayload,
});

export const updateReputationProfileRequestSchema = z.object({
  configId: requiredId,
  configVersion: requiredId,
  reputationProfileId: requiredId,
  jsonPayload: rawJsonPayload,
});

export const removeReputationProfileRequestSchema = getReputationProfileRequestSchema;

export type GetReputationProfilesRequest = z.infer<typeof getReputationProfilesRequestSchema>;
export type GetReputationProfileRequest = z.infer<typeof getReputationProfileRequestSchema>;
export type CreateReputationProfileRequest = z.infer<typeof createReputationProfileRequestSchema>;
export type UpdateReputationProfileRequest = z.infer<typeof updateReputationProfileRequestSchema>;
export type RemoveReputationProfileRequest = z.infer<typeof removeReputationProfileRequestSchema>;

// --- Réponses -------------------------------------------------------------------

/**
 * Condition atomique. L'API renvoie `name` tantôt en chaîne, tantôt en liste :
 * il est toujours normalisé en liste de chaînes.
 */
export const atomicConditionSchema = z.object({
  checkIps: z.unknown().optional(),
  className: z.string().optional(),
  index: z.number().optional(),
  positiveMatch: z.unknown().optional(),
  value: z.array(z.string()).optional(),
  name: flexibleStringListSchema,
  nameCase: z.boolean().optional(),
  nameWildcard: z.unknown().optional(),
  valueCase: z.boolean().optional(),
  valueWildcard: z.unknown().optional(),
  host: z.array(z.string()).optional(),
});

const reputationConditionSchema = z.object({
  atomicConditions: z.array(atomicConditionSchema).optional(),
  positiveMatch: z.boolean().optional(),
});

export const reputationProfileSchema = z.object({
  condition: reputationConditionSchema.optional(),
  context: z.string().optional(),
  contextReadable: z.string().optional(),
  enabled: z.boolean().optional(),
  id: z.number().optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  sharedIpHandling: z.string().optional(),
  threshold: z.number().optional(),
});

/** Réponse de mise à jour / suppression : champs additionnels éventuels, tous facultatifs. */
export const reputationProfileMutationSchema = reputationProfileSchema.extend({
  averageThreshold: z.number().optional(),
  burstThreshold: z.number().optional(),
  clientIdentifier: z.string().optional(),
  matchType: z.string().optional(),
  pathMatchType: z.string().optional(),
  requestType: z.string().optional(),
  sameActionOnIpv6: z.boolean().optional(),
  type: z.string().optional(),
  useXForwardForHeaders: z.boolean().optional(),
});

export const getReputationProfilesResponseSchema = z.object({
  reputationProfiles: z.array(reputationProfileSchema).default([]),
});

export const getReputationProfileResponseSchema = reputationProfileSchema;
export const createReputationProfileResponseSchema = reputationProfileSchema;
export const updateReputationProfileResponseSchema = reputationProfileMutationSchema;
export const removeReputationProfileResponseSchema = reputationProfileMutationSchema;

export type AtomicCondition = z.infer<typeof atomicConditionSchema>;
export type ReputationProfile = z.infer<typeof reputationProfileSchema>;
export type GetReputationProfilesResponse = z.infer<typeof getReputationProfilesResponseSchema>;
export type GetReputationProfileResponse = ReputationProfile;
export type CreateReputationProfileResponse = ReputationProfile;
export type UpdateReputationProfileResponse = z.infer<typeof updateReputationProfileResponseSchema>;
export type RemoveReputationProfileResponse = z.infer<typeof removeReputationProfileResponseSchema>;
