import { z } from 'zod';
import { requiredId } from './Common';

export const getApiHostnameCoverageOverlappingRequestSchema = z.object({
  configId: requiredId,
  version: requiredId,
  /** Transmis en paramètre de requête uniquement s'il est renseigné. */
  hostname: z.string().optional(),
});

export type GetApiHostnameCoverageOverlappingRequest = z.infer<typeof getApiHostnameCoverageOverlappingRequestSchema>;

export const overlappingConfigSchema = z.object({
  configId: z.number().optional(),
  configName: z.string().optional(),
  configVersion: z.number().optional(),
  contractId: z.string().optional(),
  contractName: z.string().optional(),
  versionTags: z.array(z.string()).optional(),
});

export const getApiHostnameCoverageOverlappingResponseSchema = z.object({
  overLappingList: z.array(overlappingConfigSchema).default([]),
});

export type OverlappingConfig = z.infer<typeof overlappingConfigSchema>;
export type GetApiHostnameCoverageOverlappingResponse = z.infer<typeof getApiHostnameCoverageOverlappingResponseSchema>;
