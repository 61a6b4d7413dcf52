import { z } from 'zod';
import { requiredId, requiredString } from './Common';

export const reputationAnalysisTargetSchema = z.object({
  configId: requiredId,
  version: requiredId,
  policyId: requiredString,
});

export const updateReputationAnalysisRequestSchema = reputationAnalysisTargetSchema.extend({
  /** Ajoute le score de réputation dans un en-tête transmis à l'origine. */
  forwardToHTTPHeader: z.boolean().default(false),
  forwardSharedIPToHTTPHeaderAndSIEM: z.boolean().default(false),
});

export type GetReputationAnalysisRequest = z.input<typeof reputationAnalysisTargetSchema>;
export type RemoveReputationAnalysisRequest = z.input<typeof updateReputationAnalysisRequestSchema>;
export type UpdateReputationAnalysisRequest = z.input<typeof updateReputationAnalysisRequestSchema>;
export type ReputationAnalysisFlags = z.output<typeof updateReputationAnalysisRequestSchema>;

export const reputationAnalysisSchema = z.object({
  forwardToHTTPHeader: z.boolean().optional(),
  forwardSharedIPToHTTPHeaderAndSIEM: z.boolean().optional(),
});

export type ReputationAnalysis = z.infer<typeof reputationAnalysisSchema>;
