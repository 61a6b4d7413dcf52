import { z } from 'zod';
import { requiredId } from './Common';

export const getConfigurationCloneRequestSchema = z.object({
  configId: requiredId,
  version: requiredId,
});

export const createConfigurationCloneRequestSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  contractId: z.string().optional(),
  groupId: z.number().int().optional(),
  hostnames: z.array(z.string()).optional(),
  createFrom: z.object(
    {
      configId: requiredId,
      version: z.number().int().optional(),
    },
    { required_error: 'is required' },
  ),
});

export type GetConfigurationCloneRequest = z.infer<typeof getConfigurationCloneRequestSchema>;
export type CreateConfigurationCloneRequest = z.infer<typeof createConfigurationCloneRequestSchema>;

const environmentStatusSchema = z.object({
  status: z.string().optional(),
  time: z.string().optional(),
});

export const getConfigurationCloneResponseSchema = z.object({
  configId: z.number().optional(),
  configName: z.string().optional(),
  version: z.number().optional(),
  versionNotes: z.string().optional(),
  createDate: z.string().optional(),
  createdBy: z.string().optional(),
  basedOn: z.number().optional(),
  production: environmentStatusSchema.optional(),
  staging: environmentStatusSchema.pick({ status: true }).optional(),
});

export const createConfigurationCloneResponseSchema = z.object({
  configId: z.number().optional(),
  version: z.number().optional(),
  name: z.string().optional(),
  description: z.string().optional(),
});

export type GetConfigurationCloneResponse = z.infer<typeof getConfigurationCloneResponseSchema>;
export type CreateConfigurationCloneResponse = z.infer<typeof createConfigurationCloneResponseSchema>;
