import { z } from 'zod';
import { requiredId } from './Common';

export const getVersionNotesRequestSchema = z.object({
  configId: requiredId,
  version: requiredId,
});

export const updateVersionNotesRequestSchema = z.object({
  configId: requiredId,
  version: requiredId,
  notes: z.string().default(''),
});

export type GetVersionNotesRequest = z.input<typeof getVersionNotesRequestSchema>;
export type UpdateVersionNotesRequest = z.input<typeof updateVersionNotesRequestSchema>;

export const versionNotesResponseSchema = z.object({
  notes: z.string().optional(),
});

export type VersionNotes = z.infer<typeof versionNotesResponseSchema>;
