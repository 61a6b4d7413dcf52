import { z } from 'zod';
import { rawJsonPayload, requiredId, requiredString } from './Common';

// --- Condition / exception ----------------------------------------------------

const criteriaSchema = z.array(
  z.object({
    hostnames: z.array(z.string()).optional(),
    names: z.array(z.string()).optional(),
    paths: z.array(z.string()).optional(),
    values: z.array(z.string()).optional(),
  }),
);

const conditionSchema = z.object({
  type: z.string().optional(),
  extensions: z.array(z.string()).optional(),
  filenames: z.array(z.string()).optional(),
  hosts: z.array(z.string()).optional(),
  ips: z.array(z.string()).optional(),
  methods: z.array(z.string()).optional(),
  paths: z.array(z.string()).optional(),
  header: z.string().optional(),
  caseSensitive: z.boolean().optional(),
  name: z.string().optional(),
  nameCase: z.boolean().optional(),
  positiveMatch: z.boolean().optional(),
  value: z.string().optional(),
  wildcard: z.boolean().optional(),
  valueCase: z.boolean().optional(),
  valueWildcard: z.boolean().optional(),
  useHeaders: z.boolean().optional(),
});

const namesSelectorSchema = z.object({
  criteria: criteriaSchema.optional(),
  names: z.array(z.string()).optional(),
  selector: z.string().optional(),
  wildcard: z.boolean().optional(),
});

export const attackGroupConditionExceptionSchema = z.object({
  advancedExceptions: z
    .object({
      conditionOperator: z.string().optional(),
      conditions: z.array(conditionSchema).optional(),
      headerCookieOrParamValues: z
        .array(
          z.object({
            criteria: criteriaSchema.optional(),
            valueWildcard: z.boolean().optional(),
            values: z.array(z.string()).optional(),
          }),
        )
        .optional(),
      specificHeaderCookieOrParamNameValue: z
        .array(
          z.object({
            criteria: criteriaSchema.optional(),
            namesValues: z.array(z.object({ names: z.array(z.string()), values: z.array(z.string()) })).optional(),
            selector: z.string().optional(),
            valueWildcard: z.boolean().optional(),
            wildcard: z.boolean().optional(),
          }),
        )
        .optional(),
      specificHeaderCookieParamXmlOrJsonNames: z.array(namesSelectorSchema).optional(),
    })
    .optional(),
  exception: z
    .object({
      specificHeaderCookieParamXmlOrJsonNames: z.array(namesSelectorSchema.omit({ criteria: true })).optional(),
    })
    .optional(),
});

export type AttackGroupConditionException = z.infer<typeof attackGroupConditionExceptionSchema>;

// --- Requêtes -------------------------------------------------------------------

export const getAttackGroupsRequestSchema = z.object({
  configId: requiredId,
  version: requiredId,
  policyId: requiredString,
  /** Filtre appliqué côté client. */
  group: z.string().optional(),
});

export const getAttackGroupRequestSchema = z.object({
  configId: requiredId,
  version: requiredId,
  policyId: requiredString,
  group: requiredString,
});

export const updateAttackGroupRequestSchema = z.object({
  configId: requiredId,
  version: requiredId,
  policyId: requiredString,
  group: requiredString,
  action: requiredString,
  /** conditionException brute (JSON), envoyée telle quelle. */
  jsonPayload: rawJsonPayload.optional(),
});

export type GetAttackGroupsRequest = z.infer<typeof getAttackGroupsRequestSchema>;
export type GetAttackGroupRequest = z.infer<typeof getAttackGroupRequestSchema>;
export type UpdateAttackGroupRequest = z.infer<typeof updateAttackGroupRequestSchema>;

// --- Réponses -------------------------------------------------------------------

export const attackGroupActionSchema = z.object({
  group: z.string().optional(),
  action: z.string().optional(),
  conditionException: attackGroupConditionExceptionSchema.optional(),
});

export const getAttackGroupsResponseSchema = z.object({
  attackGroupActions: z.array(attackGroupActionSchema).default([]),
});

export const getAttackGroupResponseSchema = z.object({
  action: z.string().optional(),
  conditionException: attackGroupConditionExceptionSchema.optional(),
});

export const updateAttackGroupResponseSchema = getAttackGroupResponseSchema;

export type AttackGroupAction = z.infer<typeof attackGroupActionSchema>;
export type GetAttackGroupsResponse = z.infer<typeof getAttackGroupsResponseSchema>;
export type GetAttackGroupResponse = z.infer<typeof getAttackGroupResponseSchema>;
export type UpdateAttackGroupResponse = z.infer<typeof updateAttackGroupResponseSchema>;

/** Vrai si la réponse ne porte aucune condition/exception. */
export function isEmptyConditionException(response: GetAttackGroupResponse): boolean {
  return response.conditionException === undefined;
}
