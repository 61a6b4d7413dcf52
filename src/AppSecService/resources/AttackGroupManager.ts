import AppSecServiceManager, { AppSecContext, OperationOptions } from '../AppSecServiceManager';
import { filterByField } from '../../core/utils/ListFilter';
import {
  GetAttackGroupRequest,
  GetAttackGroupResponse,
  GetAttackGroupsRequest,
  GetAttackGroupsResponse,
  UpdateAttackGroupRequest,
  UpdateAttackGroupResponse,
  getAttackGroupRequestSchema,
  getAttackGroupResponseSchema,
  getAttackGroupsRequestSchema,
  getAttackGroupsResponseSchema,
  updateAttackGroupRequestSchema,
  updateAttackGroupResponseSchema,
} from '../appSecApiInterfaces/AttackGroup';

/**
 * Groupes d'attaque d'une politique de sécurité : action associée et conditions/exceptions.
 */
export default class AttackGroupManager extends AppSecServiceManager {
  constructor(context: AppSecContext) {
    super(context);
  }

  /**
   * Liste des groupes d'attaque ; `group` filtre côté client.
   */
  public async getAttackGroups(params: GetAttackGroupsRequest, options?: OperationOptions): Promise<GetAttackGroupsResponse> {
    const request = this.validate('GetAttackGroups', getAttackGroupsRequestSchema, params);
    const result = await this.call(
      { operation: 'GetAttackGroups', endpoint: 'getAttackGroups', params: request, response: getAttackGroupsResponseSchema },
      options,
    );
    if (!request.group) return result;

    return { ...result, attackGroupActions: filterByField(result.attackGroupActions, (g) => g.group, request.group) };
  }

  public async getAttackGroup(params: GetAttackGroupRequest, options?: OperationOptions): Promise<GetAttackGroupResponse> {
    const request = this.validate('GetAttackGroup', getAttackGroupRequestSchema, params);
    return this.call({ operation: 'GetAttackGroup', endpoint: 'getAttackGroup', params: request, response: getAttackGroupResponseSchema }, options);
  }

  /**
   * Met à jour l'action et, si fournie, la conditionException (JSON brut inséré tel quel).
   */
  public async updateAttackGroup(params: UpdateAttackGroupRequest, options?: OperationOptions): Promise<UpdateAttackGroupResponse> {
    const request = this.validate('UpdateAttackGroup', updateAttackGroupRequestSchema, params);
    const exception = request.jsonPayload !== undefined ? `,"conditionException":${request.jsonPayload}` : '';
    const body = `{"action":${JSON.stringify(request.action)}${exception}}`;

    return this.call(
      { operation: 'UpdateAttackGroup', endpoint: 'updateAttackGroup', params: request, body, response: updateAttackGroupResponseSchema },
      options,
    );
  }
}
