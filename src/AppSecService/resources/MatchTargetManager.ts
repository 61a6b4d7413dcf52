import AppSecServiceManager, { AppSecContext, OperationOptions } from '../AppSecServiceManager';
import { filterByField } from '../../core/utils/ListFilter';
import {
  CreateMatchTargetRequest,
  CreateMatchTargetResponse,
  GetMatchTargetRequest,
  GetMatchTargetResponse,
  GetMatchTargetsRequest,
  GetMatchTargetsResponse,
  RemoveMatchTargetRequest,
  RemoveMatchTargetResponse,
  UpdateMatchTargetRequest,
  UpdateMatchTargetResponse,
  createMatchTargetRequestSchema,
  createMatchTargetResponseSchema,
  getMatchTargetRequestSchema,
  getMatchTargetResponseSchema,
  getMatchTargetsRequestSchema,
  getMatchTargetsResponseSchema,
  removeMatchTargetRequestSchema,
  removeMatchTargetResponseSchema,
  updateMatchTargetRequestSchema,
  updateMatchTargetResponseSchema,
} from '../appSecApiInterfaces/MatchTarget';

export default class MatchTargetManager extends AppSecServiceManager {
  constructor(context: AppSecContext) {
    super(context);
  }

  /**
   * Cibles d'une version de configuration ; `targetId` filtre les deux variantes côté client.
   */
  public async getMatchTargets(params: GetMatchTargetsRequest, options?: OperationOptions): Promise<GetMatchTargetsResponse> {
    const request = this.validate('GetMatchTargets', getMatchTargetsRequestSchema, params);
    const result = await this.call(
      { operation: 'GetMatchTargets', endpoint: 'getMatchTargets', params: request, response: getMatchTargetsResponseSchema },
      options,
    );
    if (!request.targetId) return result;

    const { apiTargets, websiteTargets } = result.matchTargets;
    return {
      matchTargets: {
        apiTargets: filterByField(apiTargets, (t) => t.targetId, request.targetId),
        websiteTargets: filterByField(websiteTargets, (t) => t.targetId, request.targetId),
      },
    };
  }

  public async getMatchTarget(params: GetMatchTargetRequest, options?: OperationOptions): Promise<GetMatchTargetResponse> {
    const request = this.validate('GetMatchTarget', getMatchTargetRequestSchema, params);
    return this.call({ operation: 'GetMatchTarget', endpoint: 'getMatchTarget', params: request, response: getMatchTargetResponseSchema }, options);
  }

  public async createMatchTarget(params: CreateMatchTargetRequest, options?: OperationOptions): Promise<CreateMatchTargetResponse> {
    const request = this.validate('CreateMatchTarget', createMatchTargetRequestSchema, params);
    return this.call(
      { operation: 'CreateMatchTarget', endpoint: 'createMatchTarget', params: request, body: request.jsonPayload, response: createMatchTargetResponseSchema },
      options,
    );
  }

  public async updateMatchTarget(params: UpdateMatchTargetRequest, options?: OperationOptions): Promise<UpdateMatchTargetResponse> {
    const request = this.validate('UpdateMatchTarget', updateMatchTargetRequestSchema, params);
    return this.call(
      { operation: 'UpdateMatchTarget', endpoint: 'updateMatchTarget', params: request, body: request.jsonPayload, response: updateMatchTargetResponseSchema },
      options,
    );
  }

  public async removeMatchTarget(params: RemoveMatchTargetRequest, options?: OperationOptions): Promise<RemoveMatchTargetResponse> {
    const request = this.validate('RemoveMatchTarget', removeMatchTargetRequestSchema, params);
    return this.call({ operation: 'RemoveMatchTarget', endpoint: 'removeMatchTarget', params: request, response: removeMatchTargetResponseSchema }, options);
  }
}
