import AppSecServiceManager, { AppSecContext, OperationOptions } from '../AppSecServiceManager';
import { filterByField } from '../../core/utils/ListFilter';
import {
  CreateReputationProfileRequest,
  CreateReputationProfileResponse,
  GetReputationProfileRequest,
  GetReputationProfileResponse,
  GetReputationProfilesRequest,
  GetReputationProfilesResponse,
  RemoveReputationProfileRequest,
  RemoveReputationProfileResponse,
  UpdateReputationProfileRequest,
  UpdateReputationProfileResponse,
  createReputationProfileRequestSchema,
  createReputationProfileResponseSchema,
  getReputationProfileRequestSchema,
  getReputationProfileResponseSchema,
  getReputationProfilesRequestSchema,
  getReputationProfilesResponseSchema,
  removeReputationProfileRequestSchema,
  removeReputationProfileResponseSchema,
  updateReputationProfileRequestSchema,
  updateReputationProfileResponseSchema,
} from '../appSecApiInterfaces/ReputationProfile';

export default class ReputationProfileManager extends AppSecServiceManager {
  constructor(context: AppSecContext) {
    super(context);
  }

  public async getReputationProfiles(
    params: GetReputationProfilesRequest,
    options?: OperationOptions,
  ): Promise<GetReputationProfilesResponse> {
    const request = this.validate('GetReputationProfiles', getReputationProfilesRequestSchema, params);
    const result = await this.call(
      { operation: 'GetReputationProfiles', endpoint: 'getReputationProfiles', params: request, response: getReputationProfilesResponseSchema },
      options,
    );
    if (!request.reputationProfileId) return result;

    return { reputationProfiles: filterByField(result.reputationProfiles, (p) => p.id, request.reputationProfileId) };
  }

  public async getReputationProfile(params: GetReputationProfileRequest, options?: OperationOptions): Promise<GetReputationProfileResponse> {
    const request = this.validate('GetReputationProfile', getReputationProfileRequestSchema, params);
    return this.call(
      { operation: 'GetReputationProfile', endpoint: 'getReputationProfile', params: request, response: getReputationProfileResponseSchema },
      options,
    );
  }

  public async createReputationProfile(
    params: CreateReputationProfileRequest,
    options?: OperationOptions,
  ): Promise<CreateReputationProfileResponse> {
    const request = this.validate('CreateReputationProfile', createReputationProfileRequestSchema, params);
    return this.call(
      {
        operation: 'CreateReputationProfile',
        endpoint: 'createReputationProfile',
        params: request,
        body: request.jsonPayload,
        response: createReputationProfileResponseSchema,
      },
      options,
    );
  }

  public async updateReputationProfile(
    params: UpdateReputationProfileRequest,
    options?: OperationOptions,
  ): Promise<UpdateReputationProfileResponse> {
    const request = this.validate('UpdateReputationProfile', updateReputationProfileRequestSchema, params);
    return this.call(
      {
        operation: 'UpdateReputationProfile',
        endpoint: 'updateReputationProfile',
        params: request,
        body: request.jsonPayload,
        response: updateReputationProfileResponseSchema,
      },
      options,
    );
  }

  public async removeReputationProfile(
    params: RemoveReputationProfileRequest,
    options?: OperationOptions,
  ): Promise<RemoveReputationProfileResponse> {
    const request = this.validate('RemoveReputationProfile', removeReputationProfileRequestSchema, params);
    return this.call(
      { operation: 'RemoveReputationProfile', endpoint: 'removeReputationProfile', params: request, response: removeReputationProfileResponseSchema },
      options,
    );
  }
}
