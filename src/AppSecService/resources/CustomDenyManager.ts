import AppSecServiceManager, { AppSecContext, OperationOptions } from '../AppSecServiceManager';
import { filterByField } from '../../core/utils/ListFilter';
import {
  CreateCustomDenyRequest,
  CreateCustomDenyResponse,
  GetCustomDenyListRequest,
  GetCustomDenyListResponse,
  GetCustomDenyRequest,
  GetCustomDenyResponse,
  RemoveCustomDenyRequest,
  RemoveCustomDenyResponse,
  UpdateCustomDenyRequest,
  UpdateCustomDenyResponse,
  createCustomDenyRequestSchema,
  createCustomDenyResponseSchema,
  getCustomDenyListRequestSchema,
  getCustomDenyListResponseSchema,
  getCustomDenyRequestSchema,
  getCustomDenyResponseSchema,
  removeCustomDenyRequestSchema,
  removeCustomDenyResponseSchema,
  updateCustomDenyRequestSchema,
  updateCustomDenyResponseSchema,
} from '../appSecApiInterfaces/CustomDeny';

/**
 * Actions de refus personnalisées (page ou redirection renvoyée au client bloqué).
 */
export default class CustomDenyManager extends AppSecServiceManager {
  constructor(context: AppSecContext) {
    super(context);
  }

  public async getCustomDenyList(params: GetCustomDenyListRequest, options?: OperationOptions): Promise<GetCustomDenyListResponse> {
    const request = this.validate('GetCustomDenyList', getCustomDenyListRequestSchema, params);
    const result = await this.call(
      { operation: 'GetCustomDenyList', endpoint: 'getCustomDenyList', params: request, response: getCustomDenyListResponseSchema },
      options,
    );
    if (!request.id) return result;

    return { customDenyList: filterByField(result.customDenyList, (d) => d.id, request.id) };
  }

  public async getCustomDeny(params: GetCustomDenyRequest, options?: OperationOptions): Promise<GetCustomDenyResponse> {
    const request = this.validate('GetCustomDeny', getCustomDenyRequestSchema, params);
    return this.call({ operation: 'GetCustomDeny', endpoint: 'getCustomDeny', params: request, response: getCustomDenyResponseSchema }, options);
  }

  public async createCustomDeny(params: CreateCustomDenyRequest, options?: OperationOptions): Promise<CreateCustomDenyResponse> {
    const request = this.validate('CreateCustomDeny', createCustomDenyRequestSchema, params);
    return this.call(
      { operation: 'CreateCustomDeny', endpoint: 'createCustomDeny', params: request, body: request.jsonPayload, response: createCustomDenyResponseSchema },
      options,
    );
  }

  public async updateCustomDeny(params: UpdateCustomDenyRequest, options?: OperationOptions): Promise<UpdateCustomDenyResponse> {
    const request = this.validate('UpdateCustomDeny', updateCustomDenyRequestSchema, params);
    return this.call(
      { operation: 'UpdateCustomDeny', endpoint: 'updateCustomDeny', params: request, body: request.jsonPayload, response: updateCustomDenyResponseSchema },
      options,
    );
  }

  public async removeCustomDeny(params: RemoveCustomDenyRequest, options?: OperationOptions): Promise<RemoveCustomDenyResponse> {
    const request = this.validate('RemoveCustomDeny', removeCustomDenyRequestSchema, params);
    return this.call({ operation: 'RemoveCustomDeny', endpoint: 'removeCustomDeny', params: request, response: removeCustomDenyResponseSchema }, options);
  }
}
