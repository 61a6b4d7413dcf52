import AppSecServiceManager, { AppSecContext, OperationOptions } from '../AppSecServiceManager';
import {
  CreateConfigurationCloneRequest,
  CreateConfigurationCloneResponse,
  GetConfigurationCloneRequest,
  GetConfigurationCloneResponse,
  createConfigurationCloneRequestSchema,
  createConfigurationCloneResponseSchema,
  getConfigurationCloneRequestSchema,
  getConfigurationCloneResponseSchema,
} from '../appSecApiInterfaces/ConfigurationClone';

export default class ConfigurationCloneManager extends AppSecServiceManager {
  constructor(context: AppSecContext) {
    super(context);
  }

  /**
   * Description d'une version : auteur, version d'origine, statut staging/production.
   */
  public async getConfigurationClone(params: GetConfigurationCloneRequest, options?: OperationOptions): Promise<GetConfigurationCloneResponse> {
    const request = this.validate('GetConfigurationClone', getConfigurationCloneRequestSchema, params);
    return this.call(
      { operation: 'GetConfigurationClone', endpoint: 'getConfigurationClone', params: request, response: getConfigurationCloneResponseSchema },
      options,
    );
  }

  /**
   * Crée une configuration à partir de `createFrom`.
   */
  public async createConfigurationClone(
    params: CreateConfigurationCloneRequest,
    options?: OperationOptions,
  ): Promise<CreateConfigurationCloneResponse> {
    const request = this.validate('CreateConfigurationClone', createConfigurationCloneRequestSchema, params);
    const { name, description, contractId, groupId, hostnames, createFrom } = request;
    const body = JSON.stringify({ name, description, contractId, groupId, hostnames, createFrom });

    return this.call(
      { operation: 'CreateConfigurationClone', endpoint: 'createConfigurationClone', params: request, body, response: createConfigurationCloneResponseSchema },
      options,
    );
  }
}
