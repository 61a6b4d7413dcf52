import AppSecServiceManager, { AppSecContext, OperationOptions } from '../AppSecServiceManager';
import {
  GetApiHostnameCoverageOverlappingRequest,
  GetApiHostnameCoverageOverlappingResponse,
  getApiHostnameCoverageOverlappingRequestSchema,
  getApiHostnameCoverageOverlappingResponseSchema,
} from '../appSecApiInterfaces/HostnameCoverage';

export default class HostnameCoverageManager extends AppSecServiceManager {
  constructor(context: AppSecContext) {
    super(context);
  }

  /**
   * Autres configurations couvrant les mêmes hôtes que cette version.
   */
  public async getApiHostnameCoverageOverlapping(
    params: GetApiHostnameCoverageOverlappingRequest,
    options?: OperationOptions,
  ): Promise<GetApiHostnameCoverageOverlappingResponse> {
    const request = this.validate('GetApiHostnameCoverageOverlapping', getApiHostnameCoverageOverlappingRequestSchema, params);
    return this.call(
      {
        operation: 'GetApiHostnameCoverageOverlapping',
        endpoint: 'getApiHostnameCoverageOverlapping',
        params: request,
        response: getApiHostnameCoverageOverlappingResponseSchema,
      },
      options,
    );
  }
}
