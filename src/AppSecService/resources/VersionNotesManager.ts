import AppSecServiceManager, { AppSecContext, OperationOptions } from '../AppSecServiceManager';
import {
  GetVersionNotesRequest,
  UpdateVersionNotesRequest,
  VersionNotes,
  getVersionNotesRequestSchema,
  updateVersionNotesRequestSchema,
  versionNotesResponseSchema,
} from '../appSecApiInterfaces/VersionNotes';

export default class VersionNotesManager extends AppSecServiceManager {
  constructor(context: AppSecContext) {
    super(context);
  }

  public async getVersionNotes(params: GetVersionNotesRequest, options?: OperationOptions): Promise<VersionNotes> {
    const request = this.validate('GetVersionNotes', getVersionNotesRequestSchema, params);
    return this.call({ operation: 'GetVersionNotes', endpoint: 'getVersionNotes', params: request, response: versionNotesResponseSchema }, options);
  }

  public async updateVersionNotes(params: UpdateVersionNotesRequest, options?: OperationOptions): Promise<VersionNotes> {
    const request = this.validate('UpdateVersionNotes', updateVersionNotesRequestSchema, params);
    return this.call(
      {
        operation: 'UpdateVersionNotes',
        endpoint: 'updateVersionNotes',
        params: request,
        body: JSON.stringify({ notes: request.notes }),
        response: versionNotesResponseSchema,
      },
      options,
    );
  }
}
