import AppSecServiceManager, { AppSecContext, OperationOptions } from '../AppSecServiceManager';
import {
  GetReputationAnalysisRequest,
  RemoveReputationAnalysisRequest,
  ReputationAnalysis,
  ReputationAnalysisFlags,
  UpdateReputationAnalysisRequest,
  reputationAnalysisSchema,
  reputationAnalysisTargetSchema,
  updateReputationAnalysisRequestSchema,
} from '../appSecApiInterfaces/ReputationAnalysis';

function forwardFlags(request: ReputationAnalysisFlags): string {
  return JSON.stringify({
    forwardToHTTPHeader: request.forwardToHTTPHeader,
    forwardSharedIPToHTTPHeaderAndSIEM: request.forwardSharedIPToHTTPHeaderAndSIEM,
  });
}

/**
 * Réglages d'analyse de réputation d'une politique de sécurité.
 */
export default class ReputationAnalysisManager extends AppSecServiceManager {
  constructor(context: AppSecContext) {
    super(context);
  }

  public async getReputationAnalysis(params: GetReputationAnalysisRequest, options?: OperationOptions): Promise<ReputationAnalysis> {
    const request = this.validate('GetReputationAnalysis', reputationAnalysisTargetSchema, params);
    return this.call(
      { operation: 'GetReputationAnalysis', endpoint: 'getReputationAnalysis', params: request, response: reputationAnalysisSchema },
      options,
    );
  }

  public async updateReputationAnalysis(params: UpdateReputationAnalysisRequest, options?: OperationOptions): Promise<ReputationAnalysis> {
    const request = this.validate('UpdateReputationAnalysis', updateReputationAnalysisRequestSchema, params);
    const body = forwardFlags(request);

    return this.call(
      { operation: 'UpdateReputationAnalysis', endpoint: 'updateReputationAnalysis', params: request, body, response: reputationAnalysisSchema },
      options,
    );
  }

  /**
   * Réinitialise les réglages : PUT des deux drapeaux, `false` s'ils ne sont pas fournis.
   * La requête est validée comme les autres.
   */
  public async removeReputationAnalysis(params: RemoveReputationAnalysisRequest, options?: OperationOptions): Promise<ReputationAnalysis> {
    const request = this.validate('RemoveReputationAnalysis', updateReputationAnalysisRequestSchema, params);
    const body = forwardFlags(request);

    return this.call(
      { operation: 'RemoveReputationAnalysis', endpoint: 'removeReputationAnalysis', params: request, body, response: reputationAnalysisSchema },
      options,
    );
  }
}
