import { ApiConfigService } from '../core/utils/ApiConfigService';
import { ApiServiceManager, ApiServiceManagerOptions, HttpExecutor } from '../core/utils/ApiServiceManager';
import AuditService from '../core/utils/AuditService';
import { ConsoleLogger, Logger } from '../core/utils/Logger';
import { DEFAULT_SECTION } from '../config/config';
import type { AppSecContext } from './AppSecServiceManager';
import AttackGroupManager from './resources/AttackGroupManager';
import ConfigurationCloneManager from './resources/ConfigurationCloneManager';
import CustomDenyManager from './resources/CustomDenyManager';
import HostnameCoverageManager from './resources/HostnameCoverageManager';
import MatchTargetManager from './resources/MatchTargetManager';
import ReputationAnalysisManager from './resources/ReputationAnalysisManager';
import ReputationProfileManager from './resources/ReputationProfileManager';
import VersionNotesManager from './resources/VersionNotesManager';

export interface AppSecClientOptions {
  executor: HttpExecutor;
  /** Bibliothèque d'endpoints ; chargée depuis APPSEC_API_LIB ou la bibliothèque livrée si absente. */
  endpoints?: ApiConfigService;
  logger?: Logger;
  audit?: AuditService;
}

export type SessionOptions = Omit<ApiServiceManagerOptions, 'credentials'> & Omit<AppSecClientOptions, 'executor'>;

/** Audit branché seulement si AUDIT_ENABLED=1. */
function auditFromEnv(): AuditService | undefined {
  return process.env.AUDIT_ENABLED === '1' ? AuditService.configureFromEnv() : undefined;
}

/**
 * Point d'entrée : un gestionnaire par famille de ressources, tous sur la même session.
 * Aucun état n'est conservé entre deux appels ; un client peut servir plusieurs tâches en parallèle.
 */
export default class AppSecClient {
  public readonly attackGroups: AttackGroupManager;
  public readonly matchTargets: MatchTargetManager;
  public readonly reputationProfiles: ReputationProfileManager;
  public readonly customDeny: CustomDenyManager;
  public readonly configurationClone: ConfigurationCloneManager;
  public readonly versionNotes: VersionNotesManager;
  public readonly reputationAnalysis: ReputationAnalysisManager;
  public readonly hostnameCoverage: HostnameCoverageManager;

  private constructor(context: AppSecContext) {
    this.attackGroups = new AttackGroupManager(context);
    this.matchTargets = new MatchTargetManager(context);
    this.reputationProfiles = new ReputationProfileManager(context);
    this.customDeny = new CustomDenyManager(context);
    this.configurationClone = new ConfigurationCloneManager(context);
    this.versionNotes = new VersionNotesManager(context);
    this.reputationAnalysis = new ReputationAnalysisManager(context);
    this.hostnameCoverage = new HostnameCoverageManager(context);
  }

  public static async create(options: AppSecClientOptions): Promise<AppSecClient> {
    const endpoints = options.endpoints ?? (await ApiConfigService.load());
    return new AppSecClient({
      executor: options.executor,
      endpoints,
      logger: options.logger ?? new ConsoleLogger('AppSecClient'),
      audit: options.audit,
    });
  }

  /**
   * Fabrique asynchrone : identifiants AKAMAI_* de l'environnement (.env compris).
   */
  public static async readyFromEnv(section: string = DEFAULT_SECTION, options: SessionOptions = {}): Promise<AppSecClient> {
    const { endpoints, logger, audit, ...session } = options;
    const executor = ApiServiceManager.fromEnv(section, { logger, ...session });
    return AppSecClient.create({ executor, endpoints, logger, audit: audit ?? auditFromEnv() });
  }

  /**
   * Fabrique asynchrone : identifiants lus dans une section d'un fichier .edgerc.
   */
  public static async fromEdgerc(filePath: string, section: string = DEFAULT_SECTION, options: SessionOptions = {}): Promise<AppSecClient> {
    const { endpoints, logger, audit, ...session } = options;
    const executor = await ApiServiceManager.fromEdgerc(filePath, section, { logger, ...session });
    return AppSecClient.create({ executor, endpoints, logger, audit: audit ?? auditFromEnv() });
  }
}
