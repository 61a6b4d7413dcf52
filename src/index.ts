export { default as AppSecClient } from './AppSecService/AppSecClient';
export type { AppSecClientOptions, SessionOptions } from './AppSecService/AppSecClient';
export type { AppSecContext, OperationOptions } from './AppSecService/AppSecServiceManager';

export { default as AttackGroupManager } from './AppSecService/resources/AttackGroupManager';
export { default as MatchTargetManager } from './AppSecService/resources/MatchTargetManager';
export { default as ReputationProfileManager } from './AppSecService/resources/ReputationProfileManager';
export { default as CustomDenyManager } from './AppSecService/resources/CustomDenyManager';
export { default as ConfigurationCloneManager } from './AppSecService/resources/ConfigurationCloneManager';
export { default as VersionNotesManager } from './AppSecService/resources/VersionNotesManager';
export { default as ReputationAnalysisManager } from './AppSecService/resources/ReputationAnalysisManager';
export { default as HostnameCoverageManager } from './AppSecService/resources/HostnameCoverageManager';

export * from './AppSecService/appSecApiInterfaces/AttackGroup';
export * from './AppSecService/appSecApiInterfaces/MatchTarget';
export * from './AppSecService/appSecApiInterfaces/ReputationProfile';
export * from './AppSecService/appSecApiInterfaces/CustomDeny';
export * from './AppSecService/appSecApiInterfaces/ConfigurationClone';
export * from './AppSecService/appSecApiInterfaces/VersionNotes';
export * from './AppSecService/appSecApiInterfaces/ReputationAnalysis';
export * from './AppSecService/appSecApiInterfaces/HostnameCoverage';
export type { BypassNetworkList } from './AppSecService/appSecApiInterfaces/Common';

export { ApiServiceManager } from './core/utils/ApiServiceManager';
export type { ApiRequest, ApiServiceManagerOptions, ExecResult, FetchLike, HttpExecutor } from './core/utils/ApiServiceManager';
export { ApiConfigService, DEFAULT_API_LIB } from './core/utils/ApiConfigService';
export { EdgeGridSigner } from './core/utils/EdgeGridSigner';
export type { RequestSigner, SignableRequest } from './core/utils/EdgeGridSigner';
export { AppSecError, ApiError, TransportError, ValidationError } from './core/utils/errors';
export type { FieldIssue, ProblemDetails } from './core/utils/errors';
export { classifyFlexible, flexibleString, flexibleStringList } from './core/utils/FlexibleDecoder';
export type { FlexibleValue } from './core/utils/FlexibleDecoder';
export { ConsoleLogger } from './core/utils/Logger';
export type { Logger } from './core/utils/Logger';
export { AuditService, FileAuditTransport } from './core/utils/AuditService';
export type { AuditEvent, AuditTransport } from './core/utils/AuditService';
export { ConfigError, loadEdgeGridConfigFromEnv, loadEdgeGridConfigFromFile } from './config/config';
export type { ConfigErrorCode, EdgeGridConfig } from './config/config';
