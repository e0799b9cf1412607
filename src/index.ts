// Programmatic API: relay, gate, policy loading, classifiers
export { logger, resolveLogLevel } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  SessionRelay,
  mirrorCapabilities,
  buildAllowedTools,
  buildBlockedResult,
  disallowedEffects,
  isAllowed,
  AllowedNameCache,
  EffectGateError,
  ConfigError,
  BackendUnavailableError,
  GateAction,
  BLOCKED_META_KEY,
} from "./core/index.js";
export type {
  ToolGateResult,
  CatalogSnapshot,
  ConfigErrorCode,
  RelayState,
  RelayTransports,
  SessionRelayConfig,
  BlockedCallMeta,
  GateActionName,
} from "./core/index.js";
export {
  createBackendTransport,
  createCallerTransport,
  buildBackendEnvironment,
} from "./core/transports/index.js";
export {
  CONFIG_FILE_NAMES,
  getConfigPath,
  readPolicyDocument,
  listServerNames,
  parsePolicy,
  loadPolicy,
  createServerPolicy,
  computeEffectiveAllowed,
  isEffectAllowed,
  parseCliArgs,
  CLI_USAGE,
} from "./config/index.js";
export type {
  PolicyDocument,
  ServerPolicy,
  ServerPolicyEntry,
  ServerPolicyInit,
  CliOptions,
  CliArgsResult,
} from "./config/index.js";
export { EFFECT_LABELS, isEffectLabel } from "./interfaces/index.js";
export type {
  EffectLabel,
  EffectClassifierInterface,
  EffectsByName,
  ToolDefinition,
  ToolOverrides,
} from "./interfaces/index.js";
export {
  KeywordEffectClassifier,
  FixedEffectClassifier,
  loadDefaultKeywords,
  tokenize,
  type KeywordTable,
} from "./plugins/classifier/index.js";
export { getPackageVersion } from "./version.js";
