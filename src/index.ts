export { MakeApiClient, type MakeApiClientOptions } from './api/client.js';
export type {
    CreateScenarioPayload,
    ListHooksFilter,
    OrganizationRecord,
    ScenarioRecord,
    TeamRecord,
    UpdateScenarioPatch,
    UserRecord,
} from './api/types.js';
export {
    DEFAULT_WEBHOOK_NAME_PREFIX,
    GATEWAY_WEBHOOK_TYPE,
    applyHookMapping,
    findHooks,
    mappingFromRecord,
    mappingToRecord,
    rewriteHooks,
    type CreateWebhookRequest,
    type HookMapping,
    type HookProvisioner,
    type RewriteHooksOptions,
    type RewriteHooksResult,
    type WebhookRecord,
} from './blueprint/hooks.js';
export {
    cloneJson,
    formatBlueprintForApi,
    parseBlueprint,
    type Blueprint,
    type JsonObject,
    type JsonValue,
} from './blueprint/json.js';
export { HookMappingStore, type MappingSource } from './database/mapping-store.js';
export {
    DEFAULT_SCHEDULING,
    ScenarioService,
    UNTITLED_SCENARIO,
    type CloneScenarioOptions,
    type CreateScenarioOptions,
    type FreshHooksOptions,
    type ProvisionedWebhook,
    type ScenarioApi,
    type ScenarioWithWebhooks,
} from './scenarios/service.js';
export {
    DEFAULT_BASE_URL,
    DEFAULT_TIMEOUT_MS,
    describeConfig,
    loadConfigFromEnv,
    parseConfig,
    type MakeConfig,
    type ParseConfigOptions,
} from './utils/config.js';
export { BlueprintError, ConfigError, HookProvisioningError, MakeApiError } from './utils/errors.js';
export { createLogger, setLogLevel, type LogLevel, type Logger } from './utils/logger.js';
