import { MakeApiClient } from '../api/client.js';
import { HookMappingStore } from '../database/mapping-store.js';
import type { ToolApi } from '../mcp/tools.js';
import { ScenarioService } from '../scenarios/service.js';
import { loadConfigFromEnv, type MakeConfig } from '../utils/config.js';

export type CliApi = ToolApi & Pick<MakeApiClient, 'getCurrentUser' | 'listOrganizations' | 'listTeams' | 'updateHook'>;

export interface CliServices {
    config: MakeConfig;
    api: CliApi;
    scenarios: ScenarioService;
}

export interface ResolveOptions {
    store?: HookMappingStore;
    requireScope?: boolean;
}

/** What commands reach for; tests swap in fakes. */
export interface CliContext {
    /** Throws ConfigError when MAKE_* settings are missing or invalid. */
    resolveServices(options?: ResolveOptions): CliServices;
    openStore(): HookMappingStore;
}

export function createEnvContext(): CliContext {
    return {
        resolveServices(options = {}) {
            const config = loadConfigFromEnv(process.env, { requireScope: options.requireScope ?? true });
            const api = new MakeApiClient(config);
            return { config, api, scenarios: new ScenarioService(api, config, options.store) };
        },
        openStore() {
            return new HookMappingStore(process.env['DATABASE_PATH']);
        },
    };
}
