/**
 * Scenario operations that involve blueprint handling on top of the raw
 * API client: naming, serialisation, default scheduling, hook rewriting.
 */

import type { MakeApiClient } from '../api/client.js';
import type { CreateScenarioPayload, ScenarioRecord } from '../api/types.js';
import {
    DEFAULT_WEBHOOK_NAME_PREFIX,
    mappingToRecord,
    rewriteHooks,
    type HookProvisioner,
    type RewriteHooksResult,
    type WebhookRecord,
} from '../blueprint/hooks.js';
import { formatBlueprintForApi, isJsonObject, parseBlueprint, type Blueprint } from '../blueprint/json.js';
import type { HookMappingStore } from '../database/mapping-store.js';
import type { MakeConfig } from '../utils/config.js';
import { BlueprintError, HookProvisioningError } from '../utils/errors.js';
import { createLogger, errorMessage } from '../utils/logger.js';

const log = createLogger('scenarios');

export const UNTITLED_SCENARIO = 'Untitled Scenario';
export const DEFAULT_SCHEDULING: Readonly<Record<string, unknown>> = { type: 'indefinitely' };

/** API surface the service needs; MakeApiClient satisfies it. */
export type ScenarioApi = HookProvisioner &
    Pick<
        MakeApiClient,
        'createScenario' | 'updateScenario' | 'getScenarioBlueprint' | 'runScenario' | 'deleteScenario'
    >;

export interface CreateScenarioOptions {
    name?: string;
    folderId?: number;
    scheduling?: Record<string, unknown>;
}

export interface FreshHooksOptions extends CreateScenarioOptions {
    namePrefix?: string;
    /** Reuse and extend the mapping stored under this key. */
    mappingKey?: string;
}

export interface CloneScenarioOptions {
    webhookMapping?: ReadonlyMap<number, number>;
    connectionMapping?: ReadonlyMap<number, number>;
}

export interface ProvisionedWebhook {
    id: number;
    name: string;
    url: string;
    replacedHookId: number;
}

export type ScenarioWithWebhooks = ScenarioRecord & {
    webhooks: ProvisionedWebhook[];
    hookMapping: Record<string, number>;
};

type DetailResult =
    | { ok: true; webhook: ProvisionedWebhook }
    | { ok: false; hookId: number; error: unknown };

export class ScenarioService {
    constructor(
        private readonly api: ScenarioApi,
        private readonly config: Pick<MakeConfig, 'teamId' | 'organizationId'>,
        private readonly store?: HookMappingStore,
    ) {}

    /**
     * Create a scenario from a blueprint object or its JSON text. The name
     * falls back to the blueprint's own `name`, then to "Untitled Scenario";
     * text that is not JSON is sent as is under the fallback name.
     */
    async createScenario(blueprint: Blueprint | string, options: CreateScenarioOptions = {}): Promise<ScenarioRecord> {
        const blueprintJson = typeof blueprint === 'string' ? blueprint : formatBlueprintForApi(blueprint);
        const scenarioName = options.name ?? blueprintName(blueprint) ?? UNTITLED_SCENARIO;

        const payload: CreateScenarioPayload = {
            name: scenarioName,
            blueprint: blueprintJson,
            scheduling: JSON.stringify(options.scheduling ?? DEFAULT_SCHEDULING),
        };
        if (this.config.organizationId !== undefined) payload.organizationId = this.config.organizationId;
        else if (this.config.teamId !== undefined) payload.teamId = this.config.teamId;
        if (options.folderId) payload.folderId = options.folderId;

        const scenario = await this.api.createScenario(payload);
        if (scenario.isinvalid === true) {
            log.warn('Scenario was created but Make marked it invalid; some modules may be unavailable in this account or region', {
                scenarioId: scenario.id,
            });
        }
        return scenario;
    }

    /**
     * Copy an existing scenario. Hook ids are rewritten through
     * `webhookMapping` only; ids it does not cover are kept and logged.
     */
    async cloneScenario(sourceScenarioId: number, newName: string, options: CloneScenarioOptions = {}): Promise<ScenarioRecord> {
        const source = await this.api.getScenarioBlueprint(sourceScenarioId);
        if (!isJsonObject(source)) {
            throw new BlueprintError(`Scenario ${sourceScenarioId} returned a blueprint that is not a JSON object`);
        }

        let blueprint: Blueprint = source;
        if (options.webhookMapping && options.webhookMapping.size > 0) {
            const rewritten = await rewriteHooks(source, this.api, {
                seedMapping: options.webhookMapping,
                createMissing: false,
            });
            blueprint = rewritten.blueprint;
        }
        if (options.connectionMapping && options.connectionMapping.size > 0) {
            log.warn('Connection mapping is not implemented; connections are copied unchanged');
        }

        const cloned = await this.createScenario(blueprint, { name: newName });
        log.info(`Cloned scenario ${sourceScenarioId} to ${cloned.id}`);
        return cloned;
    }

    async updateScenarioBlueprint(
        scenarioId: number,
        blueprint: Blueprint | string,
        scheduling?: Record<string, unknown>,
    ): Promise<ScenarioRecord> {
        const blueprintJson = typeof blueprint === 'string' ? blueprint : formatBlueprintForApi(blueprint);
        return this.api.updateScenario(scenarioId, {
            blueprint: blueprintJson,
            ...(scheduling ? { scheduling: JSON.stringify(scheduling) } : {}),
        });
    }

    async activateScenario(scenarioId: number): Promise<ScenarioRecord> {
        const scenario = await this.api.updateScenario(scenarioId, { isActive: true });
        log.info(`Activated scenario ${scenarioId}`);
        return scenario;
    }

    async deactivateScenario(scenarioId: number): Promise<ScenarioRecord> {
        const scenario = await this.api.updateScenario(scenarioId, { isActive: false });
        log.info(`Deactivated scenario ${scenarioId}`);
        return scenario;
    }

    async runScenario(
        scenarioId: number,
        inputData?: Record<string, unknown>,
        options: { waitForCompletion?: boolean } = {},
    ): Promise<unknown> {
        if (options.waitForCompletion) {
            // TODO: poll GET /scenarios/{id}/executions once the run returns an executionId
            log.warn('Waiting for completion is not supported; returning as soon as the run starts');
        }
        return this.api.runScenario(scenarioId, inputData);
    }

    async deleteScenario(scenarioId: number): Promise<unknown> {
        return this.api.deleteScenario(scenarioId);
    }

    /**
     * Deploy a blueprint with a new webhook in place of every hardcoded hook.
     *
     * Malformed text is rejected before any request. Webhooks are created
     * first, then the scenario; the details of each new webhook are fetched
     * last, and a failed lookup only drops that webhook from `webhooks`.
     */
    async createScenarioWithFreshHooks(
        blueprint: Blueprint | string,
        options: FreshHooksOptions = {},
    ): Promise<ScenarioWithWebhooks> {
        const document = parseBlueprint(blueprint);
        const { namePrefix = DEFAULT_WEBHOOK_NAME_PREFIX, mappingKey, ...createOptions } = options;

        const seedMapping = mappingKey && this.store ? this.store.getMapping(mappingKey) : new Map<number, number>();
        let rewritten: RewriteHooksResult<Blueprint>;
        try {
            rewritten = await rewriteHooks(document, this.api, { seedMapping, createMissing: true, namePrefix });
        } catch (error) {
            // Keep what was created so the next run reuses it instead of orphaning it
            if (mappingKey && this.store && error instanceof HookProvisioningError && error.provisioned.size > 0) {
                this.store.saveMapping(mappingKey, error.provisioned);
            }
            throw error;
        }
        const { blueprint: updated, mapping } = rewritten;

        if (mappingKey && this.store) {
            this.store.saveMapping(mappingKey, mapping);
        }

        const scenario = await this.createScenario(updated, createOptions);

        const details: DetailResult[] = [];
        for (const [oldHookId, newHookId] of mapping) {
            details.push(await this.fetchWebhook(oldHookId, newHookId));
        }

        const webhooks: ProvisionedWebhook[] = [];
        for (const result of details) {
            if (result.ok) {
                webhooks.push(result.webhook);
            } else {
                log.warn(`Could not get details for hook ${result.hookId}`, { error: errorMessage(result.error) });
            }
        }

        log.info(`Created scenario with new hooks: ${scenario.name ?? UNTITLED_SCENARIO} (ID: ${scenario.id})`);
        return { ...scenario, webhooks, hookMapping: mappingToRecord(mapping) };
    }

    private async fetchWebhook(oldHookId: number, newHookId: number): Promise<DetailResult> {
        let hook: WebhookRecord;
        try {
            hook = await this.api.getHookDetails(newHookId);
        } catch (error) {
            return { ok: false, hookId: newHookId, error };
        }
        return {
            ok: true,
            webhook: {
                id: newHookId,
                name: hook.name ?? 'Unknown',
                url: hook.url ?? 'Unknown',
                replacedHookId: oldHookId,
            },
        };
    }
}

function blueprintName(blueprint: Blueprint | string): string | undefined {
    if (typeof blueprint !== 'string') {
        const name = blueprint['name'];
        return typeof name === 'string' ? name : undefined;
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(blueprint);
    } catch (error) {
        log.debug('Blueprint text is not JSON; using the fallback scenario name', { error: errorMessage(error) });
        return undefined;
    }
    if (!isJsonObject(parsed)) return undefined;
    const name = parsed['name'];
    return typeof name === 'string' ? name : undefined;
}
