/**
 * HTTP client for the Make.com REST API (v2).
 *
 * Make authenticates with `Authorization: Token <key>`, not `Bearer`.
 * Every failure, whether a non-2xx status, a timeout or a network error,
 * surfaces as a MakeApiError carrying the status and response body.
 */

import axios, { type AxiosAdapter, type AxiosInstance, type Method } from 'axios';
import { z } from 'zod';
import type { CreateWebhookRequest, HookProvisioner, WebhookRecord } from '../blueprint/hooks.js';
import { isJsonObject, type JsonValue } from '../blueprint/json.js';
import { defaultParams, type MakeConfig } from '../utils/config.js';
import { MakeApiError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import {
    organizationRecordSchema,
    scenarioRecordSchema,
    teamRecordSchema,
    userRecordSchema,
    webhookRecordSchema,
    type CreateScenarioPayload,
    type ListHooksFilter,
    type OrganizationRecord,
    type ScenarioRecord,
    type TeamRecord,
    type UpdateScenarioPatch,
    type UserRecord,
} from './types.js';

const log = createLogger('api');

export interface MakeApiClientOptions {
    /** Replaces axios' transport; tests pass an in-process adapter here. */
    adapter?: AxiosAdapter;
}

interface RequestOptions {
    data?: unknown;
    params?: Record<string, string | number | boolean>;
}

export class MakeApiClient implements HookProvisioner {
    private readonly http: AxiosInstance;

    constructor(private readonly config: MakeConfig, options: MakeApiClientOptions = {}) {
        this.http = axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs,
            headers: {
                Authorization: `Token ${config.apiKey}`,
                'Content-Type': 'application/json',
                Accept: 'application/json',
            },
            adapter: options.adapter,
        });
        log.debug(`Initialized Make API client for ${config.baseUrl}`);
    }

    async request(method: Method, endpoint: string, options: RequestOptions = {}): Promise<unknown> {
        const url = `/${endpoint.replace(/^\/+/, '')}`;
        log.debug(`${method.toUpperCase()} ${url}`, options.params ? { params: options.params } : undefined);

        try {
            const response = await this.http.request<unknown>({
                method,
                url,
                data: options.data,
                params: options.params,
            });
            return response.data === '' || response.data === undefined ? {} : response.data;
        } catch (error) {
            throw toApiError(error);
        }
    }

    // ── Scenarios ──

    async listScenarios(options: { activeOnly?: boolean } = {}): Promise<ScenarioRecord[]> {
        const params: Record<string, string | boolean> = { ...defaultParams(this.config) };
        if (options.activeOnly) {
            params['isActive'] = true;
        }
        const body = await this.request('GET', '/scenarios', { params });
        const scenarios = pickList(body, 'scenarios', scenarioRecordSchema);
        log.info(`Retrieved ${scenarios.length} scenario(s)`);
        return scenarios;
    }

    async getScenarioBlueprint(scenarioId: number): Promise<JsonValue> {
        const body = await this.request('GET', `/scenarios/${scenarioId}/blueprint`);
        const blueprint = pickField(body, 'response', jsonValueSchema);
        log.info(`Retrieved blueprint for scenario ${scenarioId}`);
        return blueprint;
    }

    async createScenario(payload: CreateScenarioPayload): Promise<ScenarioRecord> {
        const body = await this.request('POST', '/scenarios', { data: payload, params: { confirmed: true } });
        const scenario = pickField(body, 'scenario', scenarioRecordSchema);
        log.info(`Created scenario: ${payload.name} (ID: ${scenario.id})`);
        return scenario;
    }

    async updateScenario(scenarioId: number, patch: UpdateScenarioPatch): Promise<ScenarioRecord> {
        const body = await this.request('PATCH', `/scenarios/${scenarioId}`, { data: patch });
        const scenario = pickField(body, 'scenario', scenarioRecordSchema);
        log.info(`Updated scenario ${scenarioId}`);
        return scenario;
    }

    async runScenario(scenarioId: number, data?: Record<string, unknown>): Promise<unknown> {
        const body = await this.request('POST', `/scenarios/${scenarioId}/run`, { data: data ? { data } : {} });
        log.info(`Started execution of scenario ${scenarioId}`);
        return body;
    }

    async deleteScenario(scenarioId: number): Promise<unknown> {
        const body = await this.request('DELETE', `/scenarios/${scenarioId}`);
        log.info(`Deleted scenario ${scenarioId}`);
        return body;
    }

    // ── Hooks ──

    async listHooks(filter: ListHooksFilter = {}): Promise<WebhookRecord[]> {
        const params: Record<string, string | number> = { ...defaultParams(this.config) };
        if (filter.typeName) params['typeName'] = filter.typeName;
        if (filter.assigned !== undefined) params['assigned'] = String(filter.assigned);
        if (filter.viewForScenarioId !== undefined) params['viewForScenarioId'] = filter.viewForScenarioId;

        const body = await this.request('GET', '/hooks', { params });
        const hooks = pickList(body, 'hooks', webhookRecordSchema);
        log.info(`Retrieved ${hooks.length} hook(s)`);
        return hooks;
    }

    async createWebhook(request: CreateWebhookRequest): Promise<WebhookRecord> {
        const body = await this.request('POST', '/hooks', {
            data: { ...request, teamId: this.config.teamId },
        });
        const hook = pickField(body, 'hook', webhookRecordSchema);
        log.info(`Created webhook: ${request.name} (ID: ${hook.id}, URL: ${hook.url ?? 'n/a'})`);
        return hook;
    }

    async getHookDetails(hookId: number): Promise<WebhookRecord> {
        const body = await this.request('GET', `/hooks/${hookId}`);
        const hook = pickField(body, 'hook', webhookRecordSchema);
        log.debug(`Retrieved hook details for ID ${hookId}`);
        return hook;
    }

    async updateHook(hookId: number, name: string): Promise<WebhookRecord> {
        const body = await this.request('PATCH', `/hooks/${hookId}`, { data: { name } });
        const hook = pickField(body, 'hook', webhookRecordSchema);
        log.info(`Renamed hook ${hookId} to "${name}"`);
        return hook;
    }

    async deleteHook(hookId: number, confirmed = false): Promise<unknown> {
        const body = await this.request('DELETE', `/hooks/${hookId}`, confirmed ? { params: { confirmed: 'true' } } : {});
        log.info(`Deleted hook ${hookId}`);
        return body;
    }

    // ── Account ──

    async getCurrentUser(): Promise<UserRecord> {
        const body = await this.request('GET', '/users/me');
        return pickField(body, 'authUser', userRecordSchema);
    }

    async listOrganizations(): Promise<OrganizationRecord[]> {
        const body = await this.request('GET', '/organizations');
        return pickList(body, 'organizations', organizationRecordSchema);
    }

    async listTeams(organizationId: number): Promise<TeamRecord[]> {
        const body = await this.request('GET', '/teams', { params: { organizationId } });
        return pickList(body, 'teams', teamRecordSchema);
    }
}

const jsonValueSchema: z.ZodType<JsonValue, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

/** Unwrap Make's `{ "<key>": ... }` response envelope and validate its content. */
function pickField<T>(body: unknown, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const parsed = schema.safeParse(isJsonObject(body) ? body[key] : undefined);
    if (!parsed.success) {
        throw new MakeApiError(`Unexpected Make API response: missing or malformed "${key}"`, undefined, body);
    }
    return parsed.data;
}

function pickList<T>(body: unknown, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    return pickField(body, key, z.array(schema).default([]));
}

function toApiError(error: unknown): MakeApiError {
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const data: unknown = error.response?.data;
        let message = `API request failed: ${error.message}`;
        if (data !== undefined && data !== '') {
            message += ` - ${typeof data === 'string' ? data : JSON.stringify(data)}`;
        }
        log.error(message, { status, url: error.config?.url });
        return new MakeApiError(message, status, data, { cause: error });
    }
    const detail = error instanceof Error ? error.message : String(error);
    log.error(`API request failed: ${detail}`);
    return new MakeApiError(`API request failed: ${detail}`, undefined, undefined, { cause: error });
}
