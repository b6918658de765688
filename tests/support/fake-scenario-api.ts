/**
 * Hand-rolled Make API double for service, MCP and CLI tests. Webhook ids
 * are handed out from `hookIds` in order; creating one more than that fails
 * the way Make does when a quota is hit.
 */
import { vi } from 'vitest';
import type { CreateScenarioPayload, ListHooksFilter, OrganizationRecord, ScenarioRecord, TeamRecord, UpdateScenarioPatch, UserRecord } from '../../src/api/types.js';
import type { CreateWebhookRequest, WebhookRecord } from '../../src/blueprint/hooks.js';
import type { JsonValue } from '../../src/blueprint/json.js';
import type { CliApi } from '../../src/cli/context.js';
import { MakeApiError } from '../../src/utils/errors.js';

export interface FakeApiOptions {
    hookIds?: number[];
    /** Webhook ids whose detail lookup answers 404. */
    failDetailsFor?: number[];
    blueprint?: JsonValue;
    scenarios?: ScenarioRecord[];
    hooks?: WebhookRecord[];
}

export const SCENARIO_ID = 123;

export function hookUrl(id: number): string {
    return `https://hook.example.test/${id}`;
}

export function createFakeScenarioApi(options: FakeApiOptions = {}) {
    const hookIds = [...(options.hookIds ?? [])];
    const failDetailsFor = options.failDetailsFor ?? [];

    return {
        createWebhook: vi.fn(async (request: CreateWebhookRequest): Promise<WebhookRecord> => {
            const id = hookIds.shift();
            if (id === undefined) {
                throw new MakeApiError('API request failed: Request failed with status code 429', 429, { message: 'Quota exceeded' });
            }
            return { id, name: request.name, url: hookUrl(id) };
        }),
        getHookDetails: vi.fn(async (hookId: number): Promise<WebhookRecord> => {
            if (failDetailsFor.includes(hookId)) {
                throw new MakeApiError('API request failed: Request failed with status code 404', 404);
            }
            return { id: hookId, name: `Webhook ${hookId}`, url: hookUrl(hookId) };
        }),
        createScenario: vi.fn(async (payload: CreateScenarioPayload): Promise<ScenarioRecord> => ({
            id: SCENARIO_ID,
            name: payload.name,
        })),
        updateScenario: vi.fn(async (scenarioId: number, patch: UpdateScenarioPatch): Promise<ScenarioRecord> => ({
            id: scenarioId,
            ...(patch.isActive !== undefined ? { isActive: patch.isActive } : {}),
        })),
        getScenarioBlueprint: vi.fn(async (scenarioId: number): Promise<JsonValue> => options.blueprint ?? { name: `Scenario ${scenarioId}` }),
        runScenario: vi.fn(async (scenarioId: number, data?: Record<string, unknown>): Promise<unknown> => ({
            executionId: `exec-${scenarioId}`,
            ...(data ? { received: data } : {}),
        })),
        deleteScenario: vi.fn(async (scenarioId: number): Promise<unknown> => ({ scenario: scenarioId })),
        listScenarios: vi.fn(async (listOptions: { activeOnly?: boolean } = {}): Promise<ScenarioRecord[]> => {
            const scenarios = options.scenarios ?? [];
            return listOptions.activeOnly ? scenarios.filter((s) => s.isActive === true) : scenarios;
        }),
        listHooks: vi.fn(async (filter: ListHooksFilter = {}): Promise<WebhookRecord[]> => {
            const hooks = options.hooks ?? [];
            return filter.typeName ? hooks.filter((h) => h['typeName'] === filter.typeName) : hooks;
        }),
        updateHook: vi.fn(async (hookId: number, name: string): Promise<WebhookRecord> => ({ id: hookId, name, url: hookUrl(hookId) })),
        deleteHook: vi.fn(async (hookId: number, confirmed = false): Promise<unknown> => ({ hook: hookId, confirmed })),
        getCurrentUser: vi.fn(async (): Promise<UserRecord> => ({ id: 1, name: 'Test User', email: 'user@example.test' })),
        listOrganizations: vi.fn(async (): Promise<OrganizationRecord[]> => [{ id: 9, name: 'Test Org' }]),
        listTeams: vi.fn(async (organizationId: number): Promise<TeamRecord[]> => [{ id: 42, name: 'Ops', organizationId }]),
    } satisfies CliApi;
}

export type FakeScenarioApi = ReturnType<typeof createFakeScenarioApi>;
