/**
 * Make API client tests against an in-process axios adapter
 */
import { describe, it, expect } from 'vitest';
import { MakeApiClient } from '../src/api/client.js';
import { parseConfig } from '../src/utils/config.js';
import { MakeApiError } from '../src/utils/errors.js';
import { createFakeMakeApi, type Route } from './support/fake-make-api.js';

const BASE_URL = 'https://eu1.make.com/api/v2';

function clientFor(routes: Record<string, Route>, scope: { teamId?: number; organizationId?: number } = { teamId: 42 }) {
    const fake = createFakeMakeApi(routes);
    const config = parseConfig({ apiKey: 'test-secret', baseUrl: BASE_URL, ...scope });
    return { client: new MakeApiClient(config, { adapter: fake.adapter }), requests: fake.requests };
}

describe('MakeApiClient', () => {
    it('authenticates with a Token header', async () => {
        const { client, requests } = clientFor({ 'GET /users/me': { body: { authUser: { id: 1, name: 'Tester' } } } });

        const user = await client.getCurrentUser();

        expect(user.name).toBe('Tester');
        expect(requests[0]?.authorization).toBe('Token test-secret');
    });

    it('lists scenarios scoped to the team', async () => {
        const { client, requests } = clientFor({
            'GET /scenarios': { body: { scenarios: [{ id: 7, name: 'One', isActive: true }] } },
        });

        const scenarios = await client.listScenarios({ activeOnly: true });

        expect(scenarios).toEqual([{ id: 7, name: 'One', isActive: true }]);
        expect(requests[0]?.params).toEqual({ teamId: '42', isActive: true });
    });

    it('prefers the organization scope when one is configured', async () => {
        const { client, requests } = clientFor({ 'GET /hooks': { body: { hooks: [] } } }, { organizationId: 9 });

        await client.listHooks({ typeName: 'gateway-webhook', assigned: false });

        expect(requests[0]?.params).toEqual({ organizationId: '9', typeName: 'gateway-webhook', assigned: 'false' });
    });

    it('treats a missing list as empty', async () => {
        const { client } = clientFor({ 'GET /scenarios': { body: {} } });
        expect(await client.listScenarios()).toEqual([]);
    });

    it('creates scenarios with confirmation and returns the envelope content', async () => {
        const { client, requests } = clientFor({
            'POST /scenarios': { body: { scenario: { id: 123, name: 'Deployed', extra: 'kept' } } },
        });

        const scenario = await client.createScenario({
            name: 'Deployed',
            blueprint: '{"name":"Deployed"}',
            scheduling: '{"type":"indefinitely"}',
            teamId: 42,
        });

        expect(scenario).toEqual({ id: 123, name: 'Deployed', extra: 'kept' });
        expect(requests[0]?.params).toEqual({ confirmed: true });
        expect(requests[0]?.data).toEqual({
            name: 'Deployed',
            blueprint: '{"name":"Deployed"}',
            scheduling: '{"type":"indefinitely"}',
            teamId: 42,
        });
    });

    it('creates gateway webhooks in the configured team', async () => {
        const { client, requests } = clientFor({
            'POST /hooks': { body: { hook: { id: 9001, name: 'Auto-created Webhook 1', url: 'https://hook.example/abc' } } },
        });

        const hook = await client.createWebhook({
            name: 'Auto-created Webhook 1',
            typeName: 'gateway-webhook',
            method: false,
            headers: false,
            stringify: false,
        });

        expect(hook.id).toBe(9001);
        expect(hook.url).toBe('https://hook.example/abc');
        expect(requests[0]?.data).toEqual({
            name: 'Auto-created Webhook 1',
            typeName: 'gateway-webhook',
            method: false,
            headers: false,
            stringify: false,
            teamId: 42,
        });
    });

    it('unwraps the blueprint of a scenario', async () => {
        const { client } = clientFor({
            'GET /scenarios/5/blueprint': { body: { response: { name: 'Source', flow: [] } } },
        });
        expect(await client.getScenarioBlueprint(5)).toEqual({ name: 'Source', flow: [] });
    });

    it('wraps run input under data', async () => {
        const { client, requests } = clientFor({ 'POST /scenarios/5/run': { body: { executionId: 'abc' } } });

        const result = await client.runScenario(5, { email: 'a@example.com' });

        expect(result).toEqual({ executionId: 'abc' });
        expect(requests[0]?.data).toEqual({ data: { email: 'a@example.com' } });
    });

    it('renames a hook', async () => {
        const { client, requests } = clientFor({
            'PATCH /hooks/3': { body: { hook: { id: 3, name: 'Lead intake (prod)' } } },
        });

        const hook = await client.updateHook(3, 'Lead intake (prod)');

        expect(hook).toEqual({ id: 3, name: 'Lead intake (prod)' });
        expect(requests[0]?.data).toEqual({ name: 'Lead intake (prod)' });
    });

    it('sends confirmed=true only when deleting a hook with confirmation', async () => {
        const { client, requests } = clientFor({ 'DELETE /hooks/3': { body: { hook: 3 } } });

        await client.deleteHook(3);
        await client.deleteHook(3, true);

        expect(requests[0]?.params).toBeUndefined();
        expect(requests[1]?.params).toEqual({ confirmed: 'true' });
    });

    it('answers unknown routes with a 404 MakeApiError', async () => {
        const { client } = clientFor({});
        const error = await client.getHookDetails(1).catch((reason: unknown) => reason);
        expect(error).toBeInstanceOf(MakeApiError);
        if (!(error instanceof MakeApiError)) return;
        expect(error.statusCode).toBe(404);
    });

    it('turns an error status into MakeApiError with status and body', async () => {
        const { client } = clientFor({
            'POST /hooks': { status: 403, body: { message: 'Permission denied' } },
        });

        const createError = await client
            .createWebhook({ name: 'n', typeName: 'gateway-webhook', method: false, headers: false, stringify: false })
            .catch((reason: unknown) => reason);
        expect(createError).toBeInstanceOf(MakeApiError);
        if (!(createError instanceof MakeApiError)) return;
        expect(createError.statusCode).toBe(403);
        expect(createError.responseData).toEqual({ message: 'Permission denied' });
        expect(createError.message).toBe(
            'API request failed: Request failed with status code 403 - {"message":"Permission denied"}',
        );
    });

    it('rejects a response without the expected envelope', async () => {
        const { client } = clientFor({ 'POST /hooks': { body: { unexpected: true } } });

        await expect(
            client.createWebhook({ name: 'n', typeName: 'gateway-webhook', method: false, headers: false, stringify: false }),
        ).rejects.toThrow('Unexpected Make API response: missing or malformed "hook"');
    });
});
