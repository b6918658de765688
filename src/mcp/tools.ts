/**
 * MCP tool registrations for the blueprint toolkit.
 *
 * Tools return pretty-printed JSON text; failures set `isError` and carry a
 * message tuned to the Make status code. `find_hooks` and an offline
 * `rewrite_hooks` work without credentials, everything else resolves the
 * API services on first use.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { MakeApiClient } from '../api/client.js';
import {
    DEFAULT_WEBHOOK_NAME_PREFIX,
    findHooks,
    mappingFromRecord,
    mappingToRecord,
    rewriteHooks,
    type HookProvisioner,
} from '../blueprint/hooks.js';
import { parseBlueprint } from '../blueprint/json.js';
import type { ScenarioApi, ScenarioService } from '../scenarios/service.js';
import { BlueprintError, ConfigError, HookProvisioningError, MakeApiError } from '../utils/errors.js';
import { createLogger, errorMessage } from '../utils/logger.js';

const log = createLogger('mcp');

export const SERVER_NAME = 'make-blueprint-kit';

export type ToolApi = ScenarioApi & Pick<MakeApiClient, 'listScenarios' | 'listHooks' | 'deleteHook'>;

export interface MakeServices {
    api: ToolApi;
    scenarios: ScenarioService;
}

export interface ToolContext {
    version: string;
    /** Throws ConfigError when credentials are missing. */
    resolveServices(): MakeServices;
}

// ══════════════════════════════════════════════════════════════
// HELPER: safe tool response
// ══════════════════════════════════════════════════════════════

function ok(data: unknown) {
    return {
        content: [{ type: 'text' as const, text: JSON.stringify(data, null, 2) }],
    };
}

function fail(message: string) {
    return {
        content: [{ type: 'text' as const, text: message }],
        isError: true as const,
    };
}

function describeFailure(action: string, error: unknown): string {
    if (error instanceof HookProvisioningError && error.cause instanceof ConfigError && error.provisioned.size === 0) {
        return describeFailure(action, error.cause);
    }
    if (error instanceof ConfigError) {
        return `${error.message}. Set MAKE_API_KEY and MAKE_TEAM_ID (or MAKE_ORGANIZATION_ID) in the .env file.`;
    }
    if (error instanceof HookProvisioningError) {
        const kept = Object.entries(mappingToRecord(error.provisioned))
            .map(([from, to]) => `${from} → ${to}`)
            .join(', ');
        return `${action} failed: ${error.message}` + (kept ? `\nWebhooks already created (not rolled back): ${kept}` : '');
    }
    if (error instanceof MakeApiError) {
        if (error.statusCode === 401) return 'Authentication failed. Check your MAKE_API_KEY.';
        if (error.statusCode === 403) return 'Access denied. Check your API key permissions and team ID.';
        const status = error.statusCode ?? 'unknown';
        return `${action} failed (HTTP ${status}): ${error.message}`;
    }
    if (error instanceof BlueprintError) {
        return `${action} failed: ${error.message}`;
    }
    return `${action} failed: ${errorMessage(error)}`;
}

/** Stands in for the API when webhook creation is switched off. */
const NO_PROVISIONER: HookProvisioner = {
    createWebhook: () => Promise.reject(new BlueprintError('Webhook creation is disabled')),
    getHookDetails: () => Promise.reject(new BlueprintError('Webhook lookups are disabled')),
};

/** Resolves the API only when a webhook is actually needed, so fully seeded rewrites work offline. */
function lazyProvisioner(context: ToolContext): HookProvisioner {
    return {
        createWebhook: (request) => context.resolveServices().api.createWebhook(request),
        getHookDetails: (hookId) => context.resolveServices().api.getHookDetails(hookId),
    };
}

const blueprintInput = z.string().min(2).max(500_000).describe('Scenario blueprint JSON (stringified)');
const hookMappingInput = z
    .record(z.number().int())
    .optional()
    .describe('Existing old→new hook id mapping, e.g. {"836593": 9001}');

export function createMcpServer(context: ToolContext): McpServer {
    const server = new McpServer({
        name: SERVER_NAME,
        version: context.version,
    });

    // ══════════════════════════════════════════════════════════════
    // TOOL: find_hooks
    // ══════════════════════════════════════════════════════════════

    server.registerTool('find_hooks', {
        title: 'Find Hardcoded Hooks',
        description: 'List the hardcoded webhook ids a blueprint references. Works offline.',
        inputSchema: { blueprint: blueprintInput },
    }, async ({ blueprint }) => {
        try {
            const hookIds = Array.from(findHooks(parseBlueprint(blueprint)));
            log.debug('find_hooks', { count: hookIds.length });
            return ok({ count: hookIds.length, hookIds });
        } catch (error) {
            return fail(describeFailure('Hook search', error));
        }
    });

    // ══════════════════════════════════════════════════════════════
    // TOOL: rewrite_hooks
    // ══════════════════════════════════════════════════════════════

    server.registerTool('rewrite_hooks', {
        title: 'Rewrite Hardcoded Hooks',
        description:
            'Replace hardcoded webhook ids in a blueprint. Ids missing from hookMapping get a newly created ' +
            'webhook when createMissing is true (requires MAKE_API_KEY); otherwise they are left unchanged.',
        inputSchema: {
            blueprint: blueprintInput,
            hookMapping: hookMappingInput,
            createMissing: z.boolean().optional().describe('Create webhooks for unmapped ids (default true)'),
            namePrefix: z.string().min(1).max(200).optional().describe(`Name prefix for new webhooks (default "${DEFAULT_WEBHOOK_NAME_PREFIX}")`),
        },
        annotations: {
            destructiveHint: false,
            idempotentHint: false,
        },
    }, async ({ blueprint, hookMapping, createMissing = true, namePrefix }) => {
        try {
            const document = parseBlueprint(blueprint);
            const provisioner = createMissing ? lazyProvisioner(context) : NO_PROVISIONER;
            const result = await rewriteHooks(document, provisioner, {
                seedMapping: mappingFromRecord(hookMapping ?? {}),
                createMissing,
                ...(namePrefix ? { namePrefix } : {}),
            });
            return ok({
                blueprint: result.blueprint,
                hookMapping: mappingToRecord(result.mapping),
                unmapped: result.unmapped,
                warnings: result.unmapped.map((id) => `Hook ${id} has no mapping and was left unchanged.`),
            });
        } catch (error) {
            log.error('rewrite_hooks failed', { error: errorMessage(error) });
            return fail(describeFailure('Hook rewrite', error));
        }
    });

    // ══════════════════════════════════════════════════════════════
    // TOOL: create_scenario
    // ══════════════════════════════════════════════════════════════

    server.registerTool('create_scenario', {
        title: 'Deploy Scenario to Make.com',
        description:
            'Create a scenario from a blueprint. With freshHooks (default) every hardcoded webhook id is ' +
            'replaced by a newly created webhook and the new webhook URLs are returned.',
        inputSchema: {
            blueprint: blueprintInput,
            name: z.string().min(1).max(500).optional().describe('Scenario name (defaults to the blueprint name)'),
            folderId: z.number().int().positive().optional().describe('Make folder ID to create the scenario in'),
            freshHooks: z.boolean().optional().describe('Create new webhooks for hardcoded hook ids (default true)'),
            namePrefix: z.string().min(1).max(200).optional().describe('Name prefix for new webhooks'),
            mappingKey: z.string().min(1).max(200).optional().describe('Reuse webhooks stored under this key from earlier runs'),
        },
        annotations: {
            destructiveHint: true,
            idempotentHint: false,
        },
    }, async ({ blueprint, name, folderId, freshHooks = true, namePrefix, mappingKey }) => {
        try {
            const document = parseBlueprint(blueprint);
            const { scenarios } = context.resolveServices();
            const options = { ...(name ? { name } : {}), ...(folderId ? { folderId } : {}) };

            if (!freshHooks) {
                const scenario = await scenarios.createScenario(document, options);
                return ok({ success: true, scenario });
            }

            const scenario = await scenarios.createScenarioWithFreshHooks(document, {
                ...options,
                ...(namePrefix ? { namePrefix } : {}),
                ...(mappingKey ? { mappingKey } : {}),
            });
            return ok({
                success: true,
                scenario,
                message: `Scenario "${scenario.name ?? name ?? 'Untitled Scenario'}" created with ${scenario.webhooks.length} webhook(s).`,
            });
        } catch (error) {
            log.error('create_scenario failed', { error: errorMessage(error) });
            return fail(describeFailure('Scenario creation', error));
        }
    });

    // ══════════════════════════════════════════════════════════════
    // TOOL: clone_scenario
    // ══════════════════════════════════════════════════════════════

    server.registerTool('clone_scenario', {
        title: 'Clone Scenario',
        description: 'Copy an existing scenario under a new name, optionally remapping hook ids.',
        inputSchema: {
            scenarioId: z.number().int().positive().describe('Source scenario ID'),
            name: z.string().min(1).max(500).describe('Name for the copy'),
            hookMapping: hookMappingInput,
        },
        annotations: {
            destructiveHint: true,
            idempotentHint: false,
        },
    }, async ({ scenarioId, name, hookMapping }) => {
        try {
            const { scenarios } = context.resolveServices();
            const scenario = await scenarios.cloneScenario(scenarioId, name, {
                webhookMapping: mappingFromRecord(hookMapping ?? {}),
            });
            return ok({ success: true, scenario });
        } catch (error) {
            return fail(describeFailure('Scenario clone', error));
        }
    });

    // ══════════════════════════════════════════════════════════════
    // TOOL: list_scenarios
    // ══════════════════════════════════════════════════════════════

    server.registerTool('list_scenarios', {
        title: 'List Scenarios',
        description: 'List scenarios for the configured team or organization.',
        inputSchema: {
            activeOnly: z.boolean().optional().describe('Only return active scenarios'),
        },
    }, async ({ activeOnly }) => {
        try {
            const scenarios = await context.resolveServices().api.listScenarios({ activeOnly: activeOnly ?? false });
            return ok({
                count: scenarios.length,
                scenarios: scenarios.map((s) => ({ id: s.id, name: s.name, isActive: s.isActive ?? false })),
            });
        } catch (error) {
            return fail(describeFailure('Scenario listing', error));
        }
    });

    // ══════════════════════════════════════════════════════════════
    // TOOL: set_scenario_active
    // ══════════════════════════════════════════════════════════════

    server.registerTool('set_scenario_active', {
        title: 'Activate or Deactivate Scenario',
        description: 'Turn a scenario on or off.',
        inputSchema: {
            scenarioId: z.number().int().positive(),
            active: z.boolean(),
        },
    }, async ({ scenarioId, active }) => {
        try {
            const { scenarios } = context.resolveServices();
            const scenario = active
                ? await scenarios.activateScenario(scenarioId)
                : await scenarios.deactivateScenario(scenarioId);
            return ok({ success: true, scenario });
        } catch (error) {
            return fail(describeFailure(active ? 'Activation' : 'Deactivation', error));
        }
    });

    // ══════════════════════════════════════════════════════════════
    // TOOL: run_scenario
    // ══════════════════════════════════════════════════════════════

    server.registerTool('run_scenario', {
        title: 'Run Scenario',
        description: 'Start a scenario run, optionally with input data.',
        inputSchema: {
            scenarioId: z.number().int().positive(),
            data: z.record(z.unknown()).optional().describe('Scenario input data'),
        },
        annotations: {
            destructiveHint: true,
            idempotentHint: false,
        },
    }, async ({ scenarioId, data }) => {
        try {
            const execution = await context.resolveServices().scenarios.runScenario(scenarioId, data);
            return ok({ success: true, execution });
        } catch (error) {
            return fail(describeFailure('Scenario run', error));
        }
    });

    // ══════════════════════════════════════════════════════════════
    // TOOL: list_hooks
    // ══════════════════════════════════════════════════════════════

    server.registerTool('list_hooks', {
        title: 'List Webhooks',
        description: 'List hooks for the team, optionally filtered by type or assignment.',
        inputSchema: {
            typeName: z.string().max(100).optional().describe('Hook type, e.g. "gateway-webhook"'),
            assigned: z.boolean().optional().describe('Only hooks assigned (true) or unassigned (false) to a scenario'),
        },
    }, async ({ typeName, assigned }) => {
        try {
            const hooks = await context.resolveServices().api.listHooks({
                ...(typeName ? { typeName } : {}),
                ...(assigned !== undefined ? { assigned } : {}),
            });
            return ok({
                count: hooks.length,
                hooks: hooks.map((h) => ({ id: h.id, name: h.name, url: h.url })),
            });
        } catch (error) {
            return fail(describeFailure('Hook listing', error));
        }
    });

    // ══════════════════════════════════════════════════════════════
    // TOOL: delete_hook
    // ══════════════════════════════════════════════════════════════

    server.registerTool('delete_hook', {
        title: 'Delete Webhook',
        description: 'Delete a hook. Set confirmed to delete one that is still assigned to a scenario.',
        inputSchema: {
            hookId: z.number().int().positive(),
            confirmed: z.boolean().optional(),
        },
        annotations: {
            destructiveHint: true,
            idempotentHint: true,
        },
    }, async ({ hookId, confirmed }) => {
        try {
            await context.resolveServices().api.deleteHook(hookId, confirmed ?? false);
            return ok({ success: true, deletedHookId: hookId });
        } catch (error) {
            return fail(describeFailure('Hook deletion', error));
        }
    });

    return server;
}
