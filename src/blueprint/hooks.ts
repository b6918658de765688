/**
 * Hardcoded hook references in blueprints.
 *
 * A blueprint exported from one Make team embeds the numeric ids of that
 * team's webhooks. Before the blueprint can run elsewhere each id has to be
 * swapped for a webhook that exists in the target team. Two shapes count as
 * a reference:
 *
 *   { "hook": 836593 }
 *   { "parameters": { "hook": 836593 } }
 *
 * Anything else under a `hook` key (placeholders such as "{{hook}}", null,
 * floats) is left alone.
 */

import { cloneJson, isInteger, isJsonObject, ownValue, type JsonValue } from './json.js';
import { HookProvisioningError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('hooks');

export const GATEWAY_WEBHOOK_TYPE = 'gateway-webhook';
export const DEFAULT_WEBHOOK_NAME_PREFIX = 'Auto-created Webhook';

export type HookMapping = Map<number, number>;

export interface WebhookRecord {
    id: number;
    name?: string;
    url?: string;
    [key: string]: unknown;
}

export interface CreateWebhookRequest {
    name: string;
    typeName: string;
    method: boolean;
    headers: boolean;
    stringify: boolean;
}

/** The slice of the Make API client that hook rewriting depends on. */
export interface HookProvisioner {
    createWebhook(request: CreateWebhookRequest): Promise<WebhookRecord>;
    getHookDetails(hookId: number): Promise<WebhookRecord>;
}

export interface RewriteHooksOptions {
    seedMapping?: ReadonlyMap<number, number>;
    createMissing?: boolean;
    namePrefix?: string;
}

export interface RewriteHooksResult<T extends JsonValue = JsonValue> {
    blueprint: T;
    /** Entries that apply to this blueprint: seeded ones plus newly created. */
    mapping: HookMapping;
    /** Found ids left as they were because nothing mapped them. */
    unmapped: number[];
}

function visitHooks(node: JsonValue, found: Set<number>): void {
    if (Array.isArray(node)) {
        for (const item of node) {
            visitHooks(item, found);
        }
        return;
    }
    if (!isJsonObject(node)) {
        return;
    }

    const hook = ownValue(node, 'hook');
    if (isInteger(hook)) {
        found.add(hook);
    }
    const parameters = ownValue(node, 'parameters');
    if (isJsonObject(parameters)) {
        const parameterHook = ownValue(parameters, 'hook');
        if (isInteger(parameterHook)) {
            found.add(parameterHook);
        }
    }

    for (const child of Object.values(node)) {
        visitHooks(child, found);
    }
}

/**
 * Collect every hardcoded hook id in a blueprint, at any depth. The set
 * iterates in the order the ids were first met while walking the document.
 */
export function findHooks(node: JsonValue): Set<number> {
    const found = new Set<number>();
    visitHooks(node, found);
    return found;
}

/**
 * Substitute mapped ids in place. Each `hook` key is rewritten once, when
 * the walk reaches the object that owns it, so `parameters.hook` is handled
 * on entering `parameters` and chained mappings never cascade.
 */
function replaceHooks(node: JsonValue, mapping: ReadonlyMap<number, number>): void {
    if (Array.isArray(node)) {
        for (const item of node) {
            replaceHooks(item, mapping);
        }
        return;
    }
    if (!isJsonObject(node)) {
        return;
    }

    const hook = ownValue(node, 'hook');
    if (isInteger(hook)) {
        const replacement = mapping.get(hook);
        if (replacement !== undefined) {
            node['hook'] = replacement;
            log.debug('Replaced hook id', { from: hook, to: replacement });
        }
    }

    for (const child of Object.values(node)) {
        replaceHooks(child, mapping);
    }
}

/** Apply a mapping to a copy of the document; no API calls. */
export function applyHookMapping<T extends JsonValue>(node: T, mapping: ReadonlyMap<number, number>): T {
    const copy = cloneJson(node);
    replaceHooks(copy, mapping);
    return copy;
}

/**
 * Replace hardcoded hook ids in a copy of `blueprint`, creating a fresh
 * gateway webhook for every id the seed mapping does not cover.
 *
 * Webhooks are created one at a time in traversal order. The first failure
 * aborts with a {@link HookProvisioningError}; webhooks created before it
 * stay in Make and are reported on the error. The input is never modified.
 */
export async function rewriteHooks<T extends JsonValue>(
    blueprint: T,
    provisioner: HookProvisioner,
    options: RewriteHooksOptions = {},
): Promise<RewriteHooksResult<T>> {
    const { seedMapping = new Map<number, number>(), createMissing = true, namePrefix = DEFAULT_WEBHOOK_NAME_PREFIX } = options;

    const updated = cloneJson(blueprint);
    const hardcoded = findHooks(updated);
    log.info(`Found ${hardcoded.size} hardcoded hook reference(s)`);

    const mapping: HookMapping = new Map();
    const provisioned: HookMapping = new Map();
    const unmapped: number[] = [];

    for (const oldHookId of hardcoded) {
        const seeded = seedMapping.get(oldHookId);
        if (seeded !== undefined) {
            mapping.set(oldHookId, seeded);
            continue;
        }

        if (!createMissing) {
            log.warn(`No mapping for hardcoded hook ${oldHookId} and webhook creation is disabled`, { hookId: oldHookId });
            unmapped.push(oldHookId);
            continue;
        }

        let created: WebhookRecord;
        try {
            created = await provisioner.createWebhook({
                name: `${namePrefix} ${oldHookId}`,
                typeName: GATEWAY_WEBHOOK_TYPE,
                method: false,
                headers: false,
                stringify: false,
            });
        } catch (error) {
            const failure = new HookProvisioningError(oldHookId, new Map(provisioned), error);
            log.error('Webhook creation failed; earlier webhooks from this call were kept', {
                hookId: oldHookId,
                provisioned: Object.fromEntries(provisioned),
                error: failure.message,
            });
            throw failure;
        }

        mapping.set(oldHookId, created.id);
        provisioned.set(oldHookId, created.id);
        log.info(`Created webhook ${created.id} to replace hardcoded hook ${oldHookId}`);
    }

    replaceHooks(updated, mapping);
    log.info(`Replaced ${mapping.size} hook id(s) in blueprint`);

    return { blueprint: updated, mapping, unmapped };
}

export function mappingToRecord(mapping: ReadonlyMap<number, number>): Record<string, number> {
    return Object.fromEntries(Array.from(mapping.entries(), ([from, to]) => [String(from), to]));
}

/** Parse a `{ "old": new }` object, as found in JSON input, into a mapping. */
export function mappingFromRecord(record: Readonly<Record<string, number>>): HookMapping {
    const mapping: HookMapping = new Map();
    for (const [from, to] of Object.entries(record)) {
        if (!/^\d+$/.test(from) || !Number.isInteger(to)) {
            log.warn(`Skipping hook mapping entry "${from}" → ${String(to)}: expected a decimal hook id mapped to an integer`);
            continue;
        }
        mapping.set(Number(from), to);
    }
    return mapping;
}
