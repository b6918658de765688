import { BlueprintError } from '../utils/errors.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
    [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/** A blueprint is a JSON object; its shape beyond that is opaque here. */
export type Blueprint = JsonObject;

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a key only when the object itself holds it, never through its prototype. */
export function ownValue(node: JsonObject, key: string): JsonValue | undefined {
    return Object.hasOwn(node, key) ? node[key] : undefined;
}

export function isInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value);
}

/** Fresh tree, built bottom-up, with the same key order as the source. */
export function cloneJson<T extends JsonValue>(value: T): T;
export function cloneJson(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
        return value.map((item) => cloneJson(item));
    }
    if (isJsonObject(value)) {
        const copy: JsonObject = {};
        for (const [key, child] of Object.entries(value)) {
            // Plain assignment of "__proto__" would set the prototype, not a key
            Object.defineProperty(copy, key, { value: cloneJson(child), enumerable: true, writable: true, configurable: true });
        }
        return copy;
    }
    return value;
}

/**
 * Accept a blueprint object or its JSON text. Text that does not parse, or
 * parses to something other than an object, is rejected.
 */
export function parseBlueprint(input: Blueprint | string): Blueprint {
    if (typeof input !== 'string') {
        return input;
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(input);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new BlueprintError(`Invalid JSON blueprint: ${detail}`, { cause: error });
    }
    if (!isJsonObject(parsed)) {
        throw new BlueprintError('Invalid blueprint: expected a JSON object at the top level');
    }
    return parsed;
}

/** Compact serialisation, as the Make API expects in `blueprint` fields. */
export function formatBlueprintForApi(blueprint: Blueprint): string {
    return JSON.stringify(blueprint);
}
