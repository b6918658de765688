import { InvalidArgumentError } from 'commander';

const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

export const success = (text: string) => `${GREEN}✓ ${text}${RESET}`;
export const warning = (text: string) => `${YELLOW}⚠ ${text}${RESET}`;
export const failure = (text: string) => `${RED}✗ ${text}${RESET}`;

export function parseId(value: string): number {
    const id = Number(value);
    if (!Number.isInteger(id) || id <= 0) {
        throw new InvalidArgumentError('Expected a positive integer id.');
    }
    return id;
}

/** Collects repeated `--map 111=222` options into one mapping. */
export function collectMapping(value: string, previous: Map<number, number>): Map<number, number> {
    const match = /^(\d+)=(\d+)$/.exec(value.trim());
    if (!match?.[1] || !match[2]) {
        throw new InvalidArgumentError('Expected <oldHookId>=<newHookId>, e.g. 111=222.');
    }
    const next = new Map(previous);
    next.set(Number(match[1]), Number(match[2]));
    return next;
}

export function parseJsonObject(value: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(value);
    } catch {
        throw new InvalidArgumentError('Expected a JSON object.');
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new InvalidArgumentError('Expected a JSON object.');
    }
    return Object.fromEntries(Object.entries(parsed));
}
