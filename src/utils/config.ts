import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_BASE_URL = 'https://us2.make.com/api/v2';
export const DEFAULT_TIMEOUT_MS = 30_000;

const PLACEHOLDER_API_KEY = 'your_api_key_here';

const optionalId = z.coerce.number().int().positive().optional();

const baseConfigSchema = z
    .object({
        apiKey: z
            .string({ required_error: 'MAKE_API_KEY is required' })
            .trim()
            .min(1, 'MAKE_API_KEY cannot be empty')
            .refine((key) => key !== PLACEHOLDER_API_KEY, 'MAKE_API_KEY still holds the placeholder value'),
        baseUrl: z
            .string()
            .regex(/^https?:\/\//, 'MAKE_API_URL must start with http:// or https://')
            .transform((url) => url.replace(/\/+$/, ''))
            .default(DEFAULT_BASE_URL),
        teamId: optionalId,
        organizationId: optionalId,
        timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    });

function configSchema(requireScope: boolean) {
    return baseConfigSchema.superRefine((config, ctx) => {
        if (requireScope && config.teamId === undefined && config.organizationId === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'Either MAKE_TEAM_ID or MAKE_ORGANIZATION_ID must be provided',
            });
        }
        if (config.teamId !== undefined && config.organizationId !== undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'Cannot specify both MAKE_TEAM_ID and MAKE_ORGANIZATION_ID',
            });
        }
    });
}

export type MakeConfig = z.output<typeof baseConfigSchema>;

export interface ParseConfigOptions {
    /**
     * Demand a team or organization id (default). Account lookups such as
     * `team-info` run before the user knows either.
     */
    requireScope?: boolean;
}

/** Raw values before coercion; ids and timeout may arrive as strings. */
export type MakeConfigInput = { [K in keyof MakeConfig]?: unknown };

function blankToUndefined(value: string | undefined): string | undefined {
    return value === undefined || value.trim() === '' ? undefined : value;
}

export function parseConfig(input: MakeConfigInput, options: ParseConfigOptions = {}): MakeConfig {
    const result = configSchema(options.requireScope ?? true).safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => issue.message);
        throw new ConfigError(`Invalid Make configuration: ${issues.join('; ')}`);
    }
    return result.data;
}

/**
 * Build a config from MAKE_* variables. Blank variables count as unset so a
 * copied `.env.example` with empty ids does not fail on number coercion.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env, options: ParseConfigOptions = {}): MakeConfig {
    return parseConfig({
        apiKey: blankToUndefined(env['MAKE_API_KEY']),
        baseUrl: blankToUndefined(env['MAKE_API_URL']),
        teamId: blankToUndefined(env['MAKE_TEAM_ID']),
        organizationId: blankToUndefined(env['MAKE_ORGANIZATION_ID']),
        timeoutMs: blankToUndefined(env['MAKE_API_TIMEOUT_MS']),
    }, options);
}

/** Scope parameter sent with list and create calls. */
export function defaultParams(config: MakeConfig): Record<string, string> {
    if (config.organizationId !== undefined) {
        return { organizationId: String(config.organizationId) };
    }
    if (config.teamId !== undefined) {
        return { teamId: String(config.teamId) };
    }
    return {};
}

export function describeConfig(config: MakeConfig): string {
    const tokenPreview = config.apiKey.length > 8 ? `${config.apiKey.slice(0, 8)}...` : '***';
    const scope = config.organizationId !== undefined
        ? `organizationId=${config.organizationId}`
        : config.teamId !== undefined ? `teamId=${config.teamId}` : 'no team';
    return `MakeConfig(${scope}, baseUrl=${config.baseUrl}, token=${tokenPreview})`;
}
