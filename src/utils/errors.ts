/**
 * Error hierarchy for blueprint and Make API operations.
 *
 *   BlueprintError
 *   ├── MakeApiError
 *   │   └── HookProvisioningError
 *   └── ConfigError
 */

export class BlueprintError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'BlueprintError';
    }
}

/** A Make API call failed: non-2xx response, timeout or network error. */
export class MakeApiError extends BlueprintError {
    readonly statusCode: number | undefined;
    readonly responseData: unknown;

    constructor(message: string, statusCode?: number, responseData?: unknown, options?: ErrorOptions) {
        super(message, options);
        this.name = 'MakeApiError';
        this.statusCode = statusCode;
        this.responseData = responseData;
    }
}

/**
 * Webhook creation failed while rewriting a blueprint. Webhooks created
 * earlier in the same call are listed in `provisioned` and are not rolled back.
 */
export class HookProvisioningError extends MakeApiError {
    readonly hookId: number;
    readonly provisioned: ReadonlyMap<number, number>;

    constructor(hookId: number, provisioned: ReadonlyMap<number, number>, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        const statusCode = cause instanceof MakeApiError ? cause.statusCode : undefined;
        const responseData = cause instanceof MakeApiError ? cause.responseData : undefined;
        super(`Failed to create webhook replacing hook ${hookId}: ${detail}`, statusCode, responseData, { cause });
        this.name = 'HookProvisioningError';
        this.hookId = hookId;
        this.provisioned = provisioned;
    }
}

export class ConfigError extends BlueprintError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
