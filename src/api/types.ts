import { z } from 'zod';

// Make returns far more fields than these; passthrough keeps the rest.

export const webhookRecordSchema = z
    .object({
        id: z.number().int(),
        name: z.string().optional(),
        url: z.string().optional(),
        typeName: z.string().optional(),
        enabled: z.boolean().optional(),
    })
    .passthrough();

export const scenarioRecordSchema = z
    .object({
        id: z.number().int(),
        name: z.string().optional(),
        teamId: z.number().int().optional(),
        isActive: z.boolean().optional(),
        isinvalid: z.boolean().optional(),
    })
    .passthrough();

export const userRecordSchema = z
    .object({
        id: z.number().int(),
        name: z.string().optional(),
        email: z.string().optional(),
    })
    .passthrough();

export const organizationRecordSchema = z
    .object({
        id: z.number().int(),
        name: z.string().optional(),
    })
    .passthrough();

export const teamRecordSchema = z
    .object({
        id: z.number().int(),
        name: z.string().optional(),
        organizationId: z.number().int().optional(),
    })
    .passthrough();

export type ScenarioRecord = z.infer<typeof scenarioRecordSchema>;
export type UserRecord = z.infer<typeof userRecordSchema>;
export type OrganizationRecord = z.infer<typeof organizationRecordSchema>;
export type TeamRecord = z.infer<typeof teamRecordSchema>;

export interface CreateScenarioPayload {
    name: string;
    /** Compact JSON text. */
    blueprint: string;
    /** JSON-encoded scheduling object. */
    scheduling: string;
    teamId?: number;
    organizationId?: number;
    folderId?: number;
}

export interface UpdateScenarioPatch {
    blueprint?: string;
    scheduling?: string;
    isActive?: boolean;
    name?: string;
}

export interface ListHooksFilter {
    typeName?: string;
    assigned?: boolean;
    viewForScenarioId?: number;
}
