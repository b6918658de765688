#!/usr/bin/env node
/**
 * Make.com blueprint MCP server (stdio).
 *
 * Features:
 *   - Hook discovery and rewriting for exported blueprints
 *   - Scenario deployment with freshly provisioned webhooks
 *   - Persisted hook mappings so re-deploys reuse webhooks
 *   - Structured logging to stderr only (stdio-safe)
 *   - Graceful shutdown
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import dotenv from 'dotenv';
import { MakeApiClient } from '../api/client.js';
import { HookMappingStore } from '../database/mapping-store.js';
import { ScenarioService } from '../scenarios/service.js';
import { loadConfigFromEnv } from '../utils/config.js';
import { errorMessage, logger } from '../utils/logger.js';
import { resolvePackageVersion } from '../utils/package-info.js';
import { createMcpServer, type MakeServices } from './tools.js';

dotenv.config({ quiet: true });

const VERSION = resolvePackageVersion();

// DATABASE_PATH env var overrides default; otherwise mapping-store.ts resolves
// to <packageRoot>/data/hook-mappings.db automatically.
const store = new HookMappingStore(process.env['DATABASE_PATH']);

let services: MakeServices | undefined;

function resolveServices(): MakeServices {
    if (!services) {
        const config = loadConfigFromEnv();
        const api = new MakeApiClient(config);
        services = { api, scenarios: new ScenarioService(api, config, store) };
    }
    return services;
}

const server = createMcpServer({ version: VERSION, resolveServices });

// ══════════════════════════════════════════════════════════════
// MAIN
// ══════════════════════════════════════════════════════════════

async function main() {
    const transport = new StdioServerTransport();

    const shutdown = async () => {
        logger.info('Shutting down Make blueprint MCP server...');
        try {
            store.close();
            await server.close();
        } catch (error) {
            logger.warn('Error during shutdown', { error: errorMessage(error) });
        }
        process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
    process.on('uncaughtException', (err) => {
        logger.error('Uncaught exception', { error: err.message, stack: err.stack });
        void shutdown();
    });
    process.on('unhandledRejection', (reason) => {
        logger.error('Unhandled rejection', { error: errorMessage(reason) });
    });

    await server.connect(transport);
    logger.info(`Make blueprint MCP server v${VERSION} running on stdio`);
}

main().catch((err: unknown) => {
    logger.error('Fatal: Failed to start server', { error: errorMessage(err) });
    process.exit(1);
});
