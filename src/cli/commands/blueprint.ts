import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Command } from 'commander';
import { DEFAULT_WEBHOOK_NAME_PREFIX, findHooks } from '../../blueprint/hooks.js';
import { parseBlueprint, type Blueprint } from '../../blueprint/json.js';
import type { ScenarioWithWebhooks } from '../../scenarios/service.js';
import { HookProvisioningError } from '../../utils/errors.js';
import type { CliContext } from '../context.js';
import { collectMapping, failure, parseId, success, warning } from '../format.js';

function readBlueprint(file: string): Blueprint {
    return parseBlueprint(readFileSync(resolve(file), 'utf8'));
}

function printWebhooks(scenario: ScenarioWithWebhooks): void {
    if (scenario.webhooks.length === 0) {
        console.log('  No hardcoded hooks were replaced.');
        return;
    }
    console.log(`  Webhooks (${scenario.webhooks.length}):`);
    for (const hook of scenario.webhooks) {
        console.log(`  - ${hook.name} (ID: ${hook.id}, replaces ${hook.replacedHookId})`);
        console.log(`    ${hook.url}`);
    }
    const missing = Object.keys(scenario.hookMapping).length - scenario.webhooks.length;
    if (missing > 0) {
        console.log(warning(`Details for ${missing} webhook(s) could not be fetched; see the log for ids.`));
    }
}

export function registerFindHooksCommand(program: Command): void {
    program
        .command('find-hooks')
        .description('List the hardcoded webhook ids referenced by a blueprint file')
        .argument('<file>', 'blueprint JSON file')
        .action((file: string) => {
            const hookIds = Array.from(findHooks(readBlueprint(file)));
            console.log(`Found ${hookIds.length} hardcoded hook reference(s)`);
            for (const id of hookIds) {
                console.log(`  ${id}`);
            }
        });
}

interface CreateOptions {
    name?: string;
    folder?: number;
    prefix: string;
    store?: string;
    freshHooks: boolean;
}

export function registerCreateCommand(program: Command, context: CliContext): void {
    program
        .command('create')
        .description('Create a scenario from a blueprint file, replacing hardcoded hooks with new webhooks')
        .argument('<file>', 'blueprint JSON file')
        .option('--name <name>', 'scenario name (defaults to the blueprint name)')
        .option('--folder <id>', 'folder to create the scenario in', parseId)
        .option('--prefix <prefix>', 'name prefix for new webhooks', DEFAULT_WEBHOOK_NAME_PREFIX)
        .option('--store <key>', 'reuse and save the hook mapping under this key')
        .option('--no-fresh-hooks', 'deploy the blueprint as is, without touching hooks')
        .action(async (file: string, options: CreateOptions) => {
            const blueprint = readBlueprint(file);
            const store = options.store ? context.openStore() : undefined;
            try {
                const { scenarios } = context.resolveServices(store ? { store } : {});
                const createOptions = {
                    ...(options.name ? { name: options.name } : {}),
                    ...(options.folder ? { folderId: options.folder } : {}),
                };

                if (!options.freshHooks) {
                    const scenario = await scenarios.createScenario(blueprint, createOptions);
                    console.log(success(`Created scenario "${scenario.name ?? ''}" (ID: ${scenario.id})`));
                    return;
                }

                const scenario = await scenarios.createScenarioWithFreshHooks(blueprint, {
                    ...createOptions,
                    namePrefix: options.prefix,
                    ...(options.store ? { mappingKey: options.store } : {}),
                });
                console.log(success(`Created scenario "${scenario.name ?? ''}" (ID: ${scenario.id})`));
                printWebhooks(scenario);
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                console.error(failure(`Failed to create scenario: ${message}`));
                if (error instanceof HookProvisioningError && error.provisioned.size > 0) {
                    const kept = Array.from(error.provisioned, ([from, to]) => `${from} → ${to}`).join(', ');
                    console.error(warning(`Webhooks already created and not rolled back: ${kept}`));
                }
                console.error(`You can import ${resolve(file)} manually in the Make.com scenario editor.`);
                process.exitCode = 1;
            } finally {
                store?.close();
            }
        });
}

interface CloneOptions {
    map: Map<number, number>;
}

export function registerCloneCommand(program: Command, context: CliContext): void {
    program
        .command('clone')
        .description('Copy an existing scenario, optionally remapping hook ids')
        .argument('<scenarioId>', 'source scenario id', parseId)
        .argument('<name>', 'name for the copy')
        .option('--map <old=new>', 'hook id mapping, repeatable', collectMapping, new Map<number, number>())
        .action(async (scenarioId: number, name: string, options: CloneOptions) => {
            const { scenarios } = context.resolveServices();
            const cloned = await scenarios.cloneScenario(scenarioId, name, { webhookMapping: options.map });
            console.log(success(`Cloned scenario ${scenarioId} to "${cloned.name ?? name}" (ID: ${cloned.id})`));
        });
}
