import type { Command } from 'commander';
import type { CliContext } from '../context.js';
import { parseId, parseJsonObject, success } from '../format.js';

export function registerScenariosCommand(program: Command, context: CliContext): void {
    const scenarios = program.command('scenarios').description('List and control scenarios');

    scenarios
        .command('list')
        .description('List scenarios for the configured team or organization')
        .option('--active', 'only active scenarios')
        .action(async (options: { active?: boolean }) => {
            const { api } = context.resolveServices();
            const list = await api.listScenarios({ activeOnly: options.active ?? false });
            if (list.length === 0) {
                console.log('No scenarios found');
                return;
            }
            console.log(`Found ${list.length} scenario(s):`);
            list.forEach((scenario, i) => {
                const status = scenario.isActive ? 'active' : 'inactive';
                console.log(`  ${i + 1}. ${scenario.name ?? 'Untitled'} (ID: ${scenario.id}) - ${status}`);
            });
        });

    scenarios
        .command('activate')
        .argument('<scenarioId>', 'scenario id', parseId)
        .action(async (scenarioId: number) => {
            await context.resolveServices().scenarios.activateScenario(scenarioId);
            console.log(success(`Activated scenario ${scenarioId}`));
        });

    scenarios
        .command('deactivate')
        .argument('<scenarioId>', 'scenario id', parseId)
        .action(async (scenarioId: number) => {
            await context.resolveServices().scenarios.deactivateScenario(scenarioId);
            console.log(success(`Deactivated scenario ${scenarioId}`));
        });

    scenarios
        .command('run')
        .argument('<scenarioId>', 'scenario id', parseId)
        .option('--data <json>', 'input data as a JSON object', parseJsonObject)
        .action(async (scenarioId: number, options: { data?: Record<string, unknown> }) => {
            const execution = await context.resolveServices().scenarios.runScenario(scenarioId, options.data);
            console.log(success(`Started scenario ${scenarioId}`));
            console.log(JSON.stringify(execution, null, 2));
        });

    scenarios
        .command('delete')
        .argument('<scenarioId>', 'scenario id', parseId)
        .action(async (scenarioId: number) => {
            await context.resolveServices().scenarios.deleteScenario(scenarioId);
            console.log(success(`Deleted scenario ${scenarioId}`));
        });
}
