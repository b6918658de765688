import type { Command } from 'commander';
import type { CliContext } from '../context.js';
import { parseId, success } from '../format.js';

export function registerHooksCommand(program: Command, context: CliContext): void {
    const hooks = program.command('hooks').description('Inspect and delete webhooks');

    hooks
        .command('list')
        .option('--type <typeName>', 'hook type, e.g. gateway-webhook')
        .option('--assigned', 'only hooks assigned to a scenario')
        .option('--unassigned', 'only hooks not assigned to a scenario')
        .action(async (options: { type?: string; assigned?: boolean; unassigned?: boolean }) => {
            const assigned = options.assigned ? true : options.unassigned ? false : undefined;
            const list = await context.resolveServices().api.listHooks({
                ...(options.type ? { typeName: options.type } : {}),
                ...(assigned !== undefined ? { assigned } : {}),
            });
            console.log(`Found ${list.length} hook(s):`);
            for (const hook of list) {
                console.log(`  ${hook.id}  ${hook.name ?? 'Unnamed'}  ${hook.url ?? ''}`.trimEnd());
            }
        });

    hooks
        .command('get')
        .argument('<hookId>', 'hook id', parseId)
        .action(async (hookId: number) => {
            const hook = await context.resolveServices().api.getHookDetails(hookId);
            console.log(JSON.stringify(hook, null, 2));
        });

    hooks
        .command('rename')
        .argument('<hookId>', 'hook id', parseId)
        .argument('<name>', 'new hook name')
        .action(async (hookId: number, name: string) => {
            const hook = await context.resolveServices().api.updateHook(hookId, name);
            console.log(success(`Renamed hook ${hookId} to "${hook.name ?? name}"`));
        });

    hooks
        .command('delete')
        .argument('<hookId>', 'hook id', parseId)
        .option('--confirmed', 'also delete a hook that is assigned to a scenario')
        .action(async (hookId: number, options: { confirmed?: boolean }) => {
            await context.resolveServices().api.deleteHook(hookId, options.confirmed ?? false);
            console.log(success(`Deleted hook ${hookId}`));
        });
}
