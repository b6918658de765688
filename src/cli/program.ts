import { Command } from 'commander';
import { registerCloneCommand, registerCreateCommand, registerFindHooksCommand } from './commands/blueprint.js';
import { registerHooksCommand } from './commands/hooks.js';
import { registerMappingsCommand } from './commands/mappings.js';
import { registerScenariosCommand } from './commands/scenarios.js';
import { registerTeamInfoCommand } from './commands/team-info.js';
import type { CliContext } from './context.js';

export function buildProgram(context: CliContext, version = '0.0.0'): Command {
    const program = new Command();

    program
        .name('make-blueprint')
        .description('Deploy Make.com blueprints with fresh webhooks and manage scenarios')
        .version(version);

    registerFindHooksCommand(program);
    registerCreateCommand(program, context);
    registerCloneCommand(program, context);
    registerScenariosCommand(program, context);
    registerHooksCommand(program, context);
    registerMappingsCommand(program, context);
    registerTeamInfoCommand(program, context);

    return program;
}
