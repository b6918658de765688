import type { Command } from 'commander';
import { describeConfig } from '../../utils/config.js';
import { logger } from '../../utils/logger.js';
import type { CliContext } from '../context.js';

/** Helps find the team and organization ids to put in `.env`. */
export function registerTeamInfoCommand(program: Command, context: CliContext): void {
    program
        .command('team-info')
        .description('Show the current user, organizations and teams for the configured API key')
        .action(async () => {
            const { api, config } = context.resolveServices({ requireScope: false });
            console.log(`Using ${describeConfig(config)}\n`);

            const user = await api.getCurrentUser();
            console.log(`User: ${user.name ?? 'Unknown'} (${user.email ?? 'no email'}), ID ${user.id}\n`);

            const organizations = await api.listOrganizations();
            if (organizations.length === 0) {
                console.log('No organizations found');
                return;
            }

            for (const org of organizations) {
                console.log(`Organization: ${org.name ?? 'Unknown'} (ID: ${org.id})`);
                try {
                    const teams = await api.listTeams(org.id);
                    for (const team of teams) {
                        console.log(`  - Team: ${team.name ?? 'Unknown'} (ID: ${team.id})`);
                    }
                } catch (error) {
                    logger.warn(`Could not list teams for organization ${org.id}`, {
                        error: error instanceof Error ? error.message : String(error),
                    });
                }
            }

            const first = organizations[0];
            if (first) {
                console.log('\n.env example:');
                console.log('MAKE_API_KEY=your_api_key_here');
                console.log(`MAKE_ORGANIZATION_ID=${first.id}`);
                console.log(`MAKE_API_URL=${config.baseUrl}`);
            }
        });
}
