import type { Command } from 'commander';
import { mappingToRecord } from '../../blueprint/hooks.js';
import type { CliContext } from '../context.js';
import { success } from '../format.js';

export function registerMappingsCommand(program: Command, context: CliContext): void {
    const mappings = program.command('mappings').description('Hook mappings saved by `create --store`');

    mappings
        .command('list')
        .action(() => {
            const store = context.openStore();
            try {
                const sources = store.listSources();
                if (sources.length === 0) {
                    console.log('No saved hook mappings');
                    return;
                }
                for (const source of sources) {
                    console.log(`  ${source.sourceKey}  ${source.entries} hook(s)  updated ${source.updatedAt}`);
                }
            } finally {
                store.close();
            }
        });

    mappings
        .command('show')
        .argument('<key>', 'mapping key')
        .action((key: string) => {
            const store = context.openStore();
            try {
                console.log(JSON.stringify(mappingToRecord(store.getMapping(key)), null, 2));
            } finally {
                store.close();
            }
        });

    mappings
        .command('delete')
        .argument('<key>', 'mapping key')
        .action((key: string) => {
            const store = context.openStore();
            try {
                const removed = store.deleteSource(key);
                console.log(success(`Removed ${removed} hook mapping(s) for "${key}"`));
            } finally {
                store.close();
            }
        });
}
