import type { IWidgetLibraryTable } from '@tessera/types';
import type { BlockRegistry } from '../../blocks/block-registry.js';
import type { Context } from '../../template/context.js';

/**
 * Alias to block registry table for one render pass.
 */
export class WidgetLibraryTable implements IWidgetLibraryTable<BlockRegistry> {
    private readonly libraries = new Map<string, BlockRegistry>();

    public get size(): number {
        return this.libraries.size;
    }

    public has(alias: string): boolean {
        return this.libraries.has(alias);
    }

    public get(alias: string): BlockRegistry | undefined {
        return this.libraries.get(alias);
    }

    public set(alias: string, registry: BlockRegistry): void {
        this.libraries.set(alias, registry);
    }

    public aliases(): string[] {
        return Array.from(this.libraries.keys());
    }
}

/**
 * The render pass's library table, created on first use.
 *
 * A new table is stored in the base frame of the render state so it
 * outlives whatever scope the first `load_widgets` ran in.
 */
export function getOrCreateLibraryTable(context: Context): WidgetLibraryTable {
    const existing = context.renderState.get('widgets');
    if (existing) {
        return existing;
    }
    const table = new WidgetLibraryTable();
    context.renderState.setBase('widgets', table);
    return table;
}
