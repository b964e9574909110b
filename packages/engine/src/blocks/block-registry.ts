import type { IBlockDefinition, IBlockRegistry } from '@tessera/types';
import type { BlockNode } from '../template/nodes.js';

export type BlockDefinition = IBlockDefinition<BlockNode>;

/**
 * Override-aware registry of every block across one template inheritance chain.
 *
 * Definitions live in an arena and each name maps to a chain of arena
 * indexes, most specific first. A definition knows its own position in that
 * chain, so `block.super` is an index step rather than a reference held by
 * the definition.
 *
 * @example
 * ```typescript
 * const registry = new BlockRegistry();
 * registry.addLayer(child.localBlocks());   // most specific first
 * registry.addLayer(parent.localBlocks());
 *
 * const title = registry.getBlock('title');   // child's definition
 * if (title) {
 *     registry.getSuper(title);                 // parent's definition
 * }
 * ```
 */
export class BlockRegistry implements IBlockRegistry<BlockNode> {
    private readonly definitions: BlockDefinition[] = [];
    private readonly chains = new Map<string, number[]>();

    public get size(): number {
        return this.chains.size;
    }

    public addLayer(blocks: Iterable<readonly [string, BlockNode]>): void {
        // Last entry per name wins inside one layer
        const layer = new Map<string, BlockNode>(blocks);

        for (const [name, body] of layer) {
            const chain = this.chains.get(name) ?? [];

            if (chain.some(id => this.definitions[id].body === body)) {
                continue;
            }

            const definition: BlockDefinition = Object.freeze({
                id: this.definitions.length,
                name,
                body,
                depth: chain.length
            });

            this.definitions.push(definition);
            chain.push(definition.id);
            this.chains.set(name, chain);
        }
    }

    public getBlock(name: string): BlockDefinition | undefined {
        const chain = this.chains.get(name);
        return chain ? this.definitions[chain[0]] : undefined;
    }

    public getSuper(definition: BlockDefinition): BlockDefinition | undefined {
        const chain = this.chains.get(definition.name);
        if (!chain || chain[definition.depth] !== definition.id) {
            return undefined;
        }
        const next = chain[definition.depth + 1];
        return next === undefined ? undefined : this.definitions[next];
    }

    public has(name: string): boolean {
        return this.chains.has(name);
    }

    public names(): string[] {
        return Array.from(this.chains.keys());
    }

    /**
     * Every definition of `name`, most specific first.
     */
    public chain(name: string): BlockDefinition[] {
        return (this.chains.get(name) ?? []).map(id => this.definitions[id]);
    }
}
