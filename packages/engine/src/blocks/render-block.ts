import { markSafe, type SafeString } from '../lib/html.js';
import type { Context } from '../template/context.js';
import type { BlockNode } from '../template/nodes.js';
import type { BlockDefinition, BlockRegistry } from './block-registry.js';

/**
 * The `block` variable visible inside a rendering block.
 */
export class BlockReference {
    constructor(
        private readonly context: Context,
        private readonly definition: BlockDefinition,
        private readonly registry: BlockRegistry | undefined
    ) {}

    public get name(): string {
        return this.definition.name;
    }

    /**
     * The overridden parent definition, rendered in the current scope.
     * Empty when nothing is overridden.
     */
    public get super(): SafeString {
        const parent = this.registry?.getSuper(this.definition);
        return markSafe(parent ? renderBlock(this.context, parent, this.registry) : '');
    }
}

/**
 * Definition for a block node rendered outside any registry that knows it.
 */
export function standaloneDefinition(node: BlockNode): BlockDefinition {
    return { id: -1, name: node.name, body: node, depth: 0 };
}

/**
 * Render a block definition's body with `block` bound to it.
 *
 * @param registry - Registry `block.super` walks; usually the active one
 */
export function renderBlock(context: Context, definition: BlockDefinition, registry: BlockRegistry | undefined): string {
    return context.update(
        { block: new BlockReference(context, definition, registry) },
        () => definition.body.nodelist.render(context)
    );
}
