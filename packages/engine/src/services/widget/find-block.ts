import type { BlockDefinition, BlockRegistry } from '../../blocks/block-registry.js';
import { BlockLookupError } from '../../lib/errors.js';

/**
 * First candidate that exists in `registry`, trying names in the given order.
 */
export function findFirstBlock(registry: BlockRegistry | undefined, names: readonly string[]): BlockDefinition | undefined {
    for (const name of names) {
        const definition = registry?.getBlock(name);
        if (definition) {
            return definition;
        }
    }
    return undefined;
}

/**
 * Like `findFirstBlock`, but a miss is an error.
 *
 * @throws BlockLookupError listing every candidate when none exists
 */
export function findBlock(registry: BlockRegistry | undefined, ...names: string[]): BlockDefinition {
    const definition = findFirstBlock(registry, names);
    if (!definition) {
        throw new BlockLookupError(`No widget found for: ${JSON.stringify(names)}`, { names });
    }
    return definition;
}
