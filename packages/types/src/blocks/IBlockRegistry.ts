import type { IBlockDefinition } from './IBlockDefinition.js';

/**
 * Override-aware mapping from block name to block definition.
 *
 * Built by adding one layer per template in an inheritance chain, most
 * specific template first. A layer only introduces a definition as the most
 * specific one when its name is not present yet; otherwise the definition is
 * appended to the end of that name's override chain, where `block.super`
 * lookups can still reach it.
 *
 * @typeParam TBody - Renderable body produced by the host engine
 */
export interface IBlockRegistry<TBody> {
    /**
     * Number of distinct block names.
     */
    readonly size: number;

    /**
     * Add one template's blocks as the next, less specific, layer.
     *
     * Within a layer the last entry for a name wins. Adding a body that is
     * already part of a name's chain is a no-op, so resolving the same
     * template chain twice into one registry leaves it unchanged.
     *
     * @param blocks - Name and body pairs declared by one template
     */
    addLayer(blocks: Iterable<readonly [string, TBody]>): void;

    /**
     * Most specific definition for `name`, if any layer declared it.
     */
    getBlock(name: string): IBlockDefinition<TBody> | undefined;

    /**
     * The definition that `definition` overrides, if any.
     */
    getSuper(definition: IBlockDefinition<TBody>): IBlockDefinition<TBody> | undefined;

    has(name: string): boolean;

    /**
     * Block names in the order they were first introduced.
     */
    names(): string[];
}
