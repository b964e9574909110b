/**
 * Block registry contracts.
 *
 * A block registry aggregates every `block` declared across a template's
 * inheritance chain so both page renders and widget libraries can look up the
 * most specific definition by name.
 */

export type { IBlockDefinition } from './IBlockDefinition.js';
export type { IBlockRegistry } from './IBlockRegistry.js';
