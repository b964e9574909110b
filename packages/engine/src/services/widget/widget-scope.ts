import type { BlockRegistry } from '../../blocks/block-registry.js';
import { ConfigurationError } from '../../lib/errors.js';
import type { Context } from '../../template/context.js';

/**
 * The registry widget and block lookups currently resolve against.
 */
export function activeRegistry(context: Context): BlockRegistry | undefined {
    return context.renderState.get('blocks');
}

/**
 * Run `fn` with the library loaded under `alias` as the active registry.
 *
 * An empty alias leaves whatever is active in place. Otherwise a render-state
 * frame holding the library and the whole table is pushed for the duration
 * of `fn` and popped however `fn` exits, so a widget rendered from inside
 * another widget hands control back to the outer widget's library.
 *
 * @throws ConfigurationError when no library was loaded, or none under `alias`
 */
export function withLibrary<R>(context: Context, alias: string, fn: () => R): R {
    if (alias === '') {
        return fn();
    }

    const widgets = context.renderState.get('widgets');
    if (!widgets) {
        throw new ConfigurationError('No widget libraries loaded', { alias });
    }

    const registry = widgets.get(alias);
    if (!registry) {
        throw new ConfigurationError(`No widget library loaded for alias: "${alias}"`, {
            alias,
            loaded: widgets.aliases()
        });
    }

    return context.renderState.scoped({ blocks: registry, widgets }, fn);
}
