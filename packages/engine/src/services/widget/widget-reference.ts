import type { IWidgetReference } from '@tessera/types';
import { TemplateSyntaxError } from '../../lib/errors.js';

/**
 * Split an `alias:blockname` reference at its first colon.
 *
 * @throws TemplateSyntaxError when the reference has no colon
 *
 * @example
 * parseWidgetReference('form:CharField');  // { alias: 'form', blockName: 'CharField' }
 * parseWidgetReference(':sibling');        // { alias: '', blockName: 'sibling' }
 */
export function parseWidgetReference(reference: string): IWidgetReference {
    const separator = reference.indexOf(':');
    if (separator === -1) {
        throw new TemplateSyntaxError(`widget name must be "alias:block_name" - ${reference}`, { reference });
    }
    return {
        alias: reference.slice(0, separator),
        blockName: reference.slice(separator + 1)
    };
}
