/**
 * HTML output helpers shared by the node renderer and the filters.
 */

const HTML_ESCAPES: Readonly<Record<string, string>> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#x27;'
};

/**
 * A string that is already valid HTML and must not be escaped again.
 *
 * Rendered blocks, nested widget content and `block.super` are safe strings,
 * which is what lets a wrapper widget output `{{ content }}` verbatim.
 */
export class SafeString {
    constructor(public readonly value: string) {}

    toString(): string {
        return this.value;
    }
}

export function markSafe(value: string | SafeString): SafeString {
    return value instanceof SafeString ? value : new SafeString(value);
}

export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * Convert a resolved value to output text.
 *
 * `null` and `undefined` render empty. Safe strings pass through; everything
 * else is stringified and, with `autoescape`, escaped.
 */
export function toOutput(value: unknown, autoescape: boolean): string {
    if (value === null || value === undefined) {
        return '';
    }
    if (value instanceof SafeString) {
        return value.value;
    }
    const text = String(value);
    return autoescape ? escapeHtml(text) : text;
}

/**
 * Serialize a mapping into HTML attributes.
 *
 * Every attribute is prefixed with a space so the result can follow a tag
 * name directly. `true` renders a bare attribute, `false`, `null` and
 * `undefined` drop it, anything else renders as an escaped quoted value.
 *
 * @example
 * flatattrs({ id: 'name', required: true, disabled: false })
 * // ' id="name" required'
 */
export function flatattrs(attrs: unknown): SafeString {
    if (attrs === null || attrs === undefined) {
        return new SafeString('');
    }

    const entries = attrs instanceof Map
        ? Array.from(attrs.entries())
        : typeof attrs === 'object'
            ? Object.entries(attrs)
            : [];

    const parts: string[] = [];
    for (const [key, value] of entries) {
        if (value === true) {
            parts.push(` ${String(key)}`);
        } else if (value === false || value === null || value === undefined) {
            continue;
        } else {
            parts.push(` ${String(key)}="${toOutput(value, true)}"`);
        }
    }

    return new SafeString(parts.join(''));
}
