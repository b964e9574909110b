import { TemplateSyntaxError, VariableLookupError } from '../lib/errors.js';
import type { Context } from './context.js';

/**
 * A compiled template expression: literal or variable path, plus filters.
 */
export interface Expression {
    readonly source: string;
    resolve(context: Context): unknown;
}

export type FilterFunction = (value: unknown, arg?: unknown) => unknown;

const VARIABLE_PATTERN = /^[A-Za-z_]\w*(?:\.\w+)*$/;
const NUMBER_PATTERN = /^-?\d+(?:\.\d+)?$/;
const QUOTED_PATTERN = /^(["'])((?:\\.|(?!\1)[^\\])*)\1$/;

export class LiteralExpression implements Expression {
    constructor(public readonly source: string, public readonly value: unknown) {}

    public resolve(): unknown {
        return this.value;
    }
}

export class VariableExpression implements Expression {
    public readonly segments: readonly string[];

    constructor(public readonly source: string) {
        this.segments = source.split('.');
    }

    public resolve(context: Context): unknown {
        const [head, ...rest] = this.segments;
        let value: unknown = context.get(head);
        for (const segment of rest) {
            value = lookup(value, segment);
        }
        if (value === undefined && context.engine.strictVariables) {
            throw new VariableLookupError(`Variable "${this.source}" could not be resolved`, {
                variable: this.source
            });
        }
        return value;
    }
}

interface AppliedFilter {
    readonly name: string;
    readonly fn: FilterFunction;
    readonly arg?: Expression;
}

export class FilterExpression implements Expression {
    constructor(
        public readonly source: string,
        private readonly base: Expression,
        private readonly filters: readonly AppliedFilter[]
    ) {}

    public resolve(context: Context): unknown {
        return this.filters.reduce<unknown>(
            (value, filter) => filter.arg === undefined
                ? filter.fn(value)
                : filter.fn(value, filter.arg.resolve(context)),
            this.base.resolve(context)
        );
    }
}

function lookup(value: unknown, segment: string): unknown {
    if (value === null || value === undefined) {
        return undefined;
    }
    if (value instanceof Map) {
        return value.get(segment);
    }
    if (Array.isArray(value) && /^\d+$/.test(segment)) {
        return value[Number(segment)];
    }
    if (typeof value === 'object' || typeof value === 'function') {
        return Reflect.get(value, segment);
    }
    return undefined;
}

/**
 * Split `text` on `separator`, ignoring separators inside quoted strings.
 */
export function splitOutsideQuotes(text: string, separator: string, limit = Infinity): string[] {
    const parts: string[] = [];
    let current = '';
    let quote: string | null = null;

    for (let i = 0; i < text.length; i += 1) {
        const char = text[i];
        if (quote) {
            current += char;
            if (char === '\\' && i + 1 < text.length) {
                current += text[i + 1];
                i += 1;
            } else if (char === quote) {
                quote = null;
            }
        } else if (char === '"' || char === "'") {
            quote = char;
            current += char;
        } else if (char === separator && parts.length + 1 < limit) {
            parts.push(current);
            current = '';
        } else {
            current += char;
        }
    }

    parts.push(current);
    return parts;
}

function compileBase(source: string): Expression {
    const quoted = QUOTED_PATTERN.exec(source);
    if (quoted) {
        return new LiteralExpression(source, quoted[2].replace(/\\(.)/g, '$1'));
    }
    if (NUMBER_PATTERN.test(source)) {
        return new LiteralExpression(source, Number(source));
    }
    switch (source) {
        case 'true':
        case 'True':
            return new LiteralExpression(source, true);
        case 'false':
        case 'False':
            return new LiteralExpression(source, false);
        case 'null':
        case 'None':
            return new LiteralExpression(source, null);
    }
    if (VARIABLE_PATTERN.test(source)) {
        return new VariableExpression(source);
    }
    throw new TemplateSyntaxError(`Could not parse expression: ${source}`, { source });
}

/**
 * Compile an expression such as `"p:button"`, `user.name` or `attrs|flatattrs`.
 *
 * @param filters - Filters available to `|name` and `|name:arg` suffixes
 * @throws TemplateSyntaxError for unparsable input or unknown filters
 */
export function compileExpression(source: string, filters: ReadonlyMap<string, FilterFunction>): Expression {
    const [baseSource, ...filterSources] = splitOutsideQuotes(source.trim(), '|');
    const base = compileBase(baseSource.trim());

    if (filterSources.length === 0) {
        return base;
    }

    const applied = filterSources.map((filterSource): AppliedFilter => {
        const [name, argSource] = splitOutsideQuotes(filterSource.trim(), ':', 2);
        const fn = filters.get(name);
        if (!fn) {
            throw new TemplateSyntaxError(`Invalid filter: "${name}"`, { source, filter: name });
        }
        return argSource === undefined
            ? { name, fn }
            : { name, fn, arg: compileBase(argSource.trim()) };
    });

    return new FilterExpression(source, base, applied);
}
