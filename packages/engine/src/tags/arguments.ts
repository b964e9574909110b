import { TemplateSyntaxError } from '../lib/errors.js';
import { parseWidgetReference } from '../services/widget/widget-reference.js';
import type { Context } from '../template/context.js';
import { LiteralExpression, type Expression } from '../template/expression.js';
import { isKwarg, popAsVar, tokenKwargs, type TagCompileRequest } from '../template/tag-library.js';

export type Kwargs = ReadonlyMap<string, Expression>;

export interface WidgetTagArguments {
    readonly reference: Expression;
    readonly kwargs: Kwargs;
    readonly asVar?: string;
}

export function resolveKwargs(kwargs: Kwargs, context: Context): Record<string, unknown> {
    const resolved: Record<string, unknown> = {};
    for (const [key, expression] of kwargs) {
        resolved[key] = expression.resolve(context);
    }
    return resolved;
}

/**
 * Check a literal widget reference while compiling, so a malformed
 * `"alias:block"` fails before any render.
 */
export function validateLiteralReference(expression: Expression): void {
    if (expression instanceof LiteralExpression && typeof expression.value === 'string') {
        parseWidgetReference(expression.value);
    }
}

/**
 * Resolved widget reference text.
 *
 * @throws TemplateSyntaxError when the expression did not produce a string
 */
export function referenceText(expression: Expression, context: Context): string {
    const value = expression.resolve(context);
    if (typeof value !== 'string') {
        throw new TemplateSyntaxError(`widget name must be "alias:block_name" - ${String(value)}`, {
            source: expression.source
        });
    }
    return value;
}

/**
 * Parse `ref key=val... [as name]` for `widget` and `nested_widget`.
 */
export function parseWidgetTagArguments({ tagName, bits, engine }: TagCompileRequest): WidgetTagArguments {
    const remaining = [...bits];

    const first = remaining.shift();
    if (first === undefined) {
        throw new TemplateSyntaxError(`${tagName} requires one positional argument`, { tag: tagName });
    }

    const reference = engine.compileExpression(first);
    validateLiteralReference(reference);

    const asVar = popAsVar(remaining);
    const kwargs = tokenKwargs(remaining, engine);

    if (remaining.length > 0) {
        throw new TemplateSyntaxError(`${tagName} accepts only one positional argument`, {
            tag: tagName,
            unexpected: remaining
        });
    }

    return { reference, kwargs, asVar };
}

/**
 * Parse simple-tag arguments: leading positionals, then keyword arguments.
 */
export function parseSimpleTagArguments(
    { tagName, bits, engine }: TagCompileRequest,
    maxPositional: number
): { positional: Expression[]; kwargs: Map<string, Expression> } {
    const remaining = [...bits];
    const positional: Expression[] = [];

    while (remaining.length > 0 && !isKwarg(remaining[0])) {
        const bit = remaining.shift();
        if (bit === undefined) {
            break;
        }
        if (positional.length === maxPositional) {
            throw new TemplateSyntaxError(
                `${tagName} received too many positional arguments`,
                { tag: tagName, unexpected: bit }
            );
        }
        positional.push(engine.compileExpression(bit));
    }

    const kwargs = tokenKwargs(remaining, engine);

    if (remaining.length > 0) {
        throw new TemplateSyntaxError(`${tagName} received a positional argument after keyword arguments`, {
            tag: tagName,
            unexpected: remaining
        });
    }

    return { positional, kwargs };
}
