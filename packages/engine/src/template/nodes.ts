import { renderBlock, standaloneDefinition } from '../blocks/render-block.js';
import { SafeString, toOutput } from '../lib/html.js';
import type { Context } from './context.js';
import type { Expression } from './expression.js';
import type { Template } from './template.js';

/**
 * A compiled piece of a template.
 */
export abstract class Node {
    public abstract render(context: Context): string;
}

export class NodeList {
    constructor(public readonly nodes: readonly Node[] = []) {}

    public get length(): number {
        return this.nodes.length;
    }

    public render(context: Context): string {
        let output = '';
        for (const node of this.nodes) {
            output += node.render(context);
        }
        return output;
    }
}

export class TextNode extends Node {
    constructor(public readonly text: string) {
        super();
    }

    public render(): string {
        return this.text;
    }
}

export class VariableNode extends Node {
    constructor(public readonly expression: Expression) {
        super();
    }

    public render(context: Context): string {
        return toOutput(this.expression.resolve(context), context.engine.autoescape);
    }
}

/**
 * A named, overridable region.
 *
 * Renders the most specific definition of its name in the active registry,
 * which is how child templates and widget libraries replace parent content.
 */
export class BlockNode extends Node {
    constructor(public readonly name: string, public readonly nodelist: NodeList) {
        super();
    }

    public render(context: Context): string {
        const registry = context.renderState.get('blocks');
        const definition = registry?.getBlock(this.name) ?? standaloneDefinition(this);
        return renderBlock(context, definition, registry);
    }
}

/**
 * Marks a template as extending a parent. Renders nothing itself.
 */
export class ExtendsNode extends Node {
    constructor(public readonly parent: Expression) {
        super();
    }

    public getParent(context: Context): Template {
        return context.engine.resolveTemplate(this.parent.resolve(context), this.parent.source);
    }

    public render(): string {
        return '';
    }
}

export function isTruthy(value: unknown): boolean {
    if (Array.isArray(value)) {
        return value.length > 0;
    }
    if (value instanceof Map || value instanceof Set) {
        return value.size > 0;
    }
    if (value instanceof SafeString) {
        return value.value !== '';
    }
    return Boolean(value);
}

export class IfNode extends Node {
    constructor(
        public readonly condition: Expression,
        public readonly then: NodeList,
        public readonly otherwise: NodeList = new NodeList()
    ) {
        super();
    }

    public render(context: Context): string {
        return isTruthy(this.condition.resolve(context))
            ? this.then.render(context)
            : this.otherwise.render(context);
    }
}

function isIterable(value: unknown): value is Iterable<unknown> {
    return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

/**
 * Loop over an iterable, binding `target` and `loop` (`index`, `first`, `last`).
 */
export class ForNode extends Node {
    constructor(
        public readonly target: string,
        public readonly iterable: Expression,
        public readonly body: NodeList,
        public readonly empty: NodeList = new NodeList()
    ) {
        super();
    }

    public render(context: Context): string {
        const value = this.iterable.resolve(context);
        const items = isIterable(value) ? Array.from(value) : [];

        if (items.length === 0) {
            return this.empty.render(context);
        }

        return items
            .map((item, index) => context.update(
                {
                    [this.target]: item,
                    loop: { index: index + 1, first: index === 0, last: index === items.length - 1 }
                },
                () => this.body.render(context)
            ))
            .join('');
    }
}
