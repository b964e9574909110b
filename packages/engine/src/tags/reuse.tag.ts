import { TemplateSyntaxError } from '../lib/errors.js';
import type { WidgetService } from '../services/widget/widget.service.js';
import type { Context } from '../template/context.js';
import type { Expression } from '../template/expression.js';
import { Node } from '../template/nodes.js';
import type { TagCompiler } from '../template/tag-library.js';
import { parseSimpleTagArguments, resolveKwargs, type Kwargs } from './arguments.js';

/**
 * `reuse name_or_names key=val...`
 */
export class ReuseNode extends Node {
    constructor(
        private readonly service: WidgetService,
        public readonly names: Expression,
        public readonly kwargs: Kwargs
    ) {
        super();
    }

    public render(context: Context): string {
        const names = this.names.resolve(context);
        let candidates: string[];

        if (typeof names === 'string') {
            candidates = [names];
        } else if (Array.isArray(names)) {
            candidates = names.map(name => String(name));
        } else {
            throw new TemplateSyntaxError(`reuse expects a block name or a list of names, got ${this.names.source}`, {
                source: this.names.source
            });
        }

        return this.service.reuse(context, candidates, resolveKwargs(this.kwargs, context));
    }
}

export function compileReuseTag(service: WidgetService): TagCompiler {
    return request => {
        const { positional, kwargs } = parseSimpleTagArguments(request, 1);
        const [names] = positional;
        if (names === undefined) {
            throw new TemplateSyntaxError(`${request.tagName} requires one positional argument`, { tag: request.tagName });
        }
        return new ReuseNode(service, names, kwargs);
    };
}
