import type { WidgetService } from '../services/widget/widget.service.js';
import type { Context } from '../template/context.js';
import type { Expression } from '../template/expression.js';
import { Node } from '../template/nodes.js';
import type { TagCompiler } from '../template/tag-library.js';
import { parseWidgetTagArguments, referenceText, resolveKwargs, type Kwargs } from './arguments.js';

/**
 * `widget ref key=val... [as name]`
 */
export class WidgetNode extends Node {
    constructor(
        private readonly service: WidgetService,
        public readonly reference: Expression,
        public readonly kwargs: Kwargs,
        public readonly asVar?: string
    ) {
        super();
    }

    public render(context: Context): string {
        return this.service.renderWidget(
            context,
            referenceText(this.reference, context),
            resolveKwargs(this.kwargs, context),
            { storeAs: this.asVar }
        );
    }
}

export function compileWidgetTag(service: WidgetService): TagCompiler {
    return request => {
        const { reference, kwargs, asVar } = parseWidgetTagArguments(request);
        return new WidgetNode(service, reference, kwargs, asVar);
    };
}
