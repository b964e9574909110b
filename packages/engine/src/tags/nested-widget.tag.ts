import type { WidgetService } from '../services/widget/widget.service.js';
import type { Context } from '../template/context.js';
import type { Expression } from '../template/expression.js';
import { Node, NodeList } from '../template/nodes.js';
import type { TagCompiler } from '../template/tag-library.js';
import { parseWidgetTagArguments, referenceText, resolveKwargs, type Kwargs } from './arguments.js';

/**
 * `nested_widget ref key=val... [as name]` ... `endnested`
 *
 * The widget block sees the rendered body as `content`.
 */
export class NestedWidgetNode extends Node {
    constructor(
        private readonly service: WidgetService,
        public readonly reference: Expression,
        public readonly kwargs: Kwargs,
        public readonly nodelist: NodeList,
        public readonly asVar?: string
    ) {
        super();
    }

    public render(context: Context): string {
        return this.service.renderNestedWidget(
            context,
            referenceText(this.reference, context),
            resolveKwargs(this.kwargs, context),
            this.nodelist,
            { storeAs: this.asVar }
        );
    }
}

export function compileNestedWidgetTag(service: WidgetService): TagCompiler {
    return request => {
        const { reference, kwargs, asVar } = parseWidgetTagArguments(request);
        return new NestedWidgetNode(service, reference, kwargs, request.body ?? new NodeList(), asVar);
    };
}
