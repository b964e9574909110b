import type { IBoundField } from '@tessera/types';
import { TemplateSyntaxError } from '../lib/errors.js';
import type { WidgetService } from '../services/widget/widget.service.js';
import type { Context } from '../template/context.js';
import type { Expression } from '../template/expression.js';
import { Node } from '../template/nodes.js';
import type { TagCompiler } from '../template/tag-library.js';
import { parseSimpleTagArguments, resolveKwargs, validateLiteralReference, type Kwargs } from './arguments.js';

function isBoundField(value: unknown): value is IBoundField {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const field: unknown = Reflect.get(value, 'field');
    const widget: unknown = typeof field === 'object' && field !== null ? Reflect.get(field, 'widget') : undefined;
    return typeof Reflect.get(value, 'name') === 'string'
        && typeof Reflect.get(value, 'value') === 'function'
        && typeof field === 'object' && field !== null
        && typeof Reflect.get(field, 'kind') === 'string'
        && typeof widget === 'object' && widget !== null
        && typeof Reflect.get(widget, 'kind') === 'string';
}

/**
 * `form_field field [widget] key=val...`
 */
export class FormFieldNode extends Node {
    constructor(
        private readonly service: WidgetService,
        public readonly field: Expression,
        public readonly widget: Expression | undefined,
        public readonly kwargs: Kwargs
    ) {
        super();
    }

    public render(context: Context): string {
        const field = this.field.resolve(context);
        if (!isBoundField(field)) {
            throw new TemplateSyntaxError(`form_field expects a bound form field, got ${this.field.source}`, {
                source: this.field.source
            });
        }

        const resolved = this.widget?.resolve(context);
        let widget: string | undefined;
        if (typeof resolved === 'string') {
            widget = resolved;
        } else if (resolved !== undefined && resolved !== null) {
            throw new TemplateSyntaxError(`widget name must be "alias:block_name" - ${String(resolved)}`, {
                source: this.widget?.source
            });
        }

        return this.service.renderFormField(context, field, {
            widget,
            overrides: resolveKwargs(this.kwargs, context)
        });
    }
}

export function compileFormFieldTag(service: WidgetService): TagCompiler {
    return request => {
        const { positional, kwargs } = parseSimpleTagArguments(request, 2);
        const [field, positionalWidget] = positional;

        if (field === undefined) {
            throw new TemplateSyntaxError(`${request.tagName} requires a field argument`, { tag: request.tagName });
        }

        const keywordWidget = kwargs.get('widget');
        if (positionalWidget && keywordWidget) {
            throw new TemplateSyntaxError(`${request.tagName} received multiple values for argument "widget"`, {
                tag: request.tagName
            });
        }
        kwargs.delete('widget');

        const widget = positionalWidget ?? keywordWidget;
        if (widget) {
            validateLiteralReference(widget);
        }

        return new FormFieldNode(service, field, widget, kwargs);
    };
}
