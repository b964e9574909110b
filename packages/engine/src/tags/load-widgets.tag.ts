import { TemplateSyntaxError } from '../lib/errors.js';
import type { WidgetService } from '../services/widget/widget.service.js';
import type { Context } from '../template/context.js';
import { isTruthy, Node } from '../template/nodes.js';
import type { TagCompiler } from '../template/tag-library.js';
import { isTemplateSource, type Template } from '../template/template.js';
import { parseSimpleTagArguments, type Kwargs } from './arguments.js';

const SOFT_KWARG = '_soft';

/**
 * `load_widgets alias="template" ... [_soft=true]`
 *
 * Template names are loaded by the widget service, so a soft load never
 * fetches the template of an alias it skips.
 */
export class LoadWidgetsNode extends Node {
    constructor(private readonly service: WidgetService, public readonly kwargs: Kwargs) {
        super();
    }

    public render(context: Context): string {
        const libraries: Record<string, string | Template> = {};
        let soft = false;

        for (const [alias, expression] of this.kwargs) {
            if (alias === SOFT_KWARG) {
                soft = isTruthy(expression.resolve(context));
            } else {
                const value = expression.resolve(context);
                if (!isTemplateSource(value)) {
                    throw new TemplateSyntaxError(`Expected a template or template name, got ${expression.source}`, {
                        alias,
                        source: expression.source
                    });
                }
                libraries[alias] = value;
            }
        }

        this.service.loadWidgets(context, libraries, { soft });
        return '';
    }
}

export function compileLoadWidgetsTag(service: WidgetService): TagCompiler {
    return request => {
        const { kwargs } = parseSimpleTagArguments(request, 0);
        return new LoadWidgetsNode(service, kwargs);
    };
}
