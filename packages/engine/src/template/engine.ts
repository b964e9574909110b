import type { ILogger, ITemplateLoader } from '@tessera/types';
import { env } from '../config/env.js';
import { TemplateSyntaxError } from '../lib/errors.js';
import { logger as defaultLogger } from '../lib/logger.js';
import { TemplateResolver } from '../services/template-resolver/template-resolver.service.js';
import { WidgetService } from '../services/widget/widget.service.js';
import { createWidgetTagLibrary } from '../tags/index.js';
import { widgetFilters } from '../tags/filters.js';
import { TemplateBuilder } from './builder.js';
import { compileExpression, type Expression, type FilterFunction } from './expression.js';
import { builtinFilters } from './filters.js';
import { NodeList, type Node } from './nodes.js';
import { TagLibrary } from './tag-library.js';
import { isTemplateSource, Template } from './template.js';

export interface TemplateEngineOptions {
    loader: ITemplateLoader<Template>;

    /**
     * Defaults to a child of the module logger bound to `{ component: 'template-engine' }`.
     */
    logger?: ILogger;

    /**
     * HTML-escape variable output that is not a safe string. Defaults to `TESSERA_AUTOESCAPE`.
     */
    autoescape?: boolean;

    /**
     * Throw on unresolvable variables instead of rendering them empty.
     * Defaults to `TESSERA_STRICT_VARIABLES`.
     */
    strictVariables?: boolean;

    /**
     * Library alias `form_field` uses when no widget is named. Defaults to `TESSERA_FORM_ALIAS`.
     */
    formAlias?: string;

    /**
     * Extra filters, merged over the built-in and widget filters.
     */
    filters?: Readonly<Record<string, FilterFunction>>;

    /**
     * Extra tags, merged over the widget tags.
     */
    tags?: TagLibrary;
}

/**
 * Host engine for block templates with the widget layer installed.
 *
 * Owns the template loader, the filter and tag tables, the template resolver
 * and the widget service. Templates compiled by an engine keep a reference to
 * it and read its settings while rendering.
 *
 * @example
 * ```typescript
 * const loader = new InMemoryTemplateLoader();
 * const engine = new TemplateEngine({ loader });
 *
 * loader.register(engine.compile('widgets.html', t => [
 *     t.block('button', [t.text('<button>'), t.variable('label'), t.text('</button>')])
 * ]));
 * loader.register(engine.compile('page.html', t => [
 *     t.tag('load_widgets', 'ui="widgets.html"'),
 *     t.tag('widget', '"ui:button" label="Save"')
 * ]));
 *
 * engine.render('page.html'); // '<button>Save</button>'
 * ```
 */
export class TemplateEngine {
    public readonly loader: ITemplateLoader<Template>;
    public readonly logger: ILogger;
    public readonly autoescape: boolean;
    public readonly strictVariables: boolean;
    public readonly filters: ReadonlyMap<string, FilterFunction>;
    public readonly tags: TagLibrary;
    public readonly resolver: TemplateResolver;
    public readonly widgets: WidgetService;

    constructor(options: TemplateEngineOptions) {
        this.loader = options.loader;
        this.logger = options.logger ?? defaultLogger.child({ component: 'template-engine' });
        this.autoescape = options.autoescape ?? env.TESSERA_AUTOESCAPE;
        this.strictVariables = options.strictVariables ?? env.TESSERA_STRICT_VARIABLES;

        this.filters = new Map(Object.entries({
            ...builtinFilters,
            ...widgetFilters,
            ...options.filters
        }));

        this.resolver = new TemplateResolver(this.logger);
        this.widgets = new WidgetService(this.resolver, this.logger, {
            formAlias: options.formAlias ?? env.TESSERA_FORM_ALIAS
        });

        this.tags = createWidgetTagLibrary(this.widgets);
        if (options.tags) {
            this.tags.merge(options.tags);
        }
    }

    public getTemplate(name: string): Template {
        return this.loader.getTemplate(name);
    }

    /**
     * Turn an `extends` or `load_widgets` argument into a template.
     *
     * @param value - A template name or an already loaded template
     * @param source - Expression text, for error messages
     */
    public resolveTemplate(value: unknown, source = String(value)): Template {
        if (isTemplateSource(value)) {
            return typeof value === 'string' ? this.getTemplate(value) : value;
        }
        throw new TemplateSyntaxError(`Expected a template or template name, got ${source}`, { source });
    }

    public compileExpression(source: string): Expression {
        return compileExpression(source, this.filters);
    }

    /**
     * Build a template from nodes.
     *
     * The template is not registered anywhere; pass it to the loader (or to
     * `load_widgets` directly) to make it reachable by name.
     */
    public compile(name: string, build: (builder: TemplateBuilder) => readonly Node[]): Template {
        return new Template(name, new NodeList(build(new TemplateBuilder(this))), this);
    }

    /**
     * Load a template by name and render it in a new render pass.
     */
    public render(name: string, values: Record<string, unknown> = {}): string {
        return this.getTemplate(name).render(values);
    }
}
