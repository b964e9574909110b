import type { IBoundField, ILoadWidgetsOptions, ILogger } from '@tessera/types';
import type { BlockDefinition } from '../../blocks/block-registry.js';
import { renderBlock } from '../../blocks/render-block.js';
import { BlockLookupError } from '../../lib/errors.js';
import { markSafe } from '../../lib/html.js';
import { autoWidget } from '../../modules/forms/auto-widget.js';
import { buildFieldData } from '../../modules/forms/field-data.js';
import type { Context } from '../../template/context.js';
import type { NodeList } from '../../template/nodes.js';
import type { Template } from '../../template/template.js';
import type { TemplateResolver } from '../template-resolver/template-resolver.service.js';
import { findBlock, findFirstBlock } from './find-block.js';
import { getOrCreateLibraryTable } from './widget-library.js';
import { parseWidgetReference } from './widget-reference.js';
import { activeRegistry, withLibrary } from './widget-scope.js';

export interface IWidgetServiceOptions {
    /**
     * Alias `renderFormField` uses when no widget reference is given.
     */
    formAlias?: string;
}

export interface IRenderWidgetOptions {
    /**
     * Bind the rendered widget to this variable in the caller's scope and
     * emit nothing.
     */
    storeAs?: string;
}

export interface IRenderFormFieldOptions {
    /**
     * Explicit `alias:blockname` reference; derived from the field when omitted.
     */
    widget?: string;

    /**
     * Values that win over the derived field data. Without `widget`, an
     * `alias` entry picks the library instead.
     */
    overrides?: Readonly<Record<string, unknown>>;
}

/**
 * Loads widget libraries into a render pass and renders their blocks.
 *
 * Every directive of the widget layer ends up here: `load_widgets` fills the
 * pass's library table, `widget` and `nested_widget` activate a library and
 * render one of its blocks with overrides, `form_field` picks a block from a
 * field's kinds and name, and `reuse` re-renders a block of the active
 * registry.
 *
 * The service holds no render state of its own; everything per-pass lives in
 * the `Context`, so one service instance serves concurrent renders.
 *
 * @example
 * ```typescript
 * const context = new Context(engine, { label: 'Save' });
 * engine.widgets.loadWidgets(context, { ui: 'widgets/buttons.html' });
 * engine.widgets.renderWidget(context, 'ui:primary', { size: 'lg' });
 * ```
 */
export class WidgetService {
    private readonly formAlias: string;

    /**
     * @param resolver - Resolves library templates into block registries
     * @param logger - Structured logger for widget telemetry
     */
    constructor(
        private readonly resolver: TemplateResolver,
        private readonly logger: ILogger,
        options: IWidgetServiceOptions = {}
    ) {
        this.formAlias = options.formAlias ?? 'form';
    }

    /**
     * Load widget libraries into the current render pass.
     *
     * Each template is resolved with its whole inheritance chain into a fresh
     * registry stored under its alias, replacing an earlier load of the same
     * alias. With `soft`, aliases that are already loaded are kept.
     *
     * @param libraries - Alias to template name (or loaded template)
     */
    public loadWidgets(
        context: Context,
        libraries: Readonly<Record<string, string | Template>>,
        options: ILoadWidgetsOptions = {}
    ): void {
        const table = getOrCreateLibraryTable(context);

        for (const [alias, template] of Object.entries(libraries)) {
            const templateName = typeof template === 'string' ? template : template.name;

            if (options.soft && table.has(alias)) {
                this.logger.debug({ alias, template: templateName }, 'Widget library already loaded, skipping');
                continue;
            }

            const registry = this.resolver.resolve(template, context);
            table.set(alias, registry);

            this.logger.debug({ alias, template: templateName, blocks: registry.size }, 'Loaded widget library');
        }
    }

    /**
     * Run `fn` with the library under `alias` active. See `withLibrary`.
     */
    public using<R>(context: Context, alias: string, fn: () => R): R {
        if (alias !== '') {
            this.logger.trace({ alias }, 'Activating widget library');
        }
        return withLibrary(context, alias, fn);
    }

    /**
     * Render a block with `overrides` layered over the current scope.
     */
    public renderWithOverrides(
        context: Context,
        definition: BlockDefinition,
        overrides: Readonly<Record<string, unknown>>
    ): string {
        return context.update({ ...overrides }, () => renderBlock(context, definition, activeRegistry(context)));
    }

    /**
     * Render the widget `alias:blockname`.
     *
     * @returns The rendered widget, or an empty string when `storeAs` is set
     *
     * @throws TemplateSyntaxError for a reference without a colon
     * @throws ConfigurationError when the alias is not loaded
     * @throws BlockLookupError when the library has no such block
     */
    public renderWidget(
        context: Context,
        reference: string,
        overrides: Readonly<Record<string, unknown>> = {},
        options: IRenderWidgetOptions = {}
    ): string {
        const { alias, blockName } = parseWidgetReference(reference);

        return this.using(context, alias, () => {
            const definition = this.lookup(context, [blockName]);
            const result = this.renderWithOverrides(context, definition, overrides);
            return this.emit(context, result, options.storeAs);
        });
    }

    /**
     * Render a wrapper widget around caller-supplied content.
     *
     * `body` is rendered first, inside the widget's library and with the
     * overrides applied, and the result is exposed to the widget block as
     * the safe string `content`.
     */
    public renderNestedWidget(
        context: Context,
        reference: string,
        overrides: Readonly<Record<string, unknown>>,
        body: NodeList,
        options: IRenderWidgetOptions = {}
    ): string {
        const { alias, blockName } = parseWidgetReference(reference);

        return this.using(context, alias, () => {
            const definition = this.lookup(context, [blockName]);
            const registry = activeRegistry(context);

            const result = context.update({ ...overrides }, () => {
                const content = markSafe(body.render(context));
                return context.update({ content }, () => renderBlock(context, definition, registry));
            });

            return this.emit(context, result, options.storeAs);
        });
    }

    /**
     * Render the first of `names` found in the active registry.
     *
     * Unlike widget references there is no alias, and a miss renders nothing
     * instead of failing.
     */
    public reuse(
        context: Context,
        names: string | readonly string[],
        overrides: Readonly<Record<string, unknown>> = {}
    ): string {
        const candidates = typeof names === 'string' ? [names] : names;
        const definition = findFirstBlock(activeRegistry(context), candidates);

        if (!definition) {
            this.logger.debug({ names: candidates }, 'No block to reuse');
            return '';
        }

        return this.renderWithOverrides(context, definition, overrides);
    }

    /**
     * Render a bound form field through a widget block.
     *
     * Without `widget`, candidates come from `autoWidget` and are looked up in
     * the library named by the `alias` override (default: the configured form
     * alias). With `widget`, exactly that reference is used.
     */
    public renderFormField(context: Context, field: IBoundField, options: IRenderFormFieldOptions = {}): string {
        let alias: string;
        let names: string[];
        let overrides: Readonly<Record<string, unknown>> = options.overrides ?? {};

        if (options.widget === undefined) {
            const { alias: aliasOverride, ...rest } = overrides;
            alias = aliasOverride === undefined ? this.formAlias : String(aliasOverride);
            names = autoWidget(field);
            overrides = rest;
        } else {
            const reference = parseWidgetReference(options.widget);
            alias = reference.alias;
            names = [reference.blockName];
        }

        const data = buildFieldData(field, overrides);

        return this.using(context, alias, () => {
            const definition = this.lookup(context, names);
            return context.update(data, () => renderBlock(context, definition, activeRegistry(context)));
        });
    }

    private lookup(context: Context, names: string[]): BlockDefinition {
        const registry = activeRegistry(context);
        try {
            return findBlock(registry, ...names);
        } catch (error) {
            if (error instanceof BlockLookupError) {
                this.logger.warn({ names, available: registry?.names() ?? [] }, 'Widget lookup failed');
            }
            throw error;
        }
    }

    private emit(context: Context, result: string, storeAs: string | undefined): string {
        if (storeAs === undefined) {
            return result;
        }
        context.set(storeAs, markSafe(result));
        return '';
    }
}
