/**
 * Source of loaded templates, keyed by template name.
 *
 * @typeParam TTemplate - Template type produced by the host engine
 */
export interface ITemplateLoader<TTemplate> {
    /**
     * Load a template by name.
     *
     * @throws Error when no template is known under `name`
     */
    getTemplate(name: string): TTemplate;

    has(name: string): boolean;
}
