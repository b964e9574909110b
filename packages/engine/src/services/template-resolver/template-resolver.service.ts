import type { ILogger } from '@tessera/types';
import { BlockRegistry } from '../../blocks/block-registry.js';
import { TemplateSyntaxError } from '../../lib/errors.js';
import type { Context } from '../../template/context.js';
import type { Template } from '../../template/template.js';

/**
 * Folds the blocks of a template and all of its ancestors into one registry.
 *
 * The template's own blocks form the first, most specific layer; each parent
 * up the `extends` chain contributes the next layer. Page renders use the
 * result to decide which definition of a block wins, and widget libraries use
 * it so a library template can extend and override another library.
 *
 * Loader errors for missing templates propagate unchanged.
 */
export class TemplateResolver {
    /**
     * @param logger - Structured logger for resolution telemetry
     */
    constructor(private readonly logger: ILogger) {}

    /**
     * Resolve a template chain into a block registry.
     *
     * Safe to repeat against the same registry: layers that are already
     * present are not added twice.
     *
     * @param template - Template name or already loaded template
     * @param context - Render context; parent expressions are evaluated in it
     * @param registry - Registry to fill; a fresh one by default
     * @returns The filled registry
     *
     * @throws TemplateSyntaxError when the chain extends itself
     *
     * @example
     * const registry = resolver.resolve('widgets/bootstrap.html', context);
     * registry.getBlock('CharField');
     */
    public resolve(template: string | Template, context: Context, registry = new BlockRegistry()): BlockRegistry {
        const loaded = typeof template === 'string' ? context.engine.getTemplate(template) : template;
        return this.collect(loaded, context, registry, []);
    }

    private collect(template: Template, context: Context, registry: BlockRegistry, chain: Template[]): BlockRegistry {
        if (chain.includes(template)) {
            throw new TemplateSyntaxError(`Template "${template.name}" extends itself`, {
                chain: [...chain, template].map(entry => entry.name)
            });
        }

        const blocks = template.localBlocks();
        registry.addLayer(blocks);

        this.logger.debug({ template: template.name, blocks: blocks.size, depth: chain.length }, 'Resolved template blocks');

        const extendsNode = template.extendsNode;
        if (!extendsNode) {
            return registry;
        }

        return this.collect(extendsNode.getParent(context), context, registry, [...chain, template]);
    }
}
