import { Context } from './context.js';
import type { TemplateEngine } from './engine.js';
import { BlockNode, ExtendsNode, type NodeList } from './nodes.js';

function collectBlocks(nodelist: NodeList, into: Map<string, BlockNode>): Map<string, BlockNode> {
    for (const node of nodelist.nodes) {
        if (node instanceof BlockNode) {
            into.set(node.name, node);
            collectBlocks(node.nodelist, into);
        }
    }
    return into;
}

/**
 * Whether `value` can name a template: a loaded template or a non-empty name.
 */
export function isTemplateSource(value: unknown): value is string | Template {
    return value instanceof Template || (typeof value === 'string' && value !== '');
}

/**
 * A loaded template document.
 */
export class Template {
    constructor(
        public readonly name: string,
        public readonly nodelist: NodeList,
        public readonly engine: TemplateEngine
    ) {}

    /**
     * The template's `extends` declaration, if it has one. Only the first
     * top-level declaration counts.
     */
    public get extendsNode(): ExtendsNode | undefined {
        return this.nodelist.nodes.find((node): node is ExtendsNode => node instanceof ExtendsNode);
    }

    /**
     * Blocks declared by this template itself: top-level blocks and blocks
     * nested inside them, not blocks inside other constructs.
     */
    public localBlocks(): Map<string, BlockNode> {
        return collectBlocks(this.nodelist, new Map());
    }

    /**
     * Start a new render pass.
     *
     * @param values - Variables visible to the template
     */
    public render(values: Record<string, unknown> = {}): string {
        return this.renderInContext(new Context(this.engine, values));
    }

    /**
     * Render against an existing context.
     *
     * Resolves a fresh block registry for this template's inheritance chain
     * and renders the root ancestor with it, so each block renders its most
     * specific definition.
     */
    public renderInContext(context: Context): string {
        const registry = this.engine.resolver.resolve(this, context);

        let root: Template = this;
        for (let parent = root.extendsNode; parent; parent = root.extendsNode) {
            root = parent.getParent(context);
        }

        return context.renderState.scoped({ blocks: registry }, () => root.nodelist.render(context));
    }
}
