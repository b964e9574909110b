import type { BlockRegistry } from '../blocks/block-registry.js';
import type { WidgetLibraryTable } from '../services/widget/widget-library.js';
import type { TemplateEngine } from './engine.js';
import { ScopeStack } from './scope-stack.js';

/**
 * Per-render-pass state that is not visible to templates as variables.
 */
export interface RenderState {
    /**
     * Registry that block nodes and empty-alias widget references resolve against.
     */
    blocks: BlockRegistry;

    /**
     * Widget libraries loaded during this pass, keyed by alias.
     */
    widgets: WidgetLibraryTable;
}

/**
 * Rendering environment for one render pass.
 *
 * Holds the variable scope templates read from and the render state the
 * widget layer swaps while a library is active. A context is created per
 * `Template.render()` call and never shared between passes.
 */
export class Context {
    public readonly scope: ScopeStack<Record<string, unknown>>;
    public readonly renderState = new ScopeStack<RenderState>();

    constructor(public readonly engine: TemplateEngine, values: Record<string, unknown> = {}) {
        this.scope = new ScopeStack<Record<string, unknown>>(values);
    }

    public get(name: string): unknown {
        return this.scope.get(name);
    }

    public has(name: string): boolean {
        return this.scope.has(name);
    }

    /**
     * Bind a variable in the innermost scope.
     */
    public set(name: string, value: unknown): void {
        this.scope.set(name, value);
    }

    /**
     * Run `fn` with `values` layered over the current scope.
     */
    public update<R>(values: Record<string, unknown>, fn: () => R): R {
        return this.scope.scoped(values, fn);
    }
}
