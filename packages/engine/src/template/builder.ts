import type { TemplateEngine } from './engine.js';
import {
    BlockNode,
    ExtendsNode,
    ForNode,
    IfNode,
    NodeList,
    TextNode,
    VariableNode,
    type Node
} from './nodes.js';
import { splitContents } from './tag-library.js';

/**
 * Constructs template nodes without a text parser.
 *
 * Expressions and tag contents are given in template syntax (`user.name`,
 * `"p:button" label="Go"`) and compiled against the owning engine's filters
 * and tags.
 *
 * @example
 * engine.compile('widgets.html', t => [
 *     t.block('button', [
 *         t.text('<button>'), t.variable('label'), t.text('</button>')
 *     ])
 * ]);
 */
export class TemplateBuilder {
    constructor(private readonly engine: TemplateEngine) {}

    public text(text: string): TextNode {
        return new TextNode(text);
    }

    public variable(source: string): VariableNode {
        return new VariableNode(this.engine.compileExpression(source));
    }

    public block(name: string, children: readonly Node[] = []): BlockNode {
        return new BlockNode(name, new NodeList(children));
    }

    /**
     * @param parent - Expression naming the parent, e.g. `"base.html"`
     */
    public extends(parent: string): ExtendsNode {
        return new ExtendsNode(this.engine.compileExpression(parent));
    }

    public if(condition: string, then: readonly Node[], otherwise: readonly Node[] = []): IfNode {
        return new IfNode(this.engine.compileExpression(condition), new NodeList(then), new NodeList(otherwise));
    }

    public for(target: string, iterable: string, body: readonly Node[], empty: readonly Node[] = []): ForNode {
        return new ForNode(target, this.engine.compileExpression(iterable), new NodeList(body), new NodeList(empty));
    }

    /**
     * Compile a library tag.
     *
     * @param name - Tag name, e.g. `widget`
     * @param contents - Everything after the tag name, as written in a template
     * @param body - Child nodes for tags that wrap content
     */
    public tag(name: string, contents = '', body?: readonly Node[]): Node {
        return this.engine.tags.compile({
            tagName: name,
            bits: splitContents(contents),
            body: body ? new NodeList(body) : undefined,
            engine: this.engine
        });
    }
}
