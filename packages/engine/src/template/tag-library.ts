import { TemplateSyntaxError } from '../lib/errors.js';
import type { TemplateEngine } from './engine.js';
import type { Expression } from './expression.js';
import type { Node, NodeList } from './nodes.js';

/**
 * What a tag compiler receives: the tag's arguments as the tokenizer split
 * them, and the body for block tags such as `nested_widget`.
 */
export interface TagCompileRequest {
    readonly tagName: string;
    readonly bits: readonly string[];
    readonly body?: NodeList;
    readonly engine: TemplateEngine;
}

export type TagCompiler = (request: TagCompileRequest) => Node;

export class TagLibrary {
    private readonly compilers = new Map<string, TagCompiler>();

    public register(name: string, compiler: TagCompiler): this {
        this.compilers.set(name, compiler);
        return this;
    }

    public has(name: string): boolean {
        return this.compilers.has(name);
    }

    public names(): string[] {
        return Array.from(this.compilers.keys());
    }

    /**
     * Copy every compiler of `other` into this library; `other` wins on clashes.
     */
    public merge(other: TagLibrary): this {
        for (const [name, compiler] of other.compilers) {
            this.compilers.set(name, compiler);
        }
        return this;
    }

    public compile(request: TagCompileRequest): Node {
        const compiler = this.compilers.get(request.tagName);
        if (!compiler) {
            throw new TemplateSyntaxError(`Invalid tag: "${request.tagName}"`, {
                tag: request.tagName,
                registered: this.names()
            });
        }
        return compiler(request);
    }
}

const BIT_PATTERN = /(?:[^\s'"]*(?:"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'))+[^\s'"]*|\S+/g;
const KWARG_PATTERN = /^(\w+)=(.+)$/s;

/**
 * Split tag contents on whitespace, keeping quoted strings (and `key="a b"`) whole.
 *
 * @example
 * splitContents(`'p:button' label="Save now" as out`)
 * // ["'p:button'", 'label="Save now"', 'as', 'out']
 */
export function splitContents(contents: string): string[] {
    return contents.match(BIT_PATTERN) ?? [];
}

/**
 * Remove a trailing `as <name>` from `bits` and return the name.
 */
export function popAsVar(bits: string[]): string | undefined {
    if (bits.length >= 2 && bits[bits.length - 2] === 'as') {
        const [, name] = bits.splice(bits.length - 2, 2);
        return name;
    }
    return undefined;
}

export function isKwarg(bit: string): boolean {
    return KWARG_PATTERN.test(bit);
}

/**
 * Consume leading `key=value` bits, compiling each value.
 *
 * Stops at the first bit that is not a keyword argument and leaves it, and
 * everything after it, in `bits`.
 */
export function tokenKwargs(bits: string[], engine: TemplateEngine): Map<string, Expression> {
    const kwargs = new Map<string, Expression>();
    while (bits.length > 0) {
        const match = KWARG_PATTERN.exec(bits[0]);
        if (!match) {
            break;
        }
        bits.shift();
        kwargs.set(match[1], engine.compileExpression(match[2]));
    }
    return kwargs;
}
