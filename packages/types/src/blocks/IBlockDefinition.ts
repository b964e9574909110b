/**
 * One definition of a named block, as contributed by a single template in an
 * inheritance chain.
 *
 * Definitions are immutable. The registry that created them records which
 * definition each one shadows, so a definition never holds a reference to its
 * ancestor; it carries its position in the override chain instead.
 *
 * @typeParam TBody - Renderable body produced by the host engine
 */
export interface IBlockDefinition<TBody> {
    /**
     * Arena index of this definition inside its registry.
     */
    readonly id: number;

    readonly name: string;

    readonly body: TBody;

    /**
     * Position in the override chain for `name`: 0 is the most specific
     * definition, 1 the definition it shadows, and so on.
     */
    readonly depth: number;
}
