/**
 * Render-pass-local mapping from alias to a resolved widget library.
 *
 * Created lazily by the first `load_widgets` directive of a render pass and
 * dropped with the pass. Two concurrent renders never share a table.
 *
 * @typeParam TRegistry - Block registry type stored per alias
 */
export interface IWidgetLibraryTable<TRegistry> {
    readonly size: number;

    has(alias: string): boolean;

    get(alias: string): TRegistry | undefined;

    /**
     * Bind `alias` to a library, replacing any previous binding.
     */
    set(alias: string, registry: TRegistry): void;

    /**
     * Loaded aliases in load order.
     */
    aliases(): string[];
}
