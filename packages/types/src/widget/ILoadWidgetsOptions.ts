/**
 * Options for loading widget libraries into the current render pass.
 */
export interface ILoadWidgetsOptions {
    /**
     * Skip aliases that are already loaded instead of replacing them.
     *
     * Lets composable templates say "load this library unless the page
     * already chose one under the same alias"; the first load wins.
     */
    soft?: boolean;
}
