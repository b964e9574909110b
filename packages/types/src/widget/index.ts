/**
 * Widget library contracts.
 *
 * Widgets are named blocks from independently loaded templates, addressed as
 * `alias:blockname` once their template has been loaded under an alias.
 */

export type { IWidgetReference } from './IWidgetReference.js';
export type { IWidgetLibraryTable } from './IWidgetLibraryTable.js';
export type { ILoadWidgetsOptions } from './ILoadWidgetsOptions.js';
