import type { WidgetService } from '../services/widget/widget.service.js';
import { TagLibrary } from '../template/tag-library.js';
import { compileFormFieldTag } from './form-field.tag.js';
import { compileLoadWidgetsTag } from './load-widgets.tag.js';
import { compileNestedWidgetTag } from './nested-widget.tag.js';
import { compileReuseTag } from './reuse.tag.js';
import { compileWidgetTag } from './widget.tag.js';

/**
 * Tag library exposing the widget layer to templates.
 *
 * - `load_widgets alias="template" ... [_soft=true]`
 * - `widget "alias:block" key=val... [as name]`
 * - `nested_widget "alias:block" key=val... [as name]` with a body
 * - `form_field field ["alias:block"] key=val...`
 * - `reuse name_or_names key=val...`
 */
export function createWidgetTagLibrary(service: WidgetService): TagLibrary {
    return new TagLibrary()
        .register('load_widgets', compileLoadWidgetsTag(service))
        .register('widget', compileWidgetTag(service))
        .register('nested_widget', compileNestedWidgetTag(service))
        .register('form_field', compileFormFieldTag(service))
        .register('reuse', compileReuseTag(service));
}

export { FormFieldNode } from './form-field.tag.js';
export { LoadWidgetsNode } from './load-widgets.tag.js';
export { NestedWidgetNode } from './nested-widget.tag.js';
export { ReuseNode } from './reuse.tag.js';
export { WidgetNode } from './widget.tag.js';
export { widgetFilters } from './filters.js';
