/**
 * tessera engine: reusable template widgets.
 *
 * Load block libraries under aliases with `load_widgets`, render their blocks
 * with `widget` / `nested_widget` / `form_field`, and re-render sibling blocks
 * with `reuse`.
 */

export { env, resolveLogLevel } from './config/env.js';
export type { EnvConfig, LogLevel } from './config/env.js';

export {
    TesseraError,
    TemplateSyntaxError,
    ConfigurationError,
    BlockLookupError,
    TemplateNotFoundError,
    VariableLookupError,
    ScopeError
} from './lib/errors.js';
export { createLogger, logger, PinoLogger } from './lib/logger.js';
export type { ICreateLoggerOptions } from './lib/logger.js';
export { escapeHtml, flatattrs, markSafe, SafeString } from './lib/html.js';

export { BlockRegistry } from './blocks/block-registry.js';
export type { BlockDefinition } from './blocks/block-registry.js';
export { BlockReference, renderBlock } from './blocks/render-block.js';

export { TemplateEngine } from './template/engine.js';
export type { TemplateEngineOptions } from './template/engine.js';
export { TemplateBuilder } from './template/builder.js';
export { Context } from './template/context.js';
export type { RenderState } from './template/context.js';
export { compileExpression } from './template/expression.js';
export type { Expression, FilterFunction } from './template/expression.js';
export { InMemoryTemplateLoader } from './template/loader.js';
export {
    Node,
    NodeList,
    TextNode,
    VariableNode,
    BlockNode,
    ExtendsNode,
    IfNode,
    ForNode
} from './template/nodes.js';
export { ScopeStack } from './template/scope-stack.js';
export { TagLibrary, splitContents, popAsVar, tokenKwargs } from './template/tag-library.js';
export type { TagCompiler, TagCompileRequest } from './template/tag-library.js';
export { Template } from './template/template.js';

export { TemplateResolver } from './services/template-resolver/template-resolver.service.js';
export { WidgetService } from './services/widget/widget.service.js';
export type {
    IRenderFormFieldOptions,
    IRenderWidgetOptions,
    IWidgetServiceOptions
} from './services/widget/widget.service.js';
export { WidgetLibraryTable } from './services/widget/widget-library.js';
export { withLibrary, activeRegistry } from './services/widget/widget-scope.js';
export { findBlock, findFirstBlock } from './services/widget/find-block.js';
export { parseWidgetReference } from './services/widget/widget-reference.js';

export { autoWidget } from './modules/forms/auto-widget.js';
export { buildFieldData, normalizeValue } from './modules/forms/field-data.js';
export { ChoiceWrapper } from './modules/forms/choice-wrapper.js';
export { FIELD_TRANSFORMS, WIDGET_TRANSFORMS, applyKindTransforms } from './modules/forms/kind-transforms.js';
export type { FieldDataTransform } from './modules/forms/kind-transforms.js';

export {
    createWidgetTagLibrary,
    FormFieldNode,
    LoadWidgetsNode,
    NestedWidgetNode,
    ReuseNode,
    WidgetNode
} from './tags/index.js';
