export { ConvergenceEngine } from './engine.js';
export {
    TemplateError,
    UndefinedVariableError,
    NonConvergenceError,
    InvalidExpressionError,
    snippet,
    SNIPPET_LENGTH,
    type TemplateErrorKind,
    type TemplateErrorDetails
} from './errors.js';
export { DEFAULT_MAX_PASSES, ITEM_SCOPE_NAME, type EngineOptions } from './options.js';
