export { LongFunctionRule, MAX_FUNCTION_LINES } from "./long-function";
export { TooManyParametersRule, MAX_PARAMETERS } from "./too-many-parameters";
export { DeprecatedImportRule, DEPRECATED_MODULES } from "./deprecated-import";
export { DeepNestingRule, enterNesting, MAX_NESTING_DEPTH } from "./deep-nesting";
export type { NestingStep } from "./deep-nesting";
export { LargeFileRule, countLines, MAX_FILE_LINES } from "./large-file";
