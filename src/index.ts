"use strict";

export type { CatalogStats } from "./analysis/symbols/catalog";
export { SymbolCatalog } from "./analysis/symbols/catalog";
export type { SymbolCategoryKey } from "./analysis/symbols/category";
export { SymbolCategory } from "./analysis/symbols/category";
export type { PrefixRule } from "./analysis/symbols/prefixRules";
export { buildPrefixRules, PrefixRuleTable } from "./analysis/symbols/prefixRules";
export type { ContextPair, SexpContext } from "./analysis/syntax/context";
export { headColumn, resolveContexts, resolveCurrentContext, resolveParentContext } from "./analysis/syntax/context";
export { parseDeclarationRecords } from "./analysis/syntax/definitions/declarations";
export type { SourceDefinition } from "./analysis/syntax/definitions/sourceDefinitions";
export { findSourceDefinitions } from "./analysis/syntax/definitions/sourceDefinitions";
export type { Sexp } from "./analysis/syntax/sexpr/navigator";
export { SexpNavigator } from "./analysis/syntax/sexpr/navigator";
export type { ScanDirection } from "./analysis/syntax/tokens/tokenIndex";
export { scan, TokenIndex } from "./analysis/syntax/tokens/tokenIndex";
export { default as tokenize } from "./analysis/syntax/tokens/tokenize";
export { Token, TokenKind } from "./analysis/syntax/tokens/tokens";
export type { EditableBuffer, TextBuffer } from "./analysis/workspace/document";
export { getLineIndentation, getLineText, setLineIndentation, StringDocument } from "./analysis/workspace/document";
export type { CatalogSettings, IndentSettings, Settings } from "./config";
export { DEFAULT_SETTINGS, loadSettings, parseSettings, SettingsError } from "./config";
export { EvaluatorChannel } from "./evaluator/channel";
export { echoEvalCommands, evalCommand, printCommand } from "./evaluator/commands";
export type { IndentEdit } from "./indent/dedent";
export { closerColumn, dedentPass, isBareCloserLine, isCloserLine } from "./indent/dedent";
export { applyIndentEdits, computeIndent, indentLine, indentRegion, newlineAndIndent } from "./indent/indenter";
export type { IndentLine, IndentRuleTable } from "./indent/rules";
export { buildIndentRules, decideIndent, selectIndentRule } from "./indent/rules";
export type { FileSystem } from "./shared/async/fs";
export { nodeFileSystem } from "./shared/async/fs";
export type { Logger } from "./shared/log";
export { logger, LogLevel, nullLogger, parseLogLevel } from "./shared/log";
export { activate, EditingSession } from "./mode";
