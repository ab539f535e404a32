/**
 * loft-check
 * Public API for the diagnostics formatter and command-line front end
 */

// ============================================================
// COMMAND
// ============================================================
export {
  checkSource,
  type FileReport,
  formatReport,
  main,
  type ParsedCheckArgs,
  parseCheckArgs,
} from './cli-check.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  type CheckConfig,
  CONFIG_FILE,
  createDefaultConfig,
  loadConfig,
  validateConfig,
} from './cli-config.js';

// ============================================================
// FORMATTING
// ============================================================
export {
  formatDiagnostic,
  type FormatOptions,
  isOutputFormat,
  type JsonDiagnostic,
  OUTPUT_FORMATS,
  type OutputFormat,
  renderCaretUnderline,
  renderSnippet,
  type SnippetOptions,
  toJsonDiagnostic,
} from './cli-error-formatter.js';
export {
  type LspDiagnostic,
  type LspPosition,
  type LspRange,
  type LspSeverity,
  toLspDiagnostic,
} from './cli-lsp-diagnostic.js';
export { explainError } from './cli-explain.js';
export { formatTokenLine, serializeAst, VERSION } from './cli-shared.js';
