/**
 * @quire/node
 *
 * Node.js surface for the layout compilation pipeline: environment
 * configuration, report documents on disk, the render audit log and the
 * `quire` command.
 */

export {
  type Env,
  type RenderConfig,
  envFlag,
  mergeReportOptions,
  parseLength,
  readEnv,
  readRenderConfig,
} from "./config.js";
export {
  DEFAULT_RENDER_AUDIT_FILE,
  type RenderAuditLogger,
  type TextFingerprint,
  createRenderAuditLogger,
  textFingerprint,
} from "./renderAudit.js";
export {
  type BuildReportOptions,
  type BuiltReport,
  buildReport,
  loadDataFile,
  loadReportDocument,
  readJsonFile,
  writeReportFile,
} from "./report.js";
export { type CliIo, type CliOptions, HELP_TEXT, flagOverrides, parseArgs, runCli } from "./cli.js";
