export { STYLES_OUTPUT_DIR, buildSite, type BuildResult, type OutputFile } from "./build";
export { listOutputFiles, writeBuild, type WriteOptions, type WriteReport } from "./write";
export { checkBuild, hasErrors } from "./check";
export {
  analyzeAssetUsage,
  assetPatterns,
  formatAssetReport,
  loadThemeSources,
  type AssetReport,
  type AssetUsage,
  type SourceFile,
} from "./assetUsage";
export {
  auditAssets,
  build,
  check,
  reportDiagnostics,
  type BuildOptions,
  type BuildOutcome,
  type CheckOutcome,
} from "./pipeline";
export { DEFAULT_PORT, serve, type ServeOptions } from "./serve";
