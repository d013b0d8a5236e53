export { type FileMatchingInfo, defaultFileMatching, matchesFile } from './plugin/file-matching'
export {
  CONFIG_KEY,
  type ConfigurationDiagnostic,
  type FormatRange,
  type FormatRequest,
  type PluginInfo,
  type ResolveConfigurationResult,
  type ShebangConfiguration,
  ShebangPlugin,
} from './plugin/shebang-plugin'
export { type FirstLine, type Shebang, formatShebang, parseShebang, printShebang, splitFirstLine } from './shebang/format-shebang'
