import pkg from '../../package.json'
import { formatShebang, splitFirstLine } from '../shebang/format-shebang'
import { defaultFileMatching, type FileMatchingInfo } from './file-matching'

export type ShebangConfiguration = Record<string, never>

export type PluginInfo = {
  name: string
  version: string
  configKey: string
}

export type ConfigurationDiagnostic = {
  propertyName: string
  message: string
}

export type ResolveConfigurationResult = {
  config: ShebangConfiguration
  diagnostics: ConfigurationDiagnostic[]
  fileMatching: FileMatchingInfo
}

export type FormatRange = {
  start: number
  end: number
}

export type FormatRequest = {
  filePath: string
  fileText: string
  range?: FormatRange
}

export const CONFIG_KEY = 'shebang'

export class ShebangPlugin {
  pluginInfo(): PluginInfo {
    return { name: pkg.name, version: pkg.version, configKey: CONFIG_KEY }
  }

  resolveConfig(config: Record<string, unknown> = {}): ResolveConfigurationResult {
    const diagnostics = Object.keys(config).map((propertyName) => ({
      propertyName,
      message: 'Unknown property in configuration',
    }))

    return { config: {}, diagnostics, fileMatching: defaultFileMatching() }
  }

  /**
   * Returns the formatted file text, or `null` when nothing changes.
   *
   * A range request is only honoured when it starts at offset 0 and spans the
   * whole first line; any other range cannot contain a shebang.
   */
  format(request: FormatRequest): string | null {
    const { fileText, range } = request

    if (range) {
      if (range.start !== 0) {
        return null
      }
      if (range.end < splitFirstLine(fileText).line.length) {
        return null
      }
    }

    const result = formatShebang(fileText)
    return result === fileText ? null : result
  }
}
