import { existsSync, readFileSync } from 'node:fs'
import { loadConfig } from '../../config.js'
import { ensureConfigFile } from '../../config-template.js'
import { error, info, output, EXIT_ERROR, EXIT_SUCCESS, EXIT_USAGE, type OutputOptions } from '../core.js'
import { getEffectiveConfigPath } from '../helpers.js'

export async function cmdConfig(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  const showFile = args.includes('--show')
  const validate = args.includes('--validate')
  const init = args.includes('--init')
  const unknown = args.find(arg => !['--path', '--show', '--validate', '--init'].includes(arg))
  const configPath = getEffectiveConfigPath(getConfigPath)

  if (unknown !== undefined) {
    error(`invalid option: ${unknown}`, opts)
    error('Usage: dirhop config [--path|--show|--validate|--init]', opts)
    return EXIT_USAGE
  }

  if (validate) {
    try {
      const exists = existsSync(configPath)
      const config = loadConfig(configPath)
      if (opts.json) {
        output({ path: configPath, exists, valid: true, config }, opts)
      } else if (exists) {
        output(`Config OK: ${configPath}`, opts)
      } else {
        output(`No config file found. Using defaults (${configPath})`, opts)
      }
      return EXIT_SUCCESS
    } catch (err) {
      error(err instanceof Error ? err.message : String(err), opts)
      return EXIT_ERROR
    }
  }

  if (showFile) {
    if (!existsSync(configPath)) {
      error(`config file not found: ${configPath}`, opts)
      return EXIT_ERROR
    }
    const text = readFileSync(configPath, 'utf8')
    output(opts.json ? { path: configPath, content: text } : text, opts)
    return EXIT_SUCCESS
  }

  if (init) {
    const created = ensureConfigFile(configPath)
    if (opts.json) {
      output({ path: configPath, created }, opts)
    } else if (created) {
      info(`Wrote config template to ${configPath}`, opts)
    } else {
      info(`Config already exists: ${configPath}`, opts)
    }
    return EXIT_SUCCESS
  }

  output(opts.json ? { path: configPath } : configPath, opts)
  return EXIT_SUCCESS
}
