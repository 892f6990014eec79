/**
 * Default configuration template and helper for creating config files.
 */

import { existsSync, mkdirSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'

export const CONFIG_TEMPLATE = `# dirhop configuration
# =====================
# This file is optional. If it doesn't exist, dirhop uses sensible defaults.
# Uncomment and edit values to customize behavior.

# db_path = "~/.local/share/dirhop/dirhop.db"

[search]
# include_shortcuts = true   # match shortcut names and descriptions
# fuzzy = false              # initial matching mode of "dirhop pick"

[smart_suggestions]
# active = true
# depth = 5                  # past visits of the current directory to mine
# count = 3                  # predictions shown above the history

[display]
# page_size = 10
# max_width = 80
`

export function ensureConfigFile(configPath: string): boolean {
  const configDir = dirname(configPath)
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true })
  }
  if (!existsSync(configPath)) {
    writeFileSync(configPath, CONFIG_TEMPLATE)
    return true
  }
  return false
}
