import { VERSION } from '../version.js'
import { NAME } from './constants.js'

export function showHelp(): void {
  console.log(`${NAME} v${VERSION} - Remembers visited directories and ranks where you go next

USAGE
  ${NAME} <command> [options]

PATH COMMANDS
  add-path <path>            Record a visit (called by the shell cd wrapper)
  delete-path <id>           Remove a path from the current set
  paths [filter]             List paths, most recent first, with suggestions
  history [filter]           List every recorded visit, newest first
  lasts                      Show the 10 most recent paths
  suggest [path]             Predict the next directories after a path

SHORTCUT COMMANDS
  add-shortcut <name> <path> [description]
                             Create or replace a shortcut
  delete-shortcut <name>     Remove a shortcut
  print-shortcut <name>      Print the path of a shortcut
  shortcuts [filter]         List shortcuts

OTHER COMMANDS
  import-paths <file>        Import paths from a .json or .toml file
  import-shortcuts <file>    Import shortcuts from a .json or .toml file
  export-paths [file]        Export paths as JSON (default: stdout)
  export-shortcuts [file]    Export shortcuts as JSON (default: stdout)
  pretty-print-path <path>   Render a path with shortcut and ~ abbreviations
  pick [output-file]         Choose a directory interactively
  config                     Show config path, content or validation result
  shell-init                 Print the shell functions (cd, p, c)

LIST OPTIONS
  -f, --fuzzy                Subsequence matching instead of substring
  -o, --offset <n>           Skip the first n entries (default: 0)
  -n, --limit <n>            Maximum entries (default: display.page_size)

SUGGEST OPTIONS
  -d, --depth <n>            Past occurrences to mine (default: config)
  -c, --count <n>            Number of predictions (default: config)

PRETTY-PRINT OPTIONS
  --no-style                 Plain text without colors
  -w, --max-width <n>        Maximum width (default: display.max_width)

PICK OPTIONS
  -s, --shortcuts            Choose among shortcuts instead of paths
  -f, --fuzzy                Start in fuzzy matching mode
  -Q, --query <q>            Initial filter text

CONFIG OPTIONS
  --path                     Print the config file path
  --show                     Print the config file
  --validate                 Check the config file
  --init                     Write a commented config template

GLOBAL OPTIONS
  --json                     Output as JSON
  -q, --quiet                Suppress non-essential output
  --no-color                 Disable colored output
  --debug                    Enable debug logging
  -h, --help                 Show this help
  -v, --version              Show version

EXAMPLES
  eval "$(${NAME} shell-init)"
  ${NAME} paths src --fuzzy
  ${NAME} add-shortcut docs ~/Documents "personal documents"
  ${NAME} import-paths ~/paths.toml

ENVIRONMENT
  DIRHOP_CONFIG_PATH         Override the config file location
  DIRHOP_DEBUG=1             Enable debug logging
  NO_COLOR                   Disable colored output
`)
}
