import { NAME } from '../constants.js'
import { error, output, EXIT_SUCCESS, EXIT_USAGE, type OutputOptions } from '../core.js'
import { shellEscape } from '../helpers.js'

/**
 * Shell functions wiring dirhop into an interactive shell:
 * `cd` records every visit, `p <name>` bookmarks the cwd and `c` jumps,
 * through the picker without arguments or a shortcut with one.
 */
export function shellInitScript(bin: string): string {
  return `DIRHOP_BIN=${shellEscape(bin)}

dirhop_cd() {
  if [ $# -eq 0 ]; then
    builtin cd "$HOME" || return
  else
    builtin cd "$@" || return
  fi
  "$DIRHOP_BIN" add-path "$PWD"
}
alias cd=dirhop_cd

p() {
  if [ $# -eq 0 ]; then
    echo "usage: p <name> [description]" >&2
    return 2
  fi
  "$DIRHOP_BIN" add-shortcut "$1" "$PWD" "\${@:2}"
}

c() {
  local target
  if [ $# -eq 0 ]; then
    local tmp
    tmp="$(mktemp)" || return
    "$DIRHOP_BIN" pick "$tmp"
    target="$(cat "$tmp")"
    rm -f "$tmp"
  else
    target="$("$DIRHOP_BIN" print-shortcut "$1")"
  fi
  [ -n "$target" ] && dirhop_cd "$target"
}
`
}

export async function cmdShellInit(args: string[], opts: OutputOptions): Promise<number> {
  let bin = NAME

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--bin' && args[i + 1]) {
      const nextArg = args[++i]
      if (nextArg !== undefined) {
        bin = nextArg
      }
    } else {
      error('Usage: dirhop shell-init [--bin <path>]', opts)
      return EXIT_USAGE
    }
  }

  output(opts.json ? { script: shellInitScript(bin) } : shellInitScript(bin), opts)
  return EXIT_SUCCESS
}
