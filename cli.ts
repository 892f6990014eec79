#!/usr/bin/env node
/**
 * CLI for dirhop.
 *
 * @example
 * ```sh
 * # Install the shell functions
 * eval "$(dirhop shell-init)"
 *
 * # Where did I go after this directory last time?
 * dirhop suggest
 *
 * # Search visited directories
 * dirhop paths proj --fuzzy
 * ```
 */

import { main } from './src/cli/main.js'

main().then(code => process.exit(code))
