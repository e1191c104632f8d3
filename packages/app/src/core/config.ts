import type { CliArgs } from "./cli.js"
import type { SeparatorMode } from "./parser.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: mode ∈ {"lenient","strict"}
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly mode?: SeparatorMode
  readonly banner?: boolean
}

export interface ResolvedConfig {
  readonly mode: SeparatorMode
  readonly banner: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export const DEFAULT_CONFIG_PATH = "./.json-descent.json"

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-descent.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  mode: cli.mode ?? fileConfig?.mode ?? "lenient",
  banner: cli.banner ?? fileConfig?.banner ?? true,
  silent: cli.silent,
  verbose: cli.verbose
})
