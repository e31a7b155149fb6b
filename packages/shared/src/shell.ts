/**
 * Structured construction of remote shell commands.
 *
 * Remote commands travel as a single string over SSH, so every interpolated
 * value (domains, paths, service names) goes through `shellQuote`. Operators
 * such as `&&` or `|` are only ever produced by the helpers below, never by
 * concatenating caller input.
 */

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/

/**
 * Quote a single argument for a POSIX shell.
 *
 * Safe words pass through untouched; everything else is wrapped in single
 * quotes with embedded quotes rewritten as `'\''`.
 *
 * @example
 * shellQuote("/opt/stackship") // /opt/stackship
 * shellQuote("it's") // 'it'\''s'
 * shellQuote("") // ''
 */
export function shellQuote(value: string): string {
  if (value === "") return "''"
  if (SAFE_WORD.test(value)) return value
  return `'${value.replace(/'/g, "'\\''")}'`
}

/** Program plus arguments, each argument quoted */
export function shellCommand(program: string, ...args: string[]): string {
  return [program, ...args].map(shellQuote).join(" ")
}

/** Run `command` with `dir` as working directory */
export function inDirectory(dir: string, command: string): string {
  return `cd ${shellQuote(dir)} && ${command}`
}

/** Pipe `source` into `sink` */
export function pipe(source: string, sink: string): string {
  return `${source} | ${sink}`
}

/** Silence stdout and stderr of a command */
export function quiet(command: string): string {
  return `${command} >/dev/null 2>&1`
}
