/**
 * Command-line arguments
 *
 * Flags are mapped onto their TANDEM_* variables so they go through the
 * same validation as the environment.
 */

const FLAGS: Record<string, string> = {
  '--host': 'TANDEM_HOST',
  '--port': 'TANDEM_PORT',
  '--queue-depth': 'TANDEM_CHAT_QUEUE_DEPTH',
  '--payment-timeout': 'TANDEM_PAYMENT_TIMEOUT_MS',
  '--shutdown-grace': 'TANDEM_SHUTDOWN_GRACE_MS',
}

const SHORT: Record<string, string> = {
  '-H': '--host',
  '-p': '--port',
}

export interface CliArgs {
  help: boolean
  /** Environment overrides taken from flags */
  env: Record<string, string>
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

/**
 * Parse argv (without node and script) into environment overrides
 *
 * Accepts `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = { help: false, env: {} }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? ''
    if (arg === '--help' || arg === '-h') {
      result.help = true
      continue
    }

    const eq = arg.indexOf('=')
    const rawName = eq === -1 ? arg : arg.slice(0, eq)
    const name = SHORT[rawName] ?? rawName
    const variable = FLAGS[name]
    if (!variable) {
      throw new CliUsageError(`Unknown option: ${rawName}`)
    }

    const value = eq === -1 ? argv[++i] : arg.slice(eq + 1)
    if (value === undefined || value === '' || (eq === -1 && value.startsWith('-'))) {
      throw new CliUsageError(`Option ${name} requires a value`)
    }
    result.env[variable] = value
  }

  return result
}

export const USAGE = `
Usage: tandem [options]

Options:
  -H, --host <host>              Listen host (TANDEM_HOST, default 0.0.0.0)
  -p, --port <port>              Listen port, 0 for ephemeral (TANDEM_PORT, default 50051)
  --queue-depth <n>              Chat outbound queue per session (TANDEM_CHAT_QUEUE_DEPTH, default 32)
  --payment-timeout <ms>         Payment processing deadline (TANDEM_PAYMENT_TIMEOUT_MS, default 5000)
  --shutdown-grace <ms>          Drain window on shutdown (TANDEM_SHUTDOWN_GRACE_MS, default 5000)
  -h, --help                     Show this help message

TLS is enabled by TANDEM_TLS_KEY_PATH and TANDEM_TLS_CERT_PATH.
`
