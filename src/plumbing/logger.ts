import info from '../../package.json' with { type: 'json' }

const { name, version } = info

type LogValue = string | number | boolean | object

export type LogRecord = { message: string; [key: string]: LogValue }

const REDACTED = '[redacted]'
const SENSITIVE_KEY = /token|secret|password|verifier/i

const redact = ({ message, ...fields }: LogRecord): LogRecord => ({
  message,
  ...Object.fromEntries(
    Object.entries(fields).map(([key, value]) => [
      key,
      SENSITIVE_KEY.test(key) ? REDACTED : value,
    ]),
  ),
})

/**
 * Structured log line tagged with the package name and version. Fields whose
 * key looks like a credential are masked.
 */
export const log = (message: string | LogRecord) => {
  const fields = typeof message === 'string' ? { message } : redact(message)
  console.log({ ...fields, app: name, version })
}
