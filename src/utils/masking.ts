/**
 * Credential masking for CLI output, persisted error messages and pino redaction.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Patterns that identify credential values inside free text.
 */
export const API_KEY_PATTERNS: RegExp[] = [
  // sk-... style provider keys
  /sk-[A-Za-z0-9_-]{20,}/g,
  // Google style keys: AIza...
  /AIza[A-Za-z0-9_-]{35,}/g,
  // Bearer tokens in echoed headers
  /Bearer\s+[A-Za-z0-9._~+/-]{16,}=*/g,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
  // Generic long base64-looking tokens (32+ chars, no spaces)
  /[A-Za-z0-9+/]{32,}={0,2}/g,
]

/**
 * Pino redaction paths for credential fields.
 *
 * @example
 * const logger = pino({ redact: PINO_REDACT_PATHS })
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'inference.api_key',
  'env.ANALYST_API_KEY',
  'env.OPENAI_API_KEY',
  'env.ANTHROPIC_API_KEY',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known credential patterns in a string with `***`.
 * Best-effort: unknown formats pass through.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

const CREDENTIAL_FIELDS = new Set([
  'api_key',
  'apiKey',
  'token',
  'secret',
  'password',
])

/** Environment-style names such as `ANALYST_API_KEY` or `HF_TOKEN` */
const CREDENTIAL_ENV_NAME = /(^|_)(API_KEY|TOKEN|SECRET|PASSWORD)$/i

export function isCredentialKey(key: string): boolean {
  return CREDENTIAL_FIELDS.has(key) || CREDENTIAL_ENV_NAME.test(key)
}

/**
 * Deep-clone a plain-object tree replacing credential fields with `***`.
 * Primitives are returned as-is.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = isCredentialKey(k) ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}
