/**
 * Environment Variable Sanitization Module
 *
 * Keeps AWS credentials (access keys, secret keys, session tokens) and
 * request signatures out of the debug log.
 *
 * Usage:
 *   import { sanitizeEnv, sanitizeText } from './env-sanitizer'
 *
 *   debugLog(`Environment: ${JSON.stringify(sanitizeEnv(process.env))}`)
 *   debugLog(sanitizeText(String(error)))
 */

type SensitivePattern = string | RegExp

const SENSITIVE_PATTERNS: SensitivePattern[] = [
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'AWS_SESSION_TOKEN',
  /SECRET/i,
  /TOKEN/i,
  /PASSWORD/i,
  /PRIVATE/i,
  /AUTH/i,
  /CREDENTIAL/i,
  /_KEY(_ID)?$/i
]

/**
 * Check if an environment variable key should be considered sensitive
 */
export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_PATTERNS.some(pattern => {
    if (typeof pattern === 'string') {
      return key === pattern
    }
    return pattern.test(key)
  })
}

/**
 * Sanitize environment variables by redacting sensitive keys
 *
 * @param env - Environment object to sanitize (default: process.env)
 * @returns New object with sensitive values redacted
 *
 * @example
 * sanitizeEnv({ AWS_SECRET_ACCESS_KEY: 'test-secret', AWS_REGION: 'eu-west-1' })
 * // { AWS_SECRET_ACCESS_KEY: '[REDACTED]', AWS_REGION: 'eu-west-1' }
 */
export function sanitizeEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const sanitized: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (isSensitiveKey(key)) {
      sanitized[key] = '[REDACTED]'
    } else {
      sanitized[key] = value || ''
    }
  }

  return sanitized
}

/**
 * Only the variables that configure this tool or the AWS SDK
 */
export function relevantEnv(env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const relevant: NodeJS.ProcessEnv = {}
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('AWS_') || key.startsWith('BUCKETWALK_')) {
      relevant[key] = value
    }
  }
  return relevant
}

/**
 * Sanitize an error message or any string that might contain sensitive data
 *
 * @param text - Text to sanitize
 * @returns Text with potential secrets redacted
 *
 * @example
 * sanitizeText('GET /a.txt?X-Amz-Signature=abc123&x=1')
 * // 'GET /a.txt?X-Amz-Signature=[REDACTED]&x=1'
 */
export function sanitizeText(text: string): string {
  if (!text || typeof text !== 'string') {
    return String(text)
  }

  return text
    // Access key ids (long-term and temporary)
    .replace(/\b(?:AKIA|ASIA|AROA|AIDA)[A-Z0-9]{16}\b/g, '[REDACTED]')
    // Presigned URL and Authorization header parts
    .replace(/\b(X-Amz-Signature|X-Amz-Credential|X-Amz-Security-Token|Signature|Credential)=[^\s,&"]+/gi, '$1=[REDACTED]')
    // Bearer tokens
    .replace(/Bearer\s+[a-zA-Z0-9._~+/=-]+/gi, 'Bearer [REDACTED]')
    // Credentials file and env style assignments
    .replace(
      /\b(aws_secret_access_key|aws_session_token|aws_access_key_id|SecretAccessKey|SessionToken|SECRET|PASSWORD|PRIVATE_KEY)(["']?\s*[=:]\s*["']?)[^\s,"']+/gi,
      '$1$2[REDACTED]'
    )
}
