/**
 * Log redaction and argument validation helpers.
 *
 * Preview image URLs scraped from pages frequently carry signed query
 * parameters (storage SAS signatures, CDN tokens), so anything written to the
 * log goes through redactForLogging first.
 */

import { z } from 'zod';

/** Patterns to redact in log output */
const SENSITIVE_LOG_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Signed URL parameters
  { pattern: /([?&])sig=[^&\s"']+/gi, replacement: '$1sig=[REDACTED]' },
  { pattern: /([?&])X-Amz-Signature=[^&\s"']+/gi, replacement: '$1X-Amz-Signature=[REDACTED]' },
  // Tokens and keys
  { pattern: /bearer\s+[a-zA-Z0-9._-]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /token[=:]\s*[a-zA-Z0-9._-]+/gi, replacement: 'token=[REDACTED]' },
  { pattern: /api[_-]?key[=:]\s*[a-zA-Z0-9._-]+/gi, replacement: 'apiKey=[REDACTED]' },
  { pattern: /password[=:]\s*[^\s,}\]]+/gi, replacement: 'password=[REDACTED]' },
  { pattern: /secret[=:]\s*[^\s,}\]]+/gi, replacement: 'secret=[REDACTED]' },
  { pattern: /eyJ[a-zA-Z0-9_-]{20,}\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]*/g, replacement: '[JWT_REDACTED]' },
];

/**
 * Redact credentials and URL signatures from data about to be logged.
 * Errors are rendered from their stack; other non-string values are
 * JSON-serialized, pretty printed when `indent` is given.
 * @returns Sanitized string safe for logging
 */
export function redactForLogging(data: unknown, indent?: number): string {
  let text: string;

  if (typeof data === 'string') {
    text = data;
  } else if (data instanceof Error) {
    text = data.stack ?? `${data.name}: ${data.message}`;
  } else {
    try {
      text = JSON.stringify(data, null, indent) ?? String(data);
    } catch {
      text = String(data);
    }
  }

  return SENSITIVE_LOG_PATTERNS.reduce((result, { pattern, replacement }) => result.replace(pattern, replacement), text);
}

/**
 * Validate raw arguments against a schema
 * @throws Error listing every failing path if validation fails
 */
export function validateArgs<T>(args: Record<string, unknown> | undefined, schema: z.ZodSchema<T>): T {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid arguments: ${errors}`);
  }
  return result.data;
}
