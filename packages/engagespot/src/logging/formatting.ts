/**
 * Log Formatting
 *
 * Log formatters and secret redaction utilities
 */

import * as winston from 'winston';

// Key-based matching; covers the X-ENGAGESPOT-API-KEY / -SECRET headers.
const SECRET_PATTERNS = [/authorization/i, /api[-_]?key/i, /api[-_]?secret/i, /secret/i, /token/i, /password/i];

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

/**
 * Mask an email address preserving first 2 chars + domain hint
 * example@domain.com -> ex***@d***.com
 */
export function maskEmail(email: string): string {
  const atIndex = email.indexOf('@');
  if (atIndex < 1) return '[EMAIL]';

  const local = email.substring(0, atIndex);
  const domain = email.substring(atIndex + 1);
  const domainParts = domain.split('.');

  const maskedLocal = local.length > 2 ? local.substring(0, 2) + '***' : local.charAt(0) + '***';
  const maskedDomain =
    domainParts.length > 1
      ? domain.charAt(0) + '***.' + domainParts[domainParts.length - 1]
      : domain.charAt(0) + '***';

  return `${maskedLocal}@${maskedDomain}`;
}

/**
 * Mask every email address found in a string (recipients, /users/{email} paths)
 */
export function maskEmailsInString(value: string): string {
  return value.replace(EMAIL_PATTERN, match => maskEmail(match));
}

/**
 * Redacts values whose key looks like a credential
 */
export function maskSecrets(obj: unknown, maxDepth = 3): unknown {
  if (maxDepth <= 0 || obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => maskSecrets(item, maxDepth - 1));
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_PATTERNS.some(pattern => pattern.test(key))) {
      masked[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null) {
      masked[key] = maskSecrets(value, maxDepth - 1);
    } else if (typeof value === 'string') {
      masked[key] = maskEmailsInString(value);
    } else {
      masked[key] = value;
    }
  }

  return masked;
}

/**
 * Safe JSON stringification with size limits
 */
export function safeStringify(obj: unknown, maxSize = 10000): string {
  try {
    const str = JSON.stringify(maskSecrets(obj));
    return str.length > maxSize ? str.substring(0, maxSize) + '...[TRUNCATED]' : str;
  } catch {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

/**
 * Development console format
 */
export function createDevFormat(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, module: moduleCtx, ...meta }) => {
      const moduleInfo = moduleCtx ? ` ${String(moduleCtx)}` : '';
      const serviceInfo = service ? `[${String(service)}]` : '';
      const metaStr = Object.keys(meta).length > 0 ? ` ${safeStringify(meta, 1000)}` : '';

      return `${String(timestamp)} ${level}${serviceInfo}${moduleInfo}: ${String(message)}${metaStr}`;
    })
  );
}

/**
 * Production JSON format
 */
export function createProdFormat(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => safeStringify(info, 50000))
  );
}
