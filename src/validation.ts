/**
 * Input validation and sanitization for repository URLs and captured output
 */

import { getErrorMessage } from './types/errors.js';

/**
 * Validate a repository URL. Only http(s) is accepted by default since
 * scan requests come from untrusted callers.
 */
export function validateRepoUrl(url: string, allowedProtocols: string[] = ['http', 'https']): { valid: boolean; error?: string; sanitized?: string } {
  if (!url || typeof url !== 'string') {
    return { valid: false, error: 'URL must be a non-empty string' };
  }

  try {
    const parsed = new URL(url);

    if (!allowedProtocols.includes(parsed.protocol.replace(':', ''))) {
      return { valid: false, error: `Protocol ${parsed.protocol} not allowed` };
    }

    // Check for localhost/private IPs in production (potential SSRF)
    const hostname = parsed.hostname.toLowerCase();
    const privatePatterns = [
      /^localhost$/i,
      /^127\.\d+\.\d+\.\d+$/,
      /^10\.\d+\.\d+\.\d+$/,
      /^172\.(1[6-9]|2\d|3[01])\.\d+\.\d+$/,
      /^192\.168\.\d+\.\d+$/,
      /^\[?::1\]?$/,
      /^\[?fe80:/i,
    ];

    const isPrivate = privatePatterns.some(pattern => pattern.test(hostname));
    if (isPrivate && process.env.NODE_ENV === 'production') {
      return { valid: false, error: 'Private/localhost URLs not allowed in production' };
    }

    return { valid: true, sanitized: parsed.toString() };
  } catch (err) {
    return { valid: false, error: `Invalid URL: ${getErrorMessage(err)}` };
  }
}

/**
 * Sanitize string for safe logging (remove control characters, limit length)
 */
export function sanitizeForLog(input: string, maxLength: number = 1000): string {
  // Remove control characters except newline and tab
  let sanitized = input.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');

  if (sanitized.length > maxLength) {
    sanitized = sanitized.slice(0, maxLength) + '... (truncated)';
  }

  return sanitized;
}

/**
 * Validate integer within range
 */
export function validateInteger(value: unknown, min?: number, max?: number, name: string = 'value'): { valid: boolean; error?: string; value?: number } {
  const num = Number(value);

  if (!Number.isInteger(num)) {
    return { valid: false, error: `${name} must be an integer` };
  }

  if (min !== undefined && num < min) {
    return { valid: false, error: `${name} must be >= ${min}` };
  }

  if (max !== undefined && num > max) {
    return { valid: false, error: `${name} must be <= ${max}` };
  }

  return { valid: true, value: num };
}
