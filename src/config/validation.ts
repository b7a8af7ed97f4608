/**
 * Simplified Configuration Validation
 */

import type { ApplicationConfig } from './types';

interface ValidationResult {
  isValid: boolean;
  errors: Array<{ path: string; message: string }>;
  warnings: Array<{ path: string; message: string }>;
}

/**
 * Validate application configuration
 */
export function validateConfig(config: ApplicationConfig): ValidationResult {
  const errors: Array<{ path: string; message: string }> = [];
  const warnings: Array<{ path: string; message: string }> = [];
  const { timeouts, retry, logByteCeiling } = config.kubernetes;

  for (const [key, value] of Object.entries(timeouts)) {
    if (value <= 0) {
      errors.push({ path: `kubernetes.timeouts.${key}`, message: 'Must be greater than 0' });
    }
  }

  if (retry.maxAttempts < 1) {
    errors.push({ path: 'kubernetes.retry.maxAttempts', message: 'Must be at least 1' });
  }

  if (retry.maxAttempts > 20) {
    warnings.push({
      path: 'kubernetes.retry.maxAttempts',
      message: 'Large retry budgets delay failure reporting',
    });
  }

  if (retry.delayMs < 0) {
    errors.push({ path: 'kubernetes.retry.delayMs', message: 'Must be 0 or greater' });
  }

  if (retry.backoff < 1) {
    errors.push({ path: 'kubernetes.retry.backoff', message: 'Must be 1 or greater' });
  }

  if (logByteCeiling < 1) {
    errors.push({ path: 'kubernetes.logByteCeiling', message: 'Must be at least 1' });
  }

  if (config.kubernetes.namespace === '') {
    errors.push({ path: 'kubernetes.namespace', message: 'Must not be empty' });
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}
