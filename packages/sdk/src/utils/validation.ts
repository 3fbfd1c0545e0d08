export interface ValidationResult {
  valid: boolean;
  error?: string;
  warnings?: string[];
}

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/**
 * Whether `value` is an RFC 4122 UUID of any version. Resource arguments
 * that are not UUIDs are looked up by name.
 */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * Validate a wait budget in seconds
 */
export function validateWaitTimeout(seconds: number): ValidationResult {
  if (!Number.isInteger(seconds)) {
    return {
      valid: false,
      error: `Timeout must be an integer number of seconds, got ${seconds}`,
    };
  }

  if (seconds <= 0) {
    return {
      valid: false,
      error: `Timeout must be positive, got ${seconds}`,
    };
  }

  const warnings: string[] = [];
  if (seconds > 24 * 3600) {
    warnings.push(`Timeout of ${seconds}s exceeds one day`);
  }

  return warnings.length > 0 ? { valid: true, warnings } : { valid: true };
}

/**
 * Validate a resource name or id given on the command line
 */
export function validateResourceRef(ref: string): ValidationResult {
  if (ref.trim().length === 0) {
    return { valid: false, error: "Resource name or id must not be empty" };
  }

  if (ref.includes("/")) {
    return {
      valid: false,
      error: `Resource name or id must not contain '/': ${ref}`,
    };
  }

  return { valid: true };
}
