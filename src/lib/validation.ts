/**
 * src/lib/validation.ts
 * WHAT: Input validation helpers for timer submissions.
 * WHY: Reject malformed ids and event kinds before they reach the database.
 * FLOWS:
 *  - validateSnowflake(id) → throws if invalid Discord snowflake
 *  - validateNonEmpty(value, fieldName) → throws if empty/whitespace-only string
 *  - validateEpochSeconds(value, fieldName) → throws unless a non-negative integer
 * DOCS:
 *  - Discord snowflakes: https://discord.com/developers/docs/reference#snowflakes
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Snowflakes are 17-20 digit numeric strings. They exceed Number.MAX_SAFE_INTEGER,
 * which is why every id column is TEXT.
 */
const SNOWFLAKE_PATTERN = /^\d{17,20}$/;

/**
 * ValidationError
 * WHAT: Custom error class for validation failures.
 * WHY: Allows callers to distinguish bad input from store failures.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * @throws ValidationError if the ID is not a valid snowflake
 * @example
 * validateSnowflake("123456789012345678"); // OK
 * validateSnowflake("invalid", "guildId"); // throws
 */
export function validateSnowflake(id: string, fieldName = "id"): void {
  if (typeof id !== "string" || id.trim().length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`, fieldName);
  }

  if (!SNOWFLAKE_PATTERN.test(id)) {
    throw new ValidationError(
      `${fieldName} must be a valid Discord snowflake (17-20 digits), got: "${id}"`,
      fieldName
    );
  }
}

/**
 * @throws ValidationError if the value is empty or whitespace-only
 */
export function validateNonEmpty(value: string, fieldName: string): void {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`, fieldName);
  }
}

/**
 * Timer instants are whole Unix seconds. Fractions and NaN would silently
 * break the (expires_at, id) ordering.
 */
export function validateEpochSeconds(value: number, fieldName: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${fieldName} must be a non-negative integer of Unix seconds`, fieldName);
  }
}
