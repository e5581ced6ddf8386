/**
 * Shopping Errors
 *
 * Fatal conditions of list generation and checklist updates, with a typed
 * code and a message safe to show to the caller. Non-fatal conditions
 * (unit family conflicts, unresolved prices) are never thrown; they travel
 * inside the returned list or estimate.
 */

export type ShoppingErrorCode =
  | 'INVALID_MULTIPLIER'
  | 'INCOMPATIBLE_UNITS'
  | 'UNKNOWN_INGREDIENT'
  | 'UNKNOWN_RECIPE'
  | 'LINE_NOT_FOUND'
  | 'LIST_NOT_FOUND'
  | 'VALIDATION_ERROR'

export class ShoppingError extends Error {
  public readonly code: ShoppingErrorCode
  public readonly details?: Record<string, unknown>

  constructor(
    code: ShoppingErrorCode,
    message: string,
    causeOrDetails?: unknown,
  ) {
    super(message)
    this.name = 'ShoppingError'
    this.code = code

    if (causeOrDetails instanceof Error) {
      this.cause = causeOrDetails
    } else if (
      causeOrDetails &&
      typeof causeOrDetails === 'object' &&
      !Array.isArray(causeOrDetails)
    ) {
      this.details = { ...causeOrDetails }
    } else if (causeOrDetails !== undefined) {
      this.cause = new Error(String(causeOrDetails))
    }
  }

  toJSON(): { code: ShoppingErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

export function isShoppingError(err: unknown, code?: ShoppingErrorCode): err is ShoppingError {
  return err instanceof ShoppingError && (code === undefined || err.code === code)
}
