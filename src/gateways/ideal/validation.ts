/**
 * Request field validation
 *
 * Runs before anything is signed. Every failure is a ValidationError that
 * names the offending field.
 */

import { z } from 'zod';
import { PurchaseOptions, ValidationError } from '../types';

// Characters iDEAL acquirers reject, upper and lower case
const DIACRITICAL_CHARACTERS =
  /[ÀÁÂÃÄÅÇŒÈÉÊËÌÍÎÏÐÑÒÓÔÕÖ×ØÙÚÛÜÝàáâãäåçæèéêëìíîïñòóôõöøùúûüý]/;

export const MAX_LENGTHS = {
  amount: 12,
  orderId: 12,
  description: 32,
  entranceCode: 40,
} as const;

const requiredString = z.string({ invalid_type_error: 'must be a string' }).min(1, 'must not be empty');

export const purchaseOptionsSchema = z.object({
  issuerId: requiredString,
  expirationPeriod: requiredString,
  returnUrl: requiredString,
  orderId: requiredString,
  description: requiredString,
  entranceCode: requiredString,
});

export const statusOptionsSchema = z.object({
  transactionId: requiredString,
});

function isMissing(issue: z.ZodIssue): boolean {
  return issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined;
}

function issuePaths(issues: z.ZodIssue[]): string[] {
  return [...new Set(issues.map((issue) => issue.path.join('.')))];
}

/**
 * Parse options against a schema. Absent keys are reported together as
 * missing; present values of the wrong type or empty are reported as invalid.
 */
export function requireOptions<T extends z.ZodRawShape>(
  schema: z.ZodObject<T>,
  options: unknown
): z.infer<z.ZodObject<T>> {
  const result = schema.safeParse(options ?? {});

  if (result.success) {
    return result.data;
  }

  const issues = result.error.errors;
  const missing = issuePaths(issues.filter(isMissing));
  if (missing.length > 0) {
    throw new ValidationError(`Missing required options: ${missing.join(', ')}`, missing, 'required');
  }

  const details = issues.map((issue) => `${issue.path.join('.') || 'options'} ${issue.message}`);
  throw new ValidationError(`Invalid options: ${details.join(', ')}`, issuePaths(issues), 'format');
}

/**
 * Throw if the value exceeds `maxLength` characters or contains diacritics
 */
export function enforceMaximumLength(key: string, value: string, maxLength: number): void {
  if (value.length > maxLength) {
    throw new ValidationError(
      `The value for \`${key}' exceeds the limit of ${maxLength} characters.`,
      [key],
      'maxLength'
    );
  }
  if (DIACRITICAL_CHARACTERS.test(value)) {
    throw new ValidationError(
      `The value for \`${key}' contains diacritical characters \`${value}'.`,
      [key],
      'diacritics'
    );
  }
}

/**
 * Validate a purchase before it is turned into a transaction request
 */
export function validatePurchase(amount: number, options: unknown): PurchaseOptions {
  const purchase = requireOptions(purchaseOptionsSchema, options);

  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new ValidationError(
      `The value for \`amount' must be a whole, non-negative number of cents, got ${amount}.`,
      ['amount'],
      'format'
    );
  }

  enforceMaximumLength('amount', String(amount), MAX_LENGTHS.amount);
  enforceMaximumLength('orderId', purchase.orderId, MAX_LENGTHS.orderId);
  enforceMaximumLength('description', purchase.description, MAX_LENGTHS.description);
  enforceMaximumLength('entranceCode', purchase.entranceCode, MAX_LENGTHS.entranceCode);

  return purchase;
}
