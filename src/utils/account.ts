import { ValidationError } from '../errors.js';

const MIN_ACCOUNT_ID_LENGTH = 2;
const MAX_ACCOUNT_ID_LENGTH = 64;

// Named (alice.near, sub.alice.near) and implicit (64 hex chars) account ids
const ACCOUNT_ID_PATTERN = /^(([a-z\d]+[-_])*[a-z\d]+\.)*([a-z\d]+[-_])*[a-z\d]+$/;

/**
 * Normalize a NEAR account id (trim, lowercase)
 */
export function normalizeAccountId(accountId: string): string {
  return accountId.trim().toLowerCase();
}

/**
 * Check whether a normalized string is a syntactically valid NEAR account id
 */
export function isValidAccountId(accountId: string): boolean {
  return (
    accountId.length >= MIN_ACCOUNT_ID_LENGTH &&
    accountId.length <= MAX_ACCOUNT_ID_LENGTH &&
    ACCOUNT_ID_PATTERN.test(accountId)
  );
}

/**
 * Normalize and validate user input, throwing ValidationError on bad ids
 */
export function parseAccountId(input: string): string {
  const accountId = normalizeAccountId(input);
  if (!isValidAccountId(accountId)) {
    throw new ValidationError(`Invalid account ID: ${input.trim()}`);
  }
  return accountId;
}
