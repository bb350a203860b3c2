import { ValidationError } from './errors';

const IDENTIFIER_PATTERN = /^[A-Za-z0-9_-]{3,80}$/;

export const IDENTIFIER_RULES =
  'identifier should be between 3 and 80 characters in length, and can only contain ' +
  'alphanumeric characters, underscores ( _ ), or dashes ( - )';

export function isValidIdentifier(identifier: string): boolean {
  return IDENTIFIER_PATTERN.test(identifier);
}

export function validateIdentifier(identifier: string): string {
  if (!isValidIdentifier(identifier)) {
    throw new ValidationError(`Invalid identifier "${identifier}": ${IDENTIFIER_RULES}`);
  }
  return identifier;
}
