import parseSpdx from 'spdx-expression-parse';
import { errorMessage } from '../core/errors';

/**
 * Check an SPDX license expression against the SPDX license list.
 * Returns the parser's complaint, or undefined when the expression is valid.
 */
export function licenseError(value: string): string | undefined {
  try {
    parseSpdx(value);
    return undefined;
  } catch (error) {
    return errorMessage(error);
  }
}

export function isLicenseExpression(value: string): boolean {
  return licenseError(value) === undefined;
}
