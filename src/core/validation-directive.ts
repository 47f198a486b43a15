// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from './errors/illegal-argument-error.js';

/**
 * Field validation values understood by the API server.
 */
export enum FieldValidation {
  STRICT = 'Strict',
  WARN = 'Warn',
  IGNORE = 'Ignore',
}

/**
 * Maps the --validate flag value to a field validation directive.
 *
 * @throws IllegalArgumentError for values other than true, strict, warn, false or ignore
 */
export function toFieldValidation(value: string | boolean | undefined): FieldValidation {
  switch (`${value ?? 'strict'}`.toLowerCase()) {
    case 'true':
    case 'strict': {
      return FieldValidation.STRICT;
    }
    case 'warn': {
      return FieldValidation.WARN;
    }
    case 'false':
    case 'ignore': {
      return FieldValidation.IGNORE;
    }
    default: {
      throw new IllegalArgumentError(
        `invalid - validate option "${value}"; must be one of: strict (or true), warn, ignore (or false)`,
        value,
      );
    }
  }
}
