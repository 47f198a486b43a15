// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

export enum OutputFormat {
  NAME = 'name',
  JSON = 'json',
  YAML = 'yaml',
}

export function toOutputFormat(value: string | undefined): OutputFormat {
  const format = Object.values(OutputFormat).find(f => f === (value || OutputFormat.NAME));
  if (!format) {
    throw new IllegalArgumentError(
      `unable to match a printer suitable for the output format "${value}", allowed formats are: ${Object.values(OutputFormat).join(',')}`,
      value,
    );
  }
  return format;
}
