// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from './errors/illegal-argument-error.js';

export enum DryRunStrategy {
  /** submit and persist the object */
  NONE = 'none',
  /** only print the object that would be sent, without sending it */
  CLIENT = 'client',
  /** submit with server-side dry-run, nothing is persisted */
  SERVER = 'server',
}

export function toDryRunStrategy(value: string | undefined): DryRunStrategy {
  switch (value ?? DryRunStrategy.NONE) {
    case DryRunStrategy.NONE: {
      return DryRunStrategy.NONE;
    }
    case DryRunStrategy.CLIENT: {
      return DryRunStrategy.CLIENT;
    }
    case DryRunStrategy.SERVER: {
      return DryRunStrategy.SERVER;
    }
    default: {
      throw new IllegalArgumentError(
        `Invalid dry-run value (${value}). Must be "none", "server", or "client".`,
        value,
      );
    }
  }
}
