// SPDX-License-Identifier: Apache-2.0

/**
 * How the claimed volume may be mounted.
 */
export enum AccessMode {
  READ_ONLY_MANY = 'ReadOnlyMany',
  READ_WRITE_MANY = 'ReadWriteMany',
  READ_WRITE_ONCE = 'ReadWriteOnce',
}

export const ACCESS_MODES: readonly AccessMode[] = Object.values(AccessMode);

export const ACCESS_MODE_SEPARATOR = ',';

export function isAccessMode(value: string): value is AccessMode {
  return ACCESS_MODES.some(mode => mode === value);
}

/**
 * Splits the comma separated access modes flag value. Tokens are returned verbatim and in order.
 */
export function splitAccessModes(accessModes: string): string[] {
  return accessModes.split(ACCESS_MODE_SEPARATOR);
}
