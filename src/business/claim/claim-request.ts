// SPDX-License-Identifier: Apache-2.0

/**
 * The claim options exactly as the user supplied them.
 */
export interface ClaimRequest {
  readonly name: string;
  readonly namespace?: string;
  /** raw quantity literal, required */
  readonly storageRequest: string;
  readonly storageLimit?: string;
  /** comma separated access modes */
  readonly accessModes?: string;
  readonly storageClassName?: string;
}
