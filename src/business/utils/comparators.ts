// SPDX-License-Identifier: Apache-2.0

export type Comparison = -1 | 0 | 1;

export class Comparators {
  private constructor() {
    // Utility class
    throw new Error('Cannot instantiate utility class');
  }

  public static readonly bigint = (l: bigint, r: bigint): Comparison => {
    if (l < r) {
      return -1;
    } else if (l > r) {
      return 1;
    }

    return 0;
  };
}
