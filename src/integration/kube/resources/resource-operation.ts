// SPDX-License-Identifier: Apache-2.0

export enum ResourceOperation {
  CREATE = 'create',
}
