// SPDX-License-Identifier: Apache-2.0

export enum ResourceType {
  PERSISTENT_VOLUME_CLAIM = 'PersistentVolumeClaim',
}
