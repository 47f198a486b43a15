// SPDX-License-Identifier: Apache-2.0

import {type V1PersistentVolumeClaim} from '@kubernetes/client-node';

/**
 * Records the submitted configuration on the object itself so that a later declarative apply can compute a
 * three-way diff.
 */
export class LastAppliedAnnotation {
  public static readonly KEY = 'kubectl.kubernetes.io/last-applied-configuration';

  private constructor() {
    throw new Error('Cannot instantiate utility class');
  }

  /**
   * Returns a copy of the manifest carrying the annotation. The annotation value is the JSON of the manifest
   * without the annotation itself.
   */
  public static apply(manifest: V1PersistentVolumeClaim): V1PersistentVolumeClaim {
    const withoutAnnotation = LastAppliedAnnotation.strip(manifest);
    const configuration = `${JSON.stringify(withoutAnnotation)}\n`;

    return {
      ...withoutAnnotation,
      metadata: {
        ...withoutAnnotation.metadata,
        annotations: {...withoutAnnotation.metadata?.annotations, [LastAppliedAnnotation.KEY]: configuration},
      },
    };
  }

  private static strip(manifest: V1PersistentVolumeClaim): V1PersistentVolumeClaim {
    const copy: V1PersistentVolumeClaim = structuredClone(manifest);
    const annotations = copy.metadata?.annotations;
    if (copy.metadata && annotations) {
      delete annotations[LastAppliedAnnotation.KEY];
      if (Object.keys(annotations).length === 0) {
        delete copy.metadata.annotations;
      }
    }
    return copy;
  }
}
