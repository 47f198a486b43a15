// SPDX-License-Identifier: Apache-2.0

import {
  type V1ObjectMeta,
  type V1PersistentVolumeClaim,
  type V1PersistentVolumeClaimSpec,
  type V1VolumeResourceRequirements,
} from '@kubernetes/client-node';
import {type Quantity} from '../quantity/quantity.js';

export interface StorageResources {
  readonly storage: Quantity;
}

export interface ClaimSpecProperties {
  readonly name: string;
  /** empty unless the namespace is enforced */
  readonly namespace: string;
  readonly requests: StorageResources;
  readonly limits?: StorageResources;
  readonly accessModes?: readonly string[];
  readonly storageClassName?: string;
}

/**
 * A fully constructed persistent volume claim. Instances are frozen and never change after the builder hands
 * them out.
 */
export class ClaimSpec implements ClaimSpecProperties {
  public static readonly API_VERSION = 'v1';
  public static readonly KIND = 'PersistentVolumeClaim';

  public readonly apiVersion = ClaimSpec.API_VERSION;
  public readonly kind = ClaimSpec.KIND;
  public readonly name: string;
  public readonly namespace: string;
  public readonly requests: StorageResources;
  public readonly limits?: StorageResources;
  public readonly accessModes?: readonly string[];
  public readonly storageClassName?: string;

  private constructor(properties: ClaimSpecProperties) {
    this.name = properties.name;
    this.namespace = properties.namespace;
    this.requests = Object.freeze({...properties.requests});
    if (properties.limits) {
      this.limits = Object.freeze({...properties.limits});
    }
    if (properties.accessModes) {
      this.accessModes = Object.freeze([...properties.accessModes]);
    }
    if (properties.storageClassName !== undefined) {
      this.storageClassName = properties.storageClassName;
    }
    Object.freeze(this);
  }

  public static of(properties: ClaimSpecProperties): ClaimSpec {
    return new ClaimSpec(properties);
  }

  /**
   * Renders the claim as an API object. Quantities are written in canonical form and unset optional fields are
   * left out entirely.
   */
  public toManifest(): V1PersistentVolumeClaim {
    const metadata: V1ObjectMeta = {name: this.name};
    if (this.namespace) {
      metadata.namespace = this.namespace;
    }

    const resources: V1VolumeResourceRequirements = {};
    if (this.limits) {
      resources.limits = {storage: this.limits.storage.toString()};
    }
    resources.requests = {storage: this.requests.storage.toString()};

    const spec: V1PersistentVolumeClaimSpec = {};
    if (this.accessModes) {
      spec.accessModes = [...this.accessModes];
    }
    spec.resources = resources;
    if (this.storageClassName !== undefined) {
      spec.storageClassName = this.storageClassName;
    }

    return {apiVersion: this.apiVersion, kind: this.kind, metadata, spec};
  }
}
