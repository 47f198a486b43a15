// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import * as yaml from 'yaml';
import {type V1PersistentVolumeClaim} from '@kubernetes/client-node';
import {OutputFormat} from './output-format.js';
import {DryRunStrategy} from '../dry-run-strategy.js';

/**
 * Renders a submitted (or dry-run) persistent volume claim for the user.
 */
@injectable()
export class ResourcePrinter {
  public static readonly RESOURCE = 'persistentvolumeclaim';

  /**
   * The verb printed by the name printer, decorated with the dry-run strategy.
   */
  public static operation(dryRunStrategy: DryRunStrategy): string {
    switch (dryRunStrategy) {
      case DryRunStrategy.CLIENT: {
        return 'created (dry run)';
      }
      case DryRunStrategy.SERVER: {
        return 'created (server dry run)';
      }
      default: {
        return 'created';
      }
    }
  }

  public print(manifest: V1PersistentVolumeClaim, format: OutputFormat, operation: string): string {
    switch (format) {
      case OutputFormat.JSON: {
        return JSON.stringify(manifest, null, 2);
      }
      case OutputFormat.YAML: {
        return yaml.stringify(manifest);
      }
      case OutputFormat.NAME: {
        return `${ResourcePrinter.RESOURCE}/${manifest.metadata?.name ?? ''} ${operation}`;
      }
    }
  }
}
