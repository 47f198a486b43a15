// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';
import * as constants from '../core/constants.js';
import {type CommandFlag} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/aliases.js';
import {DryRunStrategy} from '../core/dry-run-strategy.js';
import {OutputFormat} from '../core/output/output-format.js';
import {FieldValidation} from '../core/validation-directive.js';
import {ACCESS_MODES} from '../business/claim/access-mode.js';

export class Flags {
  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   *
   */
  public static setRequiredCommandFlags(y: Argv, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      const {describe, alias, type} = flag.definition;
      y.option(flag.name, {describe, alias, type, demandOption: true});
    }
  }

  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   *
   */
  public static setOptionalCommandFlags(y: Argv, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      const {describe, alias, type} = flag.definition;
      const defaultValue = flag.definition.defaultValue === '' ? undefined : flag.definition.defaultValue;
      y.option(flag.name, {describe, alias, type, default: defaultValue});
    }
  }

  public static readonly devMode: CommandFlag = {
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly quiet: CommandFlag = {
    name: 'quiet-mode',
    definition: {
      describe: 'Quiet mode, do not render task progress',
      defaultValue: false,
      alias: 'q',
      type: 'boolean',
    },
  };

  public static readonly namespace: CommandFlag = {
    name: 'namespace',
    definition: {
      describe: 'Namespace to create the persistent volume claim in, defaults to the namespace of the kube context',
      alias: 'n',
      type: 'string',
    },
  };

  public static readonly context: CommandFlag = {
    name: 'context',
    definition: {
      describe: 'The Kubernetes context name to be used, defaults to the current context of the kubeconfig',
      type: 'string',
    },
  };

  public static readonly storageRequest: CommandFlag = {
    name: 'storage-request',
    definition: {
      describe: 'Storage request of the persistent volume claim, as a resource quantity such as 1Gi',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly storageLimit: CommandFlag = {
    name: 'storage-limit',
    definition: {
      describe: 'Storage limit of the persistent volume claim, must be greater than the storage request',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly accessModes: CommandFlag = {
    name: 'access-modes',
    definition: {
      describe: `Comma separated access modes of the persistent volume claim, one of: ${ACCESS_MODES.join(', ')}`,
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly storageClassName: CommandFlag = {
    name: 'storage-class-name',
    definition: {
      describe: 'Name of the storage class requested by the persistent volume claim',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly dryRun: CommandFlag = {
    name: 'dry-run',
    definition: {
      describe:
        `Must be "${DryRunStrategy.NONE}", "${DryRunStrategy.SERVER}", or "${DryRunStrategy.CLIENT}". ` +
        'If client strategy, only print the object that would be sent, without sending it. ' +
        'If server strategy, submit server-side request without persisting the resource.',
      defaultValue: DryRunStrategy.NONE,
      type: 'string',
    },
  };

  public static readonly output: CommandFlag = {
    name: 'output',
    definition: {
      describe: `Output format. One of: ${Object.values(OutputFormat).join(', ')}`,
      defaultValue: OutputFormat.NAME,
      alias: 'o',
      type: 'string',
    },
  };

  public static readonly saveConfig: CommandFlag = {
    name: 'save-config',
    definition: {
      describe:
        'If true, the configuration of current object will be saved in its annotation. ' +
        'Otherwise, the annotation will be unchanged.',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly fieldManager: CommandFlag = {
    name: 'field-manager',
    definition: {
      describe: 'Name of the manager used to track field ownership',
      defaultValue: constants.DEFAULT_FIELD_MANAGER,
      type: 'string',
    },
  };

  public static readonly validate: CommandFlag = {
    name: 'validate',
    definition: {
      describe:
        `Must be one of: strict (or true), warn, ignore (or false). "true" or "strict" will use the server's ` +
        `field validation (${FieldValidation.STRICT}), "warn" will only warn about unknown or duplicate fields, ` +
        '"false" or "ignore" will not perform any schema validation.',
      defaultValue: 'strict',
      type: 'string',
    },
  };

  public static readonly allFlags: CommandFlag[] = [
    Flags.accessModes,
    Flags.context,
    Flags.devMode,
    Flags.dryRun,
    Flags.fieldManager,
    Flags.namespace,
    Flags.output,
    Flags.quiet,
    Flags.saveConfig,
    Flags.storageClassName,
    Flags.storageLimit,
    Flags.storageRequest,
    Flags.validate,
  ];

  public static readonly allFlagsMap = new Map(Flags.allFlags.map(f => [f.name, f]));

  /**
   * Processes the Argv arguments and returns them as string, all with full flag names.
   * - removes flags that match the default value.
   * - removes flags with undefined and null values.
   * - removes boolean flags that are false.
   */
  public static stringifyArgv(argv: ArgvStruct): string {
    const processedFlags: string[] = [];

    for (const [name, value] of Object.entries(argv)) {
      // Remove non-flag data and boolean presence based flags that are false
      if (name === '_' || name === '$0' || value === '' || value === false || value === undefined || value === null) {
        continue;
      }

      // remove flags that use the default value
      const flag = Flags.allFlagsMap.get(name);
      if (!flag || (flag.definition.defaultValue && flag.definition.defaultValue === value)) {
        continue;
      }

      const flagName = flag.name;

      // if the flag is boolean based, render it without value
      if (value === true) {
        processedFlags.push(`--${flagName}`);
      }

      // else display the full flag data
      else {
        processedFlags.push(`--${flagName} ${String(value)}`);
      }
    }

    return processedFlags.join(' ');
  }
}
