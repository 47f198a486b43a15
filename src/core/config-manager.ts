// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {ClaimctlError} from './errors/claimctl-error.js';
import {type ClaimctlLogger} from './logging/claimctl-logger.js';
import {Flags as flags} from '../commands/flags.js';
import {type CommandFlag} from '../types/flag-types.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {NamespaceName} from '../integration/kube/resources/namespace/namespace-name.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type Optional} from '../types/index.js';
import {getClaimctlVersion} from '../../version.js';

export type FlagValue = string | boolean | NamespaceName;

export interface ClaimctlConfig {
  flags: Record<string, FlagValue>;
  version: string;
}

/**
 * ConfigManager holds the command flag values of the current invocation.
 *
 * Values passed on the command line win, otherwise the flag's default value is used.
 */
@injectable()
export class ConfigManager {
  public config: ClaimctlConfig;
  private readonly logger: ClaimctlLogger;

  public constructor(@inject(InjectTokens.ClaimctlLogger) logger?: ClaimctlLogger) {
    this.logger = patchInject(logger, InjectTokens.ClaimctlLogger, this.constructor.name);

    this.config = ConfigManager.emptyConfig();
  }

  private static emptyConfig(): ClaimctlConfig {
    return {
      flags: {},
      version: getClaimctlVersion(),
    };
  }

  /** Reset config */
  public reset(): void {
    this.config = ConfigManager.emptyConfig();
  }

  /**
   * Fill in the default value of every flag the user did not pass
   */
  public applyPrecedence(argv: ArgvStruct): ArgvStruct {
    for (const flag of flags.allFlags) {
      if (argv[flag.name] === undefined && flag.definition.defaultValue !== undefined) {
        argv[flag.name] = flag.definition.defaultValue;
      }
    }

    return argv;
  }

  /** Update the config using the argv */
  public update(argv: ArgvStruct): void {
    if (!argv || Object.keys(argv).length === 0) {
      return;
    }

    for (const flag of flags.allFlags) {
      const value = argv[flag.name];
      if (value === undefined) {
        continue;
      }

      switch (flag.definition.type) {
        case 'string': {
          // if it is a namespace flag then convert it to NamespaceName
          if (value && flag.name === flags.namespace.name) {
            this.config.flags[flag.name] = value instanceof NamespaceName ? value : NamespaceName.of(String(value));
            break;
          }
          this.config.flags[flag.name] = `${String(value)}`; // force convert to string
          break;
        }

        case 'boolean': {
          this.config.flags[flag.name] = value === true || value === 'true'; // use comparison to enforce boolean value
          break;
        }

        default: {
          throw new ClaimctlError(`Unsupported field type for flag '${flag.name}': ${String(flag.definition.type)}`);
        }
      }
    }

    const flagMessage = Object.entries(this.config.flags)
      .map(([key, value]) => `${key}=${value.toString()}`)
      .join(', ');

    if (flagMessage) {
      this.logger.debug(`Updated config with flags: ${flagMessage}`);
    }
  }

  /**
   * Return the value of the given flag
   * @returns value of the flag or undefined if flag value is not available
   */
  public getFlag(flag: CommandFlag): Optional<FlagValue> {
    return this.config.flags[flag.name];
  }

  /**
   * Return the value of a string flag, undefined when the flag holds no value
   * @throws ClaimctlError if the flag holds a value of another type
   */
  public getStringFlag(flag: CommandFlag): Optional<string> {
    const value = this.getFlag(flag);
    if (value === undefined || typeof value === 'string') {
      return value;
    }
    throw new ClaimctlError(`flag '${flag.name}' does not hold a string value`);
  }

  /** Return the value of a boolean flag, false when the flag holds no value */
  public getBooleanFlag(flag: CommandFlag): boolean {
    return this.getFlag(flag) === true;
  }

  /** Return the value of a namespace flag, undefined when the flag holds no value */
  public getNamespaceFlag(flag: CommandFlag): Optional<NamespaceName> {
    const value = this.getFlag(flag);
    return value instanceof NamespaceName ? value : undefined;
  }

  /** Get package version */
  public getVersion(): string {
    return this.config.version;
  }
}
