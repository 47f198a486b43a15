// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type ClaimctlLogger} from '../../core/logging/claimctl-logger.js';
import {type K8Factory} from '../../integration/kube/k8-factory.js';
import {type ClaimRequestValidator} from '../../business/claim/claim-request-validator.js';
import {type ClaimBuilder} from '../../business/claim/claim-builder.js';
import {type ClaimRequest} from '../../business/claim/claim-request.js';
import {LastAppliedAnnotation} from '../../business/claim/last-applied-annotation.js';
import {DryRunStrategy} from '../../core/dry-run-strategy.js';
import {MissingArgumentError} from '../../core/errors/missing-argument-error.js';
import {type ArgvStruct, type ConfigBuilder} from '../../types/aliases.js';
import {type ClaimctlListrTask} from '../../types/index.js';
import {type CreatePvcContext} from './config-interfaces/create-pvc-context.js';
import {type CreatePvcConfigClass} from './config-interfaces/create-pvc-config-class.js';

@injectable()
export class CreateCommandTasks {
  private readonly k8Factory: K8Factory;
  private readonly logger: ClaimctlLogger;
  private readonly validator: ClaimRequestValidator;
  private readonly builder: ClaimBuilder;

  public constructor(
    @inject(InjectTokens.K8Factory) k8Factory?: K8Factory,
    @inject(InjectTokens.ClaimctlLogger) logger?: ClaimctlLogger,
    @inject(InjectTokens.ClaimRequestValidator) validator?: ClaimRequestValidator,
    @inject(InjectTokens.ClaimBuilder) builder?: ClaimBuilder,
  ) {
    this.k8Factory = patchInject(k8Factory, InjectTokens.K8Factory, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ClaimctlLogger, this.constructor.name);
    this.validator = patchInject(validator, InjectTokens.ClaimRequestValidator, this.constructor.name);
    this.builder = patchInject(builder, InjectTokens.ClaimBuilder, this.constructor.name);
  }

  public static toClaimRequest(config: CreatePvcConfigClass): ClaimRequest {
    return {
      name: config.name,
      namespace: config.namespace?.name,
      storageRequest: config.storageRequest,
      storageLimit: config.storageLimit,
      accessModes: config.accessModes,
      storageClassName: config.storageClassName,
    };
  }

  public initialize(
    argv: ArgvStruct,
    configInit: ConfigBuilder<CreatePvcContext, CreatePvcConfigClass>,
  ): ClaimctlListrTask<CreatePvcContext> {
    return {
      title: 'Initialize',
      task: async (context_, task) => {
        context_.config = await configInit(argv, context_, task);
      },
    };
  }

  public validateOptions(): ClaimctlListrTask<CreatePvcContext> {
    return {
      title: 'Validate claim options',
      task: context_ => {
        this.validator.validate(CreateCommandTasks.toClaimRequest(context_.config));
      },
    };
  }

  public buildClaim(): ClaimctlListrTask<CreatePvcContext> {
    return {
      title: 'Build persistent volume claim',
      task: (context_, task) => {
        const config = context_.config;
        const claim = this.builder.build(CreateCommandTasks.toClaimRequest(config), config.namespace !== undefined);
        const manifest = claim.toManifest();

        context_.claim = claim;
        context_.manifest = config.saveConfig ? LastAppliedAnnotation.apply(manifest) : manifest;
        task.title += `: ${claim.name}`;
      },
    };
  }

  public submitClaim(): ClaimctlListrTask<CreatePvcContext> {
    return {
      title: 'Submit persistent volume claim',
      skip: context_ => context_.config.dryRun === DryRunStrategy.CLIENT,
      task: async (context_, task) => {
        const config = context_.config;
        if (!context_.manifest) {
          throw new MissingArgumentError('persistent volume claim manifest has not been built');
        }

        const k8 = config.context ? this.k8Factory.getK8(config.context) : this.k8Factory.default();
        const namespace = config.namespace ?? k8.contexts().readCurrentNamespace();
        task.title += `: ${namespace.name}`;

        context_.submitted = await k8.pvcs().create(namespace, context_.manifest, {
          dryRun: config.dryRun === DryRunStrategy.SERVER,
          fieldManager: config.fieldManager,
          fieldValidation: config.validate,
        });
        this.logger.debug(
          `submitted persistentvolumeclaim '${context_.claim?.name ?? ''}' to namespace '${namespace.name}'`,
        );
      },
    };
  }
}
