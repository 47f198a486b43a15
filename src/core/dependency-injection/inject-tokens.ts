// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogDirectory: Symbol.for('LogDirectory'),
  ClaimctlLogger: Symbol.for('ClaimctlLogger'),
  ConfigManager: Symbol.for('ConfigManager'),
  K8Factory: Symbol.for('K8Factory'),
  ClaimRequestValidator: Symbol.for('ClaimRequestValidator'),
  ClaimBuilder: Symbol.for('ClaimBuilder'),
  ResourcePrinter: Symbol.for('ResourcePrinter'),
  CreateCommandHandlers: Symbol.for('CreateCommandHandlers'),
  CreateCommandTasks: Symbol.for('CreateCommandTasks'),
  CreateCommandConfigs: Symbol.for('CreateCommandConfigs'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  Middlewares: Symbol.for('Middlewares'),
};
