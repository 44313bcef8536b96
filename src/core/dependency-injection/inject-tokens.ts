// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  NetLogger: Symbol.for('NetLogger'),
  ConfigManager: Symbol.for('ConfigManager'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  Middlewares: Symbol.for('Middlewares'),
  ObjectMapper: Symbol.for('ObjectMapper'),
  DeployedStateSchema: Symbol.for('DeployedStateSchema'),
  DeployedStateStoreFactory: Symbol.for('DeployedStateStoreFactory'),
  DesiredStateLoader: Symbol.for('DesiredStateLoader'),
  TemplateRenderer: Symbol.for('TemplateRenderer'),
  CloudProviderFactory: Symbol.for('CloudProviderFactory'),
  HostFactoryProvider: Symbol.for('HostFactoryProvider'),
  ResultReporter: Symbol.for('ResultReporter'),
};
