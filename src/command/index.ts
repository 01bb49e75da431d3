export {
  CommandBuilder,
  InvalidCommandError,
  resolveCommandTemplate,
  commandTokens,
  commandOptions,
  flagArgs,
  operationPlugins,
  operationSearchPath,
  isPluginDisabledByConfig,
  BUNDLED_RUNTIME_PACKAGES,
  DISABLED_BY_CONFIG_REASON,
  PLUGINS_ENV,
  LOG_LEVEL_ENV,
  type CommandTemplate,
  type CommandInvocation,
  type CommandBuilderOptions,
} from './command-builder';
export { shellSplit, ShellSyntaxError } from './shell-split';
