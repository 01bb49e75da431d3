export {
  StaticPluginProvider,
  ConfiguredPlugin,
  pluginProviderFromConfig,
  type IPlugin,
  type IPluginProvider,
  type PluginDecision,
} from './plugin-provider';
