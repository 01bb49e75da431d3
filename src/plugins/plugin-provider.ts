/**
 * Plugin Provider
 *
 * Plugins are capability providers that an operation process may activate.
 * The provider enumerates them; each plugin decides whether it applies to a
 * given operation.
 */

import type { OperationDef } from '../models/model-file';

export interface PluginDecision {
  enabled: boolean;
  reason?: string;
}

export interface IPlugin {
  readonly name: string;
  enabledForOperation(opdef: OperationDef): PluginDecision;
}

export interface IPluginProvider {
  listPlugins(): readonly IPlugin[];
}

export class StaticPluginProvider implements IPluginProvider {
  private readonly plugins: readonly IPlugin[];

  constructor(plugins: readonly IPlugin[] = []) {
    this.plugins = [...plugins];
  }

  listPlugins(): readonly IPlugin[] {
    return this.plugins;
  }
}

/**
 * Plugin enabled for every operation, as listed under `plugins:` in config.yml
 */
export class ConfiguredPlugin implements IPlugin {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  enabledForOperation(): PluginDecision {
    return { enabled: true, reason: 'enabled in config' };
  }
}

export function pluginProviderFromConfig(names: readonly string[]): IPluginProvider {
  return new StaticPluginProvider(names.map((name) => new ConfiguredPlugin(name)));
}
