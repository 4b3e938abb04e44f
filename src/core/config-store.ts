import { HostSystem } from '../types/host';
import { LauncherConfig, LauncherConfigSchema, SaveResult } from '../types/config';
import { Logger } from '../utils/logger';

export class ConfigStore {
  constructor(private readonly host: HostSystem) {}

  /**
   * Fresh configuration with no root directory and no remembered executables
   */
  static empty(): LauncherConfig {
    return { rootDirectory: null, defaultExecutables: {} };
  }

  /**
   * Copy of the config with the executable remembered for a version, replacing any previous entry
   */
  static rememberExecutable(config: LauncherConfig, versionIdentifier: string, executablePath: string): LauncherConfig {
    return {
      ...config,
      defaultExecutables: {
        ...config.defaultExecutables,
        [versionIdentifier]: executablePath
      }
    };
  }

  /**
   * Executable remembered for a version; only own entries count, never inherited object members
   */
  static rememberedExecutable(config: LauncherConfig, versionIdentifier: string): string | undefined {
    return Object.hasOwn(config.defaultExecutables, versionIdentifier)
      ? config.defaultExecutables[versionIdentifier]
      : undefined;
  }

  /**
   * Load the configuration file. Any problem yields the empty configuration.
   */
  async load(configPath: string): Promise<LauncherConfig> {
    if (!(await this.host.fileExists(configPath))) {
      Logger.info(`No configuration found at ${configPath}, starting with defaults`);
      return ConfigStore.empty();
    }

    try {
      const content = await this.host.readFile(configPath);
      const parsed = LauncherConfigSchema.safeParse(JSON.parse(content));

      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const location = issue.path.length > 0 ? issue.path.join('.') : 'document';
        Logger.warning(`Invalid configuration in ${configPath} (${location}: ${issue.message}), using defaults`);
        return ConfigStore.empty();
      }

      Logger.debug(`Loaded configuration from ${configPath}`);
      return parsed.data;
    } catch (error) {
      Logger.warning(
        `Failed to read configuration, using defaults: ${error instanceof Error ? error.message : String(error)}`
      );
      return ConfigStore.empty();
    }
  }

  /**
   * Write the configuration as indented JSON, replacing the file
   */
  async save(configPath: string, config: LauncherConfig): Promise<SaveResult> {
    try {
      await this.host.writeFile(configPath, ConfigStore.serialize(config));
      Logger.success(`Configuration saved to ${configPath}`);
      return { success: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      Logger.warning(`Could not save configuration: ${message}`);
      return { success: false, error: message };
    }
  }

  static serialize(config: LauncherConfig): string {
    const defaultExecutables = Object.fromEntries(
      Object.entries(config.defaultExecutables).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    );

    return JSON.stringify({ rootDirectory: config.rootDirectory, defaultExecutables }, null, 2) + '\n';
  }
}
