import { HostSystem } from '../types/host';
import { LaunchResult } from '../types/launch';
import { Logger } from '../utils/logger';
import { Platform } from '../utils/platform';

export class Launcher {
  constructor(private readonly host: HostSystem) {}

  /**
   * Start the executable detached, forwarding the arguments untouched.
   * Does not wait for the child beyond the OS accepting the spawn.
   */
  async launch(executablePath: string, passthroughArgs: readonly string[]): Promise<LaunchResult> {
    Logger.info(`Starting ${Platform.pathApi(this.host.platform).basename(executablePath)} ...`);
    if (passthroughArgs.length > 0) {
      Logger.debug(`Forwarding arguments: ${JSON.stringify(passthroughArgs)}`);
    }

    try {
      const pid = await this.host.spawnDetached(executablePath, passthroughArgs);
      return { success: true, pid };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error)
      };
    }
  }
}
