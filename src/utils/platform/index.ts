import path from 'path';

export class Platform {
  /**
   * Check if running on (or targeting) Windows
   */
  static isWindows(platform: NodeJS.Platform = process.platform): boolean {
    return platform === 'win32';
  }

  /**
   * Check if running on macOS
   */
  static isMac(platform: NodeJS.Platform = process.platform): boolean {
    return platform === 'darwin';
  }

  /**
   * Get platform-specific executable extension
   */
  static exeExtension(platform: NodeJS.Platform = process.platform): string {
    return Platform.isWindows(platform) ? '.exe' : '';
  }

  /**
   * Path helpers matching the platform's separator rules
   */
  static pathApi(platform: NodeJS.Platform = process.platform): path.PlatformPath {
    return Platform.isWindows(platform) ? path.win32 : path.posix;
  }

  /**
   * Example engine root shown on first run
   */
  static rootDirectoryExample(platform: NodeJS.Platform = process.platform): string {
    if (Platform.isWindows(platform)) {
      return 'C:\\GODOT';
    }
    return Platform.isMac(platform) ? '/Users/user/GODOT' : '/home/user/GODOT';
  }
}
