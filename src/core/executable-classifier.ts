import { DirectoryEntry, HostSystem } from '../types/host';
import { ExecutableEntry, ExecutableVariant } from '../types/version';
import { CONSOLE_MARKER, ENGINE_NAME_PREFIX } from '../constants';
import { Platform } from '../utils/platform';
import { Logger } from '../utils/logger';

const VARIANT_RANK: Record<ExecutableVariant, number> = {
  Editor: 0,
  Console: 1
};

export class ExecutableClassifier {
  constructor(private readonly host: HostSystem) {}

  /**
   * Executable on this platform and named like an engine binary
   */
  async isQualifyingExecutable(filePath: string): Promise<boolean> {
    const fileName = Platform.pathApi(this.host.platform).basename(filePath);
    if (!fileName.toLowerCase().startsWith(ENGINE_NAME_PREFIX)) {
      return false;
    }

    return this.isPlatformExecutable(filePath);
  }

  /**
   * Windows goes by extension, everything else by the owner-execute bit
   */
  async isPlatformExecutable(filePath: string): Promise<boolean> {
    if (Platform.isWindows(this.host.platform)) {
      const extension = Platform.pathApi(this.host.platform).extname(filePath);
      return extension.toLowerCase() === Platform.exeExtension(this.host.platform);
    }

    return this.host.isExecutableBit(filePath);
  }

  variantOf(filePath: string): ExecutableVariant {
    const pathApi = Platform.pathApi(this.host.platform);
    const stem = pathApi.basename(filePath, pathApi.extname(filePath)).toLowerCase();
    return stem.includes(CONSOLE_MARKER) ? 'Console' : 'Editor';
  }

  /**
   * Qualifying executables directly inside a directory, in presentation order.
   * An unreadable directory has none.
   */
  async listExecutables(dir: string): Promise<ExecutableEntry[]> {
    let entries: DirectoryEntry[];
    try {
      entries = await this.host.listDir(dir);
    } catch (error) {
      Logger.debug(`Skipping unreadable directory ${dir}: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }

    const executables: ExecutableEntry[] = [];
    for (const entry of entries) {
      if (entry.kind === 'file' && (await this.isQualifyingExecutable(entry.path))) {
        executables.push({ path: entry.path, variant: this.variantOf(entry.path) });
      }
    }

    return ExecutableClassifier.orderForPresentation(executables);
  }

  /**
   * Editor builds first, then console builds; path breaks ties
   */
  static orderForPresentation(entries: readonly ExecutableEntry[]): ExecutableEntry[] {
    return [...entries].sort((a, b) => {
      const byVariant = VARIANT_RANK[a.variant] - VARIANT_RANK[b.variant];
      if (byVariant !== 0) {
        return byVariant;
      }
      return compareOrdinal(a.path, b.path);
    });
  }
}

/**
 * Human-readable label for an executable variant
 */
export function variantLabel(entry: ExecutableEntry): string {
  return entry.variant === 'Console' ? 'Console build' : 'Editor build';
}

export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
