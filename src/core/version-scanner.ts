import { DirectoryEntry, HostSystem } from '../types/host';
import { VersionCandidate } from '../types/version';
import { RESERVED_DIRECTORY_NAME } from '../constants';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';
import { ExecutableClassifier, compareOrdinal } from './executable-classifier';

export class VersionScanner {
  private readonly classifier: ExecutableClassifier;

  constructor(private readonly host: HostSystem, classifier?: ExecutableClassifier) {
    this.classifier = classifier ?? new ExecutableClassifier(host);
  }

  /**
   * Find engine version directories under the root, sorted by identifier
   */
  async scan(rootDirectory: string): Promise<VersionCandidate[]> {
    let entries: DirectoryEntry[];
    try {
      entries = await this.host.listDir(rootDirectory);
    } catch (error) {
      Logger.warning(`Cannot read root directory ${rootDirectory}: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }

    const candidates: VersionCandidate[] = [];

    for (const entry of entries) {
      if (entry.kind !== 'directory') continue;

      if (Validator.equalsIgnoreCase(entry.name, RESERVED_DIRECTORY_NAME)) {
        Logger.debug(`Skipping launcher directory ${entry.path}`);
        continue;
      }

      const executables = await this.classifier.listExecutables(entry.path);
      if (executables.length > 0) {
        candidates.push({ versionIdentifier: entry.name, directoryPath: entry.path });
      } else {
        Logger.debug(`No engine executable in ${entry.path}`);
      }
    }

    return candidates.sort((a, b) => compareOrdinal(a.versionIdentifier, b.versionIdentifier));
  }
}
