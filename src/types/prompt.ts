import { ExecutableEntry, VersionCandidate } from './version';

/**
 * Interactive questions asked during a launch. Each method resolves with the raw
 * answer; interpretation (and cancellation on bad input) is left to the caller.
 */
export interface Prompter {
  askRootDirectory(example: string): Promise<string>;
  chooseVersion(candidates: readonly VersionCandidate[]): Promise<string>;
  chooseExecutable(entries: readonly ExecutableEntry[], versionIdentifier: string): Promise<string>;
}
