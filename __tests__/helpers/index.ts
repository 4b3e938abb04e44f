import { ExecutableEntry, VersionCandidate } from '../../src/types/version';

export { MemoryHostSystem } from './memory-host-system';

/**
 * Prompter answering every question from a fixed script
 */
export function scriptedPrompter(answers: { root?: string; version?: string; executable?: string } = {}) {
  return {
    askRootDirectory: jest.fn(async (_example: string) => answers.root ?? ''),
    chooseVersion: jest.fn(async (_candidates: readonly VersionCandidate[]) => answers.version ?? ''),
    chooseExecutable: jest.fn(
      async (_entries: readonly ExecutableEntry[], _versionIdentifier: string) => answers.executable ?? ''
    )
  };
}

/**
 * Silence console output for the duration of a test file and expose the spies
 */
export function spyOnConsole() {
  const spies = {
    log: jest.spyOn(console, 'log').mockImplementation(() => undefined),
    error: jest.spyOn(console, 'error').mockImplementation(() => undefined)
  };
  return spies;
}
