export type DirectoryEntryKind = 'file' | 'directory' | 'other';

export interface DirectoryEntry {
  name: string;
  path: string;
  kind: DirectoryEntryKind;
}

/**
 * Operating system capabilities the launcher core depends on.
 */
export interface HostSystem {
  readonly platform: NodeJS.Platform;

  /** Immediate children of a directory. Rejects when the directory cannot be read. */
  listDir(dir: string): Promise<DirectoryEntry[]>;

  fileExists(filePath: string): Promise<boolean>;

  directoryExists(dir: string): Promise<boolean>;

  /** Owner-execute permission bit. Resolves false when metadata cannot be read. */
  isExecutableBit(filePath: string): Promise<boolean>;

  readFile(filePath: string): Promise<string>;

  writeFile(filePath: string, content: string): Promise<void>;

  /**
   * Start a process that outlives this one. Resolves with its pid once the OS has
   * accepted the spawn, rejects when it could not be started.
   */
  spawnDetached(file: string, args: readonly string[]): Promise<number | undefined>;
}
