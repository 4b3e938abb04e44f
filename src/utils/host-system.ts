import fs from 'fs-extra';
import path from 'path';
import execa from 'execa';
import { DirectoryEntry, DirectoryEntryKind, HostSystem } from '../types/host';

const OWNER_EXECUTE = 0o100;

/**
 * HostSystem backed by the local file system and process table
 */
export class NodeHostSystem implements HostSystem {
  readonly platform: NodeJS.Platform;

  constructor(platform: NodeJS.Platform = process.platform) {
    this.platform = platform;
  }

  async listDir(dir: string): Promise<DirectoryEntry[]> {
    const dirents = await fs.readdir(dir, { withFileTypes: true });
    const entries: DirectoryEntry[] = [];

    for (const dirent of dirents) {
      const entryPath = path.join(dir, dirent.name);
      let kind: DirectoryEntryKind = dirent.isDirectory() ? 'directory' : dirent.isFile() ? 'file' : 'other';

      // Follow links so a symlinked version folder or binary is treated like the real thing
      if (dirent.isSymbolicLink()) {
        kind = await this.kindOf(entryPath);
      }

      entries.push({ name: dirent.name, path: entryPath, kind });
    }

    return entries;
  }

  async fileExists(filePath: string): Promise<boolean> {
    return (await this.kindOf(filePath)) === 'file';
  }

  async directoryExists(dir: string): Promise<boolean> {
    return (await this.kindOf(dir)) === 'directory';
  }

  async isExecutableBit(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return (stat.mode & OWNER_EXECUTE) !== 0;
    } catch {
      return false;
    }
  }

  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await fs.writeFile(filePath, content, 'utf-8');
  }

  async spawnDetached(file: string, args: readonly string[]): Promise<number | undefined> {
    const subprocess = execa(file, [...args], {
      detached: true,
      stdio: 'ignore',
      cleanup: false,
      reject: false,
      windowsHide: false
    });

    await new Promise<void>((resolve, reject) => {
      subprocess.once('spawn', () => resolve());
      subprocess.once('error', reject);
      // execa settles without emitting 'spawn' when the spawn call itself throws
      void subprocess.then(
        (result) => reject(new Error(`Process ended before it started: ${result.command}`)),
        reject
      );
    });

    subprocess.unref();
    return subprocess.pid;
  }

  private async kindOf(entryPath: string): Promise<DirectoryEntryKind> {
    try {
      const stat = await fs.stat(entryPath);
      if (stat.isDirectory()) return 'directory';
      if (stat.isFile()) return 'file';
      return 'other';
    } catch {
      return 'other';
    }
  }
}
