import { LauncherConfig } from './config';
import { ExecutableEntry, VersionCandidate } from './version';

export type SelectionSource = 'default' | 'auto' | 'prompt';

export type ResolutionResult =
  | {
      status: 'selected';
      executable: ExecutableEntry;
      source: SelectionSource;
      config: LauncherConfig;
    }
  | { status: 'not-found' }
  | { status: 'cancelled' };

export interface ResolveOptions {
  configPath: string;
  config: LauncherConfig;
  candidate: VersionCandidate;
  skipDefault: boolean;
}

export interface LaunchResult {
  success: boolean;
  pid?: number;
  error?: string;
}

export interface LaunchOptions {
  configPath: string;
  skipDefault: boolean;
  passthroughArgs: string[];
  rootDirectory?: string;
  version?: string;
  list?: boolean;
  json?: boolean;
  dryRun?: boolean;
}

export type LaunchStatus = 'launched' | 'listed' | 'dry-run' | 'cancelled' | 'failed';

export interface LaunchOutcome {
  status: LaunchStatus;
  executablePath?: string;
  pid?: number;
  error?: string;
}
