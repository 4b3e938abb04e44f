// API exports for programmatic usage

// Core functionality
import { ConfigStore } from './core/config-store';
import { ExecutableClassifier } from './core/executable-classifier';
import { VersionScanner } from './core/version-scanner';
import { SelectionEngine } from './core/selection-engine';
import { Launcher } from './core/launcher';
import { LaunchWorkflow } from './core/launch-workflow';

// Utilities
import { Logger } from './utils/logger';
import { Validator } from './utils/validator';
import { Platform } from './utils/platform';
import { NodeHostSystem } from './utils/host-system';
import { InquirerPrompter } from './utils/prompter';
import { resolveConfigPath } from './utils/tool-paths';
import { HostSystem } from './types/host';
import { LaunchOptions, LaunchOutcome } from './types/launch';

// Re-exports
export { ConfigStore, ExecutableClassifier, VersionScanner, SelectionEngine, Launcher, LaunchWorkflow };
export { Logger, Validator, Platform, NodeHostSystem, InquirerPrompter, resolveConfigPath };

// Types
export * from './types/config';
export * from './types/version';
export * from './types/host';
export * from './types/prompt';
export * from './types/launch';

export { launchCommand } from './commands/launch';

/**
 * Discover the versions installed under a root directory
 */
export function scanVersions(rootDirectory: string, host: HostSystem = new NodeHostSystem()) {
  return new VersionScanner(host).scan(rootDirectory);
}

/**
 * Run the whole launcher flow with the terminal prompter
 */
export function launch(options: LaunchOptions, host: HostSystem = new NodeHostSystem()): Promise<LaunchOutcome> {
  return new LaunchWorkflow(host, new InquirerPrompter()).run(options);
}

export default {
  scanVersions,
  launch
};
