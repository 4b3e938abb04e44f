import chalk from 'chalk';
import { HostSystem } from '../types/host';
import { Prompter } from '../types/prompt';
import { LauncherConfig } from '../types/config';
import { LaunchOptions, LaunchOutcome } from '../types/launch';
import { VersionCandidate } from '../types/version';
import { Logger } from '../utils/logger';
import { Platform } from '../utils/platform';
import { Validator } from '../utils/validator';
import { ConfigStore } from './config-store';
import { ExecutableClassifier } from './executable-classifier';
import { VersionScanner } from './version-scanner';
import { SelectionEngine } from './selection-engine';
import { Launcher } from './launcher';

type Step<T> = { done: false; value: T } | { done: true; outcome: LaunchOutcome };

/**
 * One launcher run: configuration, discovery, selection and hand-off
 */
export class LaunchWorkflow {
  private readonly store: ConfigStore;
  private readonly scanner: VersionScanner;
  private readonly engine: SelectionEngine;
  private readonly launcher: Launcher;

  constructor(private readonly host: HostSystem, private readonly prompter: Prompter) {
    const classifier = new ExecutableClassifier(host);
    this.store = new ConfigStore(host);
    this.scanner = new VersionScanner(host, classifier);
    this.engine = new SelectionEngine(host, this.store, prompter, classifier);
    this.launcher = new Launcher(host);
  }

  async run(options: LaunchOptions): Promise<LaunchOutcome> {
    Logger.debug(`Configuration file: ${options.configPath}`);
    const loaded = await this.store.load(options.configPath);

    const root = await this.establishRootDirectory(options, loaded);
    if (root.done) return root.outcome;
    const { rootDirectory, config } = root.value;

    const candidates = await this.scanner.scan(rootDirectory);
    if (candidates.length === 0) {
      return this.fail(`No Godot executables found in any version directory under ${rootDirectory}`);
    }

    if (options.list) {
      this.printVersions(candidates, config, options.json === true);
      return { status: 'listed' };
    }

    const picked = await this.pickVersion(candidates, options.version);
    if (picked.done) return picked.outcome;
    const candidate = picked.value;

    const resolution = await this.engine.resolve({
      configPath: options.configPath,
      config,
      candidate,
      skipDefault: options.skipDefault
    });

    if (resolution.status === 'not-found') {
      return this.fail(`No Godot executable found in ${candidate.directoryPath}`);
    }
    if (resolution.status === 'cancelled') {
      return this.cancel('Invalid choice, nothing launched');
    }

    const executablePath = resolution.executable.path;

    if (options.dryRun) {
      Logger.subTitle('Dry Run');
      console.log(`  Version: ${candidate.versionIdentifier}`);
      console.log(`  Executable: ${executablePath}`);
      console.log(`  Arguments: ${options.passthroughArgs.length > 0 ? options.passthroughArgs.join(' ') : 'None'}`);
      return { status: 'dry-run', executablePath };
    }

    const launch = await this.launcher.launch(executablePath, options.passthroughArgs);
    if (!launch.success) {
      return this.fail(`Failed to launch ${executablePath}: ${launch.error ?? 'unknown error'}`);
    }

    Logger.success('Godot started, launcher exiting');
    return { status: 'launched', executablePath, pid: launch.pid };
  }

  /**
   * Root directory from --root, the stored config, or a first-run prompt, persisting new values
   */
  private async establishRootDirectory(
    options: LaunchOptions,
    config: LauncherConfig
  ): Promise<Step<{ rootDirectory: string; config: LauncherConfig }>> {
    const pathApi = Platform.pathApi(this.host.platform);
    let input: string;

    if (options.rootDirectory !== undefined) {
      input = Validator.normalizeDirectoryInput(options.rootDirectory);
      if (!input) {
        return { done: true, outcome: this.fail('--root needs a directory path') };
      }
    } else if (config.rootDirectory) {
      if (!(await this.host.directoryExists(config.rootDirectory))) {
        return {
          done: true,
          outcome: this.fail(`Godot root directory does not exist: ${config.rootDirectory}`)
        };
      }
      return { done: false, value: { rootDirectory: config.rootDirectory, config } };
    } else {
      input = Validator.normalizeDirectoryInput(
        await this.prompter.askRootDirectory(Platform.rootDirectoryExample(this.host.platform))
      );
      if (!input) {
        return { done: true, outcome: this.cancel('Root directory cannot be empty') };
      }
    }

    const rootDirectory = pathApi.resolve(input);
    if (!(await this.host.directoryExists(rootDirectory))) {
      return { done: true, outcome: this.fail(`Directory does not exist: ${rootDirectory}`) };
    }

    if (rootDirectory === config.rootDirectory) {
      return { done: false, value: { rootDirectory, config } };
    }

    const updated: LauncherConfig = { ...config, rootDirectory };
    await this.store.save(options.configPath, updated);
    return { done: false, value: { rootDirectory, config: updated } };
  }

  private async pickVersion(candidates: VersionCandidate[], requested?: string): Promise<Step<VersionCandidate>> {
    if (requested !== undefined) {
      const match = candidates.find(candidate => candidate.versionIdentifier === requested);
      if (!match) {
        const available = candidates.map(candidate => candidate.versionIdentifier).join(', ');
        return { done: true, outcome: this.fail(`Version '${requested}' not found. Available: ${available}`) };
      }
      Logger.info(`Using version ${chalk.bold(match.versionIdentifier)}`);
      return { done: false, value: match };
    }

    const answer = await this.prompter.chooseVersion(candidates);
    if (!answer.trim()) {
      return { done: true, outcome: this.cancel('Cancelled') };
    }

    const choice = Validator.parseChoice(answer, candidates.length);
    if (choice === null) {
      return { done: true, outcome: this.cancel('Invalid choice') };
    }

    return { done: false, value: candidates[choice - 1] };
  }

  private printVersions(candidates: VersionCandidate[], config: LauncherConfig, json: boolean): void {
    const rows = candidates.map(candidate => ({
      version: candidate.versionIdentifier,
      directory: candidate.directoryPath,
      defaultExecutable: ConfigStore.rememberedExecutable(config, candidate.versionIdentifier) ?? null
    }));

    if (json) {
      Logger.json(rows);
      return;
    }

    Logger.subTitle(`Found ${rows.length} Godot version${rows.length === 1 ? '' : 's'}`);
    rows.forEach(row => {
      const remembered = row.defaultExecutable ? chalk.gray(` (default: ${row.defaultExecutable})`) : '';
      console.log(`  • ${row.version}${remembered}`);
    });
  }

  private fail(message: string): LaunchOutcome {
    Logger.error(message);
    return { status: 'failed', error: message };
  }

  private cancel(message: string): LaunchOutcome {
    Logger.warning(message);
    return { status: 'cancelled' };
  }
}
