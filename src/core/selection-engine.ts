import { HostSystem } from '../types/host';
import { Prompter } from '../types/prompt';
import { ResolutionResult, ResolveOptions, SelectionSource } from '../types/launch';
import { ExecutableEntry } from '../types/version';
import { Logger } from '../utils/logger';
import { Platform } from '../utils/platform';
import { Validator } from '../utils/validator';
import { ConfigStore } from './config-store';
import { ExecutableClassifier, variantLabel } from './executable-classifier';

/**
 * Picks the one executable to run for a version and remembers it as that version's default
 */
export class SelectionEngine {
  private readonly classifier: ExecutableClassifier;

  constructor(
    private readonly host: HostSystem,
    private readonly store: ConfigStore,
    private readonly prompter: Prompter,
    classifier?: ExecutableClassifier
  ) {
    this.classifier = classifier ?? new ExecutableClassifier(host);
  }

  async resolve(options: ResolveOptions): Promise<ResolutionResult> {
    const { candidate, config, skipDefault } = options;
    const versionIdentifier = candidate.versionIdentifier;

    let selected: ExecutableEntry | undefined;
    let source: SelectionSource = 'default';

    const remembered = ConfigStore.rememberedExecutable(config, versionIdentifier);
    if (skipDefault) {
      Logger.info('--skip-default given, ignoring the remembered executable');
    } else if (remembered !== undefined) {
      if (await this.host.fileExists(remembered)) {
        selected = { path: remembered, variant: this.classifier.variantOf(remembered) };
        Logger.info(`Using remembered default: ${this.describe(selected)}`);
      } else {
        Logger.warning(`Remembered executable ${remembered} no longer exists, choosing again`);
      }
    }

    if (!selected) {
      const executables = await this.classifier.listExecutables(candidate.directoryPath);

      if (executables.length === 0) {
        return { status: 'not-found' };
      }

      if (executables.length === 1) {
        selected = executables[0];
        source = 'auto';
        Logger.info(`Selected automatically: ${this.describe(selected)}`);
      } else {
        const answer = await this.prompter.chooseExecutable(executables, versionIdentifier);
        const choice = Validator.parseChoice(answer, executables.length);
        if (choice === null) {
          return { status: 'cancelled' };
        }
        selected = executables[choice - 1];
        source = 'prompt';
      }
    }

    const updated = ConfigStore.rememberExecutable(config, versionIdentifier, selected.path);
    await this.store.save(options.configPath, updated);

    return { status: 'selected', executable: selected, source, config: updated };
  }

  private describe(entry: ExecutableEntry): string {
    return `${variantLabel(entry)} → ${Platform.pathApi(this.host.platform).basename(entry.path)}`;
  }
}
