import { Command, Option } from 'commander';
import { LaunchWorkflow } from '../core/launch-workflow';
import { LaunchOptions, LaunchOutcome, LaunchStatus } from '../types/launch';
import { EXIT_CODES } from '../constants';
import { Logger } from '../utils/logger';
import { NodeHostSystem } from '../utils/host-system';
import { InquirerPrompter } from '../utils/prompter';
import { resolveConfigPath } from '../utils/tool-paths';

type LaunchCommandOptions = {
  skipDefault?: boolean;
  root?: string;
  use?: string;
  list?: boolean;
  json?: boolean;
  dryRun?: boolean;
  config?: string;
};

export type WorkflowRunner = (options: LaunchOptions) => Promise<LaunchOutcome>;

const defaultRunner: WorkflowRunner = (options) =>
  new LaunchWorkflow(new NodeHostSystem(), new InquirerPrompter()).run(options);

export function exitCodeFor(status: LaunchStatus): number {
  switch (status) {
    case 'launched':
    case 'listed':
    case 'dry-run':
      return EXIT_CODES.success;
    case 'cancelled':
      return EXIT_CODES.cancelled;
    case 'failed':
      return EXIT_CODES.failed;
  }
}

/**
 * User arguments minus the launcher's own options and their values.
 * Everything else is kept in order, including `--` and whatever follows it.
 */
export function forwardedArgs(userArgs: readonly string[], options: readonly Option[]): string[] {
  const findOption = (flag: string) => options.find(option => option.long === flag || option.short === flag);
  const takesValue = (option: Option) => option.required || option.optional;
  const pending = [...userArgs];
  const forwarded: string[] = [];

  while (pending.length > 0) {
    const arg = pending.shift() ?? '';

    if (arg === '--') {
      forwarded.push(arg, ...pending);
      break;
    }

    const option = findOption(arg);
    if (option) {
      if (option.required || (option.optional && pending.length > 0 && !pending[0].startsWith('-'))) {
        pending.shift();
      }
      continue;
    }

    // -n combined with other short flags, or a short option with its value attached
    if (arg.length > 2 && arg[0] === '-' && arg[1] !== '-') {
      const short = findOption(arg.slice(0, 2));
      if (short) {
        if (!takesValue(short)) {
          pending.unshift(`-${arg.slice(2)}`);
        }
        continue;
      }
    }

    const equals = arg.indexOf('=');
    if (arg.startsWith('--') && equals > 2) {
      const long = findOption(arg.slice(0, equals));
      if (long && takesValue(long)) {
        continue;
      }
    }

    forwarded.push(arg);
  }

  return forwarded;
}

export function launchCommand(
  program: Command,
  runWorkflow: WorkflowRunner = defaultRunner,
  userArgs: () => string[] = () => process.argv.slice(2)
): void {
  program
    .argument('[args...]', 'Arguments forwarded verbatim to Godot')
    .option('-n, --skip-default', 'Ignore the remembered executable and choose again')
    .option('--root <dir>', 'Set the Godot root directory (one subdirectory per version)')
    .option('--use <version>', 'Launch this version without asking')
    .option('--list', 'List discovered versions and exit')
    .option('--json', 'Print the --list output as JSON')
    .option('--dry-run', 'Resolve the executable without launching it')
    .option('--config <file>', 'Path to the launcher configuration file')
    .allowUnknownOption()
    .allowExcessArguments()
    .action(async (_args: string[], _options: LaunchCommandOptions, command: Command) => {
      let exitCode: number;

      try {
        const options = command.opts<LaunchCommandOptions>();

        const outcome = await runWorkflow({
          configPath: resolveConfigPath(options.config),
          skipDefault: options.skipDefault === true,
          passthroughArgs: forwardedArgs(userArgs(), command.options),
          rootDirectory: options.root,
          version: options.use,
          list: options.list,
          json: options.json,
          dryRun: options.dryRun
        });

        exitCode = exitCodeFor(outcome.status);
      } catch (error) {
        Logger.error(`Launch failed: ${error instanceof Error ? error.message : String(error)}`);
        exitCode = EXIT_CODES.failed;
      }

      // Leave right away; a launched engine keeps running on its own
      process.exit(exitCode);
    });
}
