import inquirer from 'inquirer';
import path from 'path';
import chalk from 'chalk';
import { Prompter } from '../types/prompt';
import { ExecutableEntry, VersionCandidate } from '../types/version';
import { Logger } from './logger';
import { variantLabel } from '../core/executable-classifier';

/**
 * Prompter reading answers from the terminal through inquirer
 */
export class InquirerPrompter implements Prompter {
  async askRootDirectory(example: string): Promise<string> {
    Logger.info('First run: the Godot root directory is not configured yet');
    console.log(`  Example: ${chalk.gray(example)}`);

    return this.ask('Godot root directory:');
  }

  async chooseVersion(candidates: readonly VersionCandidate[]): Promise<string> {
    Logger.subTitle(`Found ${candidates.length} Godot version${candidates.length === 1 ? '' : 's'}`);
    candidates.forEach((candidate, index) => {
      console.log(`  [${index + 1}] ${candidate.versionIdentifier}`);
    });

    return this.ask(`Version to launch (1-${candidates.length}), or Enter to cancel:`);
  }

  async chooseExecutable(entries: readonly ExecutableEntry[], versionIdentifier: string): Promise<string> {
    Logger.subTitle(`Several executables found in '${versionIdentifier}'`);
    entries.forEach((entry, index) => {
      console.log(`  [${index + 1}] ${variantLabel(entry)} → ${path.basename(entry.path)}`);
    });

    return this.ask(`Executable to launch (1-${entries.length}):`);
  }

  private async ask(message: string): Promise<string> {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: 'input',
        name: 'answer',
        message
      }
    ]);

    return answer;
  }
}
