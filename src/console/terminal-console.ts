import chalk from 'chalk';
import inquirer from 'inquirer';
import ora, { type Ora } from 'ora';
import { OperationCancelledError } from '../errors/index.js';
import type { ConfirmOptions, Console, PromptOptions, SelectOptions, SpinnerOutcome } from './types.js';

/**
 * Interactive console for terminals: inquirer for questions, ora for the spinner.
 */
export class TerminalConsole implements Console {
  private spinner?: Ora;

  async prompt(options: PromptOptions): Promise<string> {
    const message = this.withHelp(options.message, options.help);
    return this.interact(async () => {
      if (options.secret) {
        const answer = await inquirer.prompt<{ value: string }>([
          { type: 'password', name: 'value', message, mask: '*' }
        ]);
        return answer.value;
      }
      const answer = await inquirer.prompt<{ value: string }>([
        { type: 'input', name: 'value', message, default: options.defaultValue }
      ]);
      return answer.value;
    });
  }

  async select(options: SelectOptions): Promise<number> {
    const defaultIndex = options.defaultValue === undefined ? 0 : Math.max(0, options.options.indexOf(options.defaultValue));
    return this.interact(async () => {
      const answer = await inquirer.prompt<{ index: number }>([
        {
          type: 'list',
          name: 'index',
          message: this.withHelp(options.message, options.help),
          choices: options.options.map((name, index) => ({ name, value: index })),
          default: defaultIndex
        }
      ]);
      return answer.index;
    });
  }

  async confirm(options: ConfirmOptions): Promise<boolean> {
    return this.interact(async () => {
      const answer = await inquirer.prompt<{ confirmed: boolean }>([
        { type: 'confirm', name: 'confirmed', message: options.message, default: options.defaultValue ?? false }
      ]);
      return answer.confirmed;
    });
  }

  message(text: string): void {
    if (this.spinner?.isSpinning) {
      this.spinner.clear();
      console.log(text);
      this.spinner.render();
      return;
    }
    console.log(text);
  }

  showSpinner(text: string): void {
    if (this.spinner?.isSpinning) {
      this.spinner.text = text;
      return;
    }
    this.spinner = ora(text).start();
  }

  stopSpinner(text?: string, outcome: SpinnerOutcome = 'success'): void {
    const spinner = this.spinner;
    if (!spinner) {
      return;
    }
    this.spinner = undefined;

    if (!text) {
      spinner.stop();
      return;
    }
    switch (outcome) {
      case 'success':
        spinner.succeed(text);
        break;
      case 'failure':
        spinner.fail(chalk.red(text));
        break;
      case 'skipped':
        spinner.info(chalk.gray(text));
        break;
    }
  }

  /** The spinner must not redraw over an open question */
  private async interact<T>(ask: () => Promise<T>): Promise<T> {
    const spinnerText = this.spinner?.isSpinning ? this.spinner.text : undefined;
    this.spinner?.stop();
    try {
      return await ask();
    } catch (error) {
      if (error instanceof Error && error.name === 'ExitPromptError') {
        throw new OperationCancelledError('Prompt cancelled by user', error);
      }
      throw error;
    } finally {
      if (spinnerText !== undefined) {
        this.spinner = ora(spinnerText).start();
      }
    }
  }

  private withHelp(message: string, help?: string): string {
    return help ? `${message} ${chalk.gray(`(${help})`)}` : message;
  }
}
