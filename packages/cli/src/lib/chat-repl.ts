/**
 * STEM Tutor chat REPL - one student, one conversation
 */

import * as readline from 'readline';
import chalk from 'chalk';
import { errorMessage, isTutorError } from '@stem-tutor/shared';
import type { Logger } from '@stem-tutor/shared';
import type { SessionStore, TranscriptFormat } from '@stem-tutor/session';
import type { Orchestrator, TutorReply } from '@stem-tutor/orchestrator';
import { createSpinner, errorBox, formatReply, formatSessionSummary, icons } from './ui.js';

export interface ChatReplOptions {
  orchestrator: Orchestrator;
  store: SessionStore;
  logger: Logger;
  studentId: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Spinner while waiting on the tutor; off for piped input */
  spinner?: boolean;
}

const HELP_LINES = [
  ['/quiz <answers>', 'Answer the active quiz, e.g. /quiz a c b'],
  ['/progress', 'Show turns and proficiency estimates'],
  ['/export [markdown|json]', 'Print the session transcript'],
  ['/help', 'Show this help'],
  ['/exit', 'Leave the chat'],
] as const;

export class ChatRepl {
  private readonly output: NodeJS.WritableStream;

  constructor(private readonly options: ChatReplOptions) {
    this.output = options.output ?? process.stdout;
  }

  async run(): Promise<void> {
    const welcome = await this.options.orchestrator.welcome(this.options.studentId);
    this.print(welcome.degraded ? `${icons.warning} ${welcome.text}` : welcome.text);
    this.print(chalk.gray('Type /help for commands.\n'));

    // Lines read before the iterator attaches would be dropped
    const rl = readline.createInterface({
      input: this.options.input ?? process.stdin,
      output: this.output,
      prompt: chalk.cyan(`[${this.options.studentId}] `) + chalk.gray('> '),
    });
    rl.prompt();

    for await (const line of rl) {
      const keepGoing = await this.handleLine(line.trim());
      if (!keepGoing) break;
      rl.prompt();
    }

    rl.close();
    this.print(chalk.gray('\nGoodbye!\n'));
  }

  /**
   * Process one input line; false ends the conversation
   */
  async handleLine(input: string): Promise<boolean> {
    if (!input) return true;

    if (!input.startsWith('/')) {
      await this.ask(() => this.options.orchestrator.handleMessage({ studentId: this.options.studentId, text: input }));
      return true;
    }

    const [command, ...args] = input.slice(1).split(/\s+/);
    switch (command.toLowerCase()) {
      case 'quiz':
        if (args.length === 0) {
          this.print(chalk.yellow('Usage: /quiz <answers>'));
        } else {
          const answer = args.join(' ');
          await this.ask(() =>
            this.options.orchestrator.submitQuizAnswer({ studentId: this.options.studentId, answer })
          );
        }
        return true;

      case 'progress':
        this.print(formatSessionSummary(await this.options.store.getSession(this.options.studentId)));
        return true;

      case 'export': {
        const format: TranscriptFormat = args[0] === 'json' ? 'json' : 'markdown';
        this.print(await this.options.store.exportTranscript(this.options.studentId, format));
        return true;
      }

      case 'help':
        for (const [usage, description] of HELP_LINES) {
          this.print(`  ${chalk.cyan(usage.padEnd(26))}${description}`);
        }
        return true;

      case 'exit':
      case 'quit':
      case 'q':
        return false;

      default:
        this.print(chalk.yellow(`Unknown command: /${command}`));
        this.print(chalk.gray('Type /help for available commands'));
        return true;
    }
  }

  private async ask(request: () => Promise<TutorReply>): Promise<void> {
    const spinner = this.options.spinner === false ? null : createSpinner('Thinking...').start();

    try {
      const reply = await request();
      spinner?.stop();
      this.print(formatReply(reply));
    } catch (error) {
      spinner?.stop();
      if (isTutorError(error)) {
        this.print(chalk.yellow(error.userMessage));
        return;
      }
      this.options.logger.error('Chat request failed', {
        studentId: this.options.studentId,
        error: errorMessage(error),
      });
      this.print(errorBox(errorMessage(error)));
    }
  }

  private print(text: string): void {
    this.output.write(`${text}\n`);
  }
}
