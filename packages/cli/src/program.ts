/**
 * STEM Tutor CLI
 *
 * Usage:
 *   stem-tutor chat [--demo] [-s <id>]        - Start a tutoring session
 *   stem-tutor session list                   - List stored students
 *   stem-tutor session show <id>              - Show progress
 *   stem-tutor session export <id> [-f json]  - Export a transcript
 */

import { Command } from 'commander';
import { getEnvConfig } from '@stem-tutor/shared';
import { createChatCommand } from './commands/chat.js';
import { createSessionCommand } from './commands/session.js';
import type { RuntimeFactory } from './commands/types.js';
import { createTutorRuntime } from './lib/runtime.js';

export const VERSION = '0.1.0';

const defaultRuntime: RuntimeFactory = (options) => createTutorRuntime(getEnvConfig(), options);

export function createProgram(createRuntime: RuntimeFactory = defaultRuntime): Command {
  const program = new Command();

  program
    .name('stem-tutor')
    .description('STEM Tutor CLI - explanations, quizzes and progress tracking')
    .version(VERSION)
    .option('-d, --sessions-dir <dir>', 'Directory for stored sessions (overrides STEM_TUTOR_SESSIONS_DIR)');

  program.addCommand(createChatCommand(createRuntime));
  program.addCommand(createSessionCommand(createRuntime));

  return program;
}

export { createTutorRuntime } from './lib/runtime.js';
export type { TutorRuntime, TutorRuntimeOptions } from './lib/runtime.js';
export { ChatRepl } from './lib/chat-repl.js';
export type { ChatReplOptions } from './lib/chat-repl.js';
export { registerDemoProviders } from './lib/demo-providers.js';
export type { RuntimeFactory } from './commands/types.js';
