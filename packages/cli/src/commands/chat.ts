// ============================================================================
// stem-tutor chat - Interactive tutoring session
// ============================================================================

import { Command } from 'commander';
import { validateEnvConfig } from '@stem-tutor/shared';
import { ChatRepl } from '../lib/chat-repl.js';
import { errorBox } from '../lib/ui.js';
import type { RuntimeFactory } from './types.js';

interface ChatOptions {
  student: string;
  demo?: boolean;
  spinner: boolean;
}

export function createChatCommand(createRuntime: RuntimeFactory): Command {
  return new Command('chat')
    .description('Start an interactive tutoring session')
    .option('-s, --student <id>', 'Student id the session belongs to', 'student')
    .option('--demo', 'Use canned offline providers instead of configured endpoints')
    .option('--no-spinner', 'Disable the progress spinner')
    .action(async (options: ChatOptions, command: Command) => {
      const { sessionsDir } = command.optsWithGlobals<{ sessionsDir?: string }>();
      const runtime = createRuntime({ demo: options.demo, sessionsDir });

      if (!options.demo) {
        const { valid, errors } = validateEnvConfig(runtime.config);
        if (!valid) {
          console.error(errorBox('Provider configuration is incomplete', [...errors, 'Or run with --demo']));
          process.exitCode = 1;
          return;
        }
      }

      const repl = new ChatRepl({
        orchestrator: runtime.orchestrator,
        store: runtime.store,
        logger: runtime.logger,
        studentId: options.student,
        spinner: options.spinner,
      });
      await repl.run();
    });
}
