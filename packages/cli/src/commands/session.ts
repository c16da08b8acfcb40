// ============================================================================
// stem-tutor session - Inspect and export stored sessions
// ============================================================================

import { Command, Option } from 'commander';
import { writeFile } from 'fs/promises';
import chalk from 'chalk';
import type { TranscriptFormat } from '@stem-tutor/session';
import { errorBox, formatSessionSummary, icons } from '../lib/ui.js';
import type { TutorRuntime } from '../lib/runtime.js';
import type { RuntimeFactory } from './types.js';

function isTranscriptFormat(value: string): value is TranscriptFormat {
  return value === 'markdown' || value === 'json';
}

export function createSessionCommand(createRuntime: RuntimeFactory): Command {
  const session = new Command('session').description('Inspect and export stored student sessions');

  // Without a sessions directory the store is in-memory and always empty
  const openRuntime = (command: Command): TutorRuntime | null => {
    const { sessionsDir } = command.optsWithGlobals<{ sessionsDir?: string }>();
    const runtime = createRuntime({ sessionsDir });
    if (!runtime.config.sessionsDir && !sessionsDir) {
      console.error(
        errorBox('No sessions directory configured', ['Set STEM_TUTOR_SESSIONS_DIR', 'Or pass --sessions-dir <dir>'])
      );
      process.exitCode = 1;
      return null;
    }
    return runtime;
  };

  // getSession would create an empty session for an unknown id
  const hasStudent = async (runtime: TutorRuntime, studentId: string): Promise<boolean> => {
    if ((await runtime.store.listStudents()).includes(studentId)) {
      return true;
    }
    console.error(errorBox(`No session stored for '${studentId}'`, ['Run: stem-tutor session list']));
    process.exitCode = 1;
    return false;
  };

  session
    .command('list')
    .description('List students with a stored session')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      const runtime = openRuntime(command);
      if (!runtime) return;

      const students = await runtime.store.listStudents();
      if (students.length === 0) {
        console.log(chalk.gray('No sessions stored yet.'));
        return;
      }
      for (const studentId of students) {
        console.log(`  ${icons.bullet} ${studentId}`);
      }
    });

  session
    .command('show')
    .description("Show a student's progress")
    .argument('<studentId>', 'Student id')
    .action(async (studentId: string, _options: Record<string, unknown>, command: Command) => {
      const runtime = openRuntime(command);
      if (!runtime || !(await hasStudent(runtime, studentId))) return;

      console.log(formatSessionSummary(await runtime.store.getSession(studentId)));
    });

  session
    .command('export')
    .description("Export a student's transcript")
    .argument('<studentId>', 'Student id')
    .addOption(new Option('-f, --format <format>', 'Transcript format').choices(['markdown', 'json']).default('markdown'))
    .option('-o, --output <file>', 'Write to a file instead of stdout')
    .action(async (studentId: string, options: { format: string; output?: string }, command: Command) => {
      const runtime = openRuntime(command);
      if (!runtime || !(await hasStudent(runtime, studentId))) return;

      const format = isTranscriptFormat(options.format) ? options.format : 'markdown';
      const transcript = await runtime.store.exportTranscript(studentId, format);

      if (options.output) {
        await writeFile(options.output, transcript, 'utf-8');
        console.log(`${icons.success} Wrote ${format} transcript to ${options.output}`);
      } else {
        console.log(transcript);
      }
    });

  return session;
}
