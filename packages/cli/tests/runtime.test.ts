// ============================================================================
// CLI runtime and chat tests
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Writable } from 'stream';
import { stripVTControlCharacters } from 'util';
import { mkdtempSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadEnvConfig, noopLogger } from '@stem-tutor/shared';
import { FileSessionStore, InMemorySessionStore } from '@stem-tutor/session';
import { createTutorRuntime } from '../src/lib/runtime.js';
import { ChatRepl } from '../src/lib/chat-repl.js';

describe('createTutorRuntime', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'stem-tutor-cli-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should keep sessions in memory without a directory', () => {
    const runtime = createTutorRuntime(loadEnvConfig({}), { demo: true, logger: noopLogger });

    expect(runtime.store).toBeInstanceOf(InMemorySessionStore);
    expect(runtime.registry.list()).toEqual(['concept-explainer', 'quiz-generator', 'web-search']);
  });

  it('should register only the configured endpoints', () => {
    const config = loadEnvConfig({
      STEM_TUTOR_EXPLAINER_URL: 'http://localhost:9001/explain',
      STEM_TUTOR_SESSIONS_DIR: testDir,
    });
    const runtime = createTutorRuntime(config, { logger: noopLogger });

    expect(runtime.store).toBeInstanceOf(FileSessionStore);
    expect(runtime.registry.list()).toEqual(['concept-explainer']);
  });

  it('should run a quiz end to end in demo mode', async () => {
    const runtime = createTutorRuntime(loadEnvConfig({}), {
      demo: true,
      sessionsDir: testDir,
      logger: noopLogger,
    });
    const { orchestrator } = runtime;

    const quiz = await orchestrator.handleMessage({ studentId: 'student-1', text: 'Give me a 2-question algebra quiz' });
    expect(quiz.metadata.quiz?.numQuestions).toBe(2);

    const graded = await orchestrator.submitQuizAnswer({ studentId: 'student-1', answer: 'a b' });
    expect(graded.text).toBe('You got 2 of 2 right.');
    expect(graded.metadata.quizOutcome).toBe(1);

    const session = await runtime.store.getSession('student-1');
    expect(session.proficiency.Math).toBe(0.65);
    expect(readdirSync(testDir)).toEqual(['student-1.session.json']);
  });
});

describe('ChatRepl', () => {
  function createRepl() {
    const runtime = createTutorRuntime(loadEnvConfig({}), { demo: true, logger: noopLogger });
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });

    const repl = new ChatRepl({
      orchestrator: runtime.orchestrator,
      store: runtime.store,
      logger: noopLogger,
      studentId: 'student-1',
      output,
      spinner: false,
    });
    const lines = () => stripVTControlCharacters(chunks.join('')).trimEnd().split('\n');
    return { repl, runtime, lines };
  }

  it('should send plain lines to the tutor', async () => {
    const { repl, runtime, lines } = createRepl();

    await expect(repl.handleLine('Explain Pythagoras theorem')).resolves.toBe(true);

    expect(lines()[0]).toBe("Here's a short demo explanation of pythagoras (Math).");
    expect((await runtime.store.getSession('student-1')).turns).toHaveLength(1);
  });

  it('should show the friendly message for rejected requests', async () => {
    const { repl, lines } = createRepl();

    await repl.handleLine('/quiz a');

    expect(lines()).toEqual(["There's no quiz waiting for an answer. Ask me for a quiz first!"]);
  });

  it('should stop on /exit and flag unknown commands', async () => {
    const { repl, lines } = createRepl();

    await expect(repl.handleLine('/exit')).resolves.toBe(false);
    await expect(repl.handleLine('/dance')).resolves.toBe(true);
    expect(lines()).toEqual(['Unknown command: /dance', 'Type /help for available commands']);
  });

  it('should export the transcript as JSON', async () => {
    const { repl, lines } = createRepl();
    await repl.handleLine('hello there');

    await repl.handleLine('/export json');

    const json = lines().slice(lines().indexOf('{')).join('\n');
    const exported: unknown = JSON.parse(json);
    expect(exported).toMatchObject({ version: '1.0', studentId: 'student-1' });
  });
});
