// ============================================================================
// File-backed Session Store
// One JSON document per student: <encoded-id>.session.json
// ============================================================================

import { promises as fs } from 'fs';
import path from 'path';
import type { Session } from '@stem-tutor/shared';
import { BaseSessionStore } from './session-store.js';
import { decodeSession, encodeSession } from './session-codec.js';
import type { SessionStoreOptions } from './types.js';

const SESSION_SUFFIX = '.session.json';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Session store persisted to a directory on disk
 */
export class FileSessionStore extends BaseSessionStore {
  private readonly sessionDir: string;
  private writeCounter = 0;

  constructor(sessionDir: string = './sessions', options: SessionStoreOptions = {}) {
    super(options);
    this.sessionDir = sessionDir;
  }

  protected async readSession(studentId: string): Promise<Session | null> {
    let content: string;
    try {
      content = await fs.readFile(this.getSessionPath(studentId), 'utf-8');
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const session = decodeSession(JSON.parse(content));
    if (session.studentId !== studentId) {
      throw new Error(`session file for '${studentId}' belongs to '${session.studentId}'`);
    }
    return session;
  }

  /**
   * Write to a temporary file and rename, so readers never see a partial document
   */
  protected async writeSession(session: Session): Promise<void> {
    await fs.mkdir(this.sessionDir, { recursive: true });

    const target = this.getSessionPath(session.studentId);
    const temp = `${target}.${process.pid}.${++this.writeCounter}.tmp`;
    const content = JSON.stringify(encodeSession(session), null, 2);

    try {
      await fs.writeFile(temp, content, 'utf-8');
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
  }

  async listStudents(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.sessionDir);
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    return files
      .filter((f) => f.endsWith(SESSION_SUFFIX))
      .map((f) => decodeURIComponent(f.slice(0, -SESSION_SUFFIX.length)))
      .sort();
  }

  private getSessionPath(studentId: string): string {
    return path.join(this.sessionDir, `${encodeURIComponent(studentId)}${SESSION_SUFFIX}`);
  }
}

/**
 * Create a new file-backed SessionStore instance
 */
export function createFileSessionStore(sessionDir?: string, options?: SessionStoreOptions): FileSessionStore {
  return new FileSessionStore(sessionDir, options);
}
