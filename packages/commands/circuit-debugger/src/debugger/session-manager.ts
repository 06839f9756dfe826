import { randomUUID } from 'node:crypto';
import { logEvent } from '@circuit-debugger/core';

import { validateProgram } from '../artifact/validate-program.js';
import { DebuggerError } from '../errors/debugger-error.js';
import type { DebugResult } from '../errors/result.js';
import { failure, success } from '../errors/result.js';
import type {
  DebuggerCommand,
  DebuggerCommandResult,
  DebugSessionConfig,
  DebugSessionDescriptor,
  DebugSessionId,
  StartDebugSessionResponse,
} from '../types/index.js';
import { DebuggerSession } from './session.js';

/**
 * Owns independent debugger sessions keyed by id.
 */
export class DebuggerSessionManager {
  private readonly sessions = new Map<DebugSessionId, DebuggerSession>();

  /**
   * Validates the configuration, creates the session and runs it to its first
   * stop point. A session whose start ran into an execution failure stays
   * registered so it can be inspected and restarted.
   */
  public async startSession(
    config: DebugSessionConfig,
  ): Promise<DebugResult<StartDebugSessionResponse>> {
    const sessionId = config.id ?? randomUUID();
    if (this.sessions.has(sessionId)) {
      return failure(DebuggerError.duplicateSession(sessionId));
    }
    const invalid = this.validateConfig(config);
    if (invalid) {
      return failure(invalid);
    }

    const session = new DebuggerSession(sessionId, { ...config, id: sessionId });
    this.sessions.set(sessionId, session);
    const started = await session.start();
    if (!started.ok) {
      this.sessions.delete(sessionId);
      session.dispose();
      return started;
    }
    logEvent('info', 'manager:session-started', {
      sessionId,
      status: started.value.session.state.status,
    });
    return started;
  }

  public getSession(sessionId: DebugSessionId): DebuggerSession | undefined {
    return this.sessions.get(sessionId);
  }

  public getDescriptor(sessionId: DebugSessionId): DebugResult<DebugSessionDescriptor> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return failure(DebuggerError.unknownSession(sessionId));
    }
    return success(session.getDescriptor());
  }

  public async runCommand(
    command: DebuggerCommand,
  ): Promise<DebugResult<DebuggerCommandResult>> {
    const session = this.sessions.get(command.sessionId);
    if (!session) {
      return failure(DebuggerError.unknownSession(command.sessionId));
    }
    return session.runCommand(command);
  }

  /**
   * Removes a session.
   * @returns the descriptor of the session as it was closed
   */
  public closeSession(sessionId: DebugSessionId): DebugResult<DebugSessionDescriptor> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return failure(DebuggerError.unknownSession(sessionId));
    }
    this.sessions.delete(sessionId);
    session.dispose();
    logEvent('info', 'manager:session-closed', { sessionId });
    return success(session.getDescriptor());
  }

  public listSessions(): DebugSessionDescriptor[] {
    return Array.from(this.sessions.values(), (session) => session.getDescriptor());
  }

  private validateConfig(config: DebugSessionConfig): DebuggerError | undefined {
    const { maxScanSteps } = config;
    if (maxScanSteps !== undefined && (!Number.isInteger(maxScanSteps) || maxScanSteps < 1)) {
      return DebuggerError.invalidArtifact('maxScanSteps must be a positive integer');
    }
    return validateProgram(config.program);
  }
}
