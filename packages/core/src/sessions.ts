/**
 * Diagonal sessions
 *
 * A session zips several variables onto one shared axis for the length of
 * one formula evaluation. Each evaluation context owns its own registry,
 * so independent evaluations never see each other's groups.
 */

import {
  DiagonalConflictError,
  InvalidParameterError,
  LeakedSessionError,
  ShapeMismatchError,
} from './errors';
import type { Logger } from './logger';

export interface DiagonalMember {
  label: string;
  count: number;
}

export interface DiagonalGroup {
  readonly id: number;
  readonly labels: readonly string[];
  readonly count: number;
}

export class DiagonalSession {
  private closed = false;

  constructor(readonly group: DiagonalGroup) {}

  get open(): boolean {
    return !this.closed;
  }

  /** @internal used by the owning registry */
  markClosed(): void {
    this.closed = true;
  }
}

export class DiagonalSessionRegistry {
  private stack: DiagonalSession[] = [];
  private nextId = 1;

  constructor(private readonly logger?: Logger) {}

  get size(): number {
    return this.stack.length;
  }

  begin(members: readonly DiagonalMember[]): DiagonalSession {
    if (members.length < 2) {
      throw new InvalidParameterError(
        `A diagonal group needs at least 2 variables, got ${members.length}`
      );
    }

    const labels = members.map(m => m.label);
    const duplicate = labels.find((label, i) => labels.indexOf(label) !== i);
    if (duplicate !== undefined) {
      throw new InvalidParameterError(`Variable '${duplicate}' appears twice in one diagonal group`);
    }

    const count = members[0].count;
    const uneven = members.find(m => m.count !== count);
    if (uneven) {
      throw new ShapeMismatchError(
        `Diagonal group [${labels.join(', ')}] needs equal individual counts, ` +
        `'${members[0].label}' has ${count} and '${uneven.label}' has ${uneven.count}`
      );
    }

    for (const label of labels) {
      if (this.groupOf(label)) {
        throw new DiagonalConflictError(label);
      }
    }

    const session = new DiagonalSession({ id: this.nextId++, labels, count });
    this.stack.push(session);
    this.logger?.debug(`opened diagonal #${session.group.id} over [${labels.join(', ')}]`);
    return session;
  }

  end(session: DiagonalSession): void {
    if (!session.open) {
      throw new LeakedSessionError(`Diagonal session #${session.group.id} is already closed`);
    }

    const top = this.stack[this.stack.length - 1];
    if (top !== session) {
      const position = this.stack.indexOf(session);
      if (position < 0) {
        throw new LeakedSessionError(
          `Diagonal session #${session.group.id} belongs to another evaluation context`
        );
      }
      throw new LeakedSessionError(
        `Diagonal session #${session.group.id} closed while ` +
        `${this.stack.length - 1 - position} session(s) opened after it are still open`
      );
    }

    this.stack.pop();
    session.markClosed();
    this.logger?.debug(`closed diagonal #${session.group.id}`);
  }

  /**
   * Closes `session` together with every session opened after it, whatever
   * state the stack is in. Returns the error describing what was still
   * open (or already gone) so the caller can decide whether to raise it.
   */
  release(session: DiagonalSession): LeakedSessionError | undefined {
    const position = this.stack.indexOf(session);
    if (position < 0) {
      return new LeakedSessionError(
        session.open
          ? `Diagonal session #${session.group.id} belongs to another evaluation context`
          : `Diagonal session #${session.group.id} was closed before its scope ended`
      );
    }

    const closed = this.stack.splice(position);
    for (const s of closed) {
      s.markClosed();
    }
    this.logger?.debug(`closed diagonal #${session.group.id}`);

    const leaked = closed.slice(1);
    if (leaked.length === 0) {
      return undefined;
    }
    return new LeakedSessionError(
      `Diagonal session(s) ${listSessions(leaked)} left open inside #${session.group.id}`
    );
  }

  /**
   * Run `fn` with the members zipped, closing the session on every exit path.
   * Sessions `fn` leaves open are closed too and reported, unless `fn`
   * already threw.
   */
  withDiagonal<T>(members: readonly DiagonalMember[], fn: (session: DiagonalSession) => T): T {
    const session = this.begin(members);
    let failed = false;
    try {
      return fn(session);
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      this.settle([session], failed);
    }
  }

  /**
   * Releases scoped sessions, innermost first. A leak is thrown when the
   * scope succeeded and only logged when it is already unwinding an error.
   */
  settle(sessions: readonly DiagonalSession[], failed: boolean): void {
    let leak: LeakedSessionError | undefined;
    for (let i = sessions.length - 1; i >= 0; i--) {
      const found = this.release(sessions[i]);
      leak = leak ?? found;
    }
    if (!leak) {
      return;
    }
    if (failed) {
      this.logger?.warn(leak.message);
      return;
    }
    throw leak;
  }

  active(): DiagonalGroup[] {
    return this.stack.map(s => s.group);
  }

  groupOf(label: string): DiagonalGroup | undefined {
    return this.stack.find(s => s.group.labels.includes(label))?.group;
  }

  assertClosed(): void {
    if (this.stack.length > 0) {
      throw new LeakedSessionError(`Diagonal session(s) still open: ${listSessions(this.stack)}`);
    }
  }
}

function listSessions(sessions: readonly DiagonalSession[]): string {
  return sessions.map(s => `#${s.group.id} [${s.group.labels.join(', ')}]`).join(', ');
}
