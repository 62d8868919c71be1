import type { SessionManager } from "./session_manager.js";
import { isTerminalStatus } from "./session_manager.js";
import { CasePersistenceFailure, DebateAborted } from "./pipeline/errors.js";
import type { ResourceLeaseGovernor } from "./pipeline/lease_governor.js";
import type { SessionStatus } from "./pipeline/types.js";
import { errorMessage } from "./pipeline/utils.js";

export type PipelineOptions = {
  signal: AbortSignal;
};

export type PipelineFn = (input: { sessionId: string }, sessions: SessionManager, options: PipelineOptions) => Promise<void>;

// Statuses a session can be (re)started from. ESCALATED and DEBATE are resting
// points after an aborted debate or a failed case commit.
export const RUNNABLE_STATUSES: readonly SessionStatus[] = ["INITIALIZED", "ESCALATED", "DEBATE"];

export class SessionExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];
  private readonly tasks = new Set<Promise<void>>();

  constructor(
    private readonly sessions: SessionManager,
    private readonly pipeline: PipelineFn,
    private readonly governor: ResourceLeaseGovernor,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(sessionId: string): boolean {
    return this.running.has(sessionId);
  }

  isQueued(sessionId: string): boolean {
    return this.queue.includes(sessionId);
  }

  enqueue(sessionId: string): boolean {
    const session = this.sessions.getSession(sessionId);
    if (!session) return false;

    if (this.queue.includes(sessionId) || this.running.has(sessionId)) return true;
    if (!RUNNABLE_STATUSES.includes(session.status)) return false;

    this.queue.push(sessionId);
    this.sessions.log(sessionId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  cancel(sessionId: string): boolean {
    if (!this.sessions.getSession(sessionId)) return false;

    const ctrl = this.running.get(sessionId);
    if (ctrl) {
      this.sessions.log(sessionId, "Cancellation requested");
      ctrl.abort();
      const released = this.governor.releaseAllFor(sessionId);
      if (released > 0) this.sessions.log(sessionId, `Released ${released} lease(s)`);
      return true;
    }

    const idx = this.queue.indexOf(sessionId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.sessions.error(sessionId, "Cancelled while queued");
      this.track(this.fail(sessionId));
      return true;
    }

    // Resting sessions (ESCALATED after an aborted debate, DEBATE after a failed commit) end here too.
    const session = this.sessions.requireSession(sessionId);
    if (isTerminalStatus(session.status)) return false;
    this.sessions.log(sessionId, `Cancellation requested while resting at ${session.status}`);
    const released = this.governor.releaseAllFor(sessionId);
    if (released > 0) this.sessions.log(sessionId, `Released ${released} lease(s)`);
    this.sessions.error(sessionId, "Cancelled");
    this.track(this.fail(sessionId));
    return true;
  }

  /** Resolves when nothing is queued or running. */
  async idle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  private drain(): void {
    while (this.running.size < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (next === undefined) return;
      // Registered before start() yields, so cancel() can reach it.
      this.running.set(next, new AbortController());
      this.track(this.start(next));
    }
  }

  private track(work: Promise<void>): void {
    const task = work.finally(() => {
      this.tasks.delete(task);
    });
    this.tasks.add(task);
  }

  private async start(sessionId: string): Promise<void> {
    const controller = this.running.get(sessionId) ?? new AbortController();
    this.sessions.log(sessionId, "Started");

    try {
      await this.pipeline({ sessionId }, this.sessions, { signal: controller.signal });
      this.sessions.log(sessionId, `Stopped at ${this.sessions.requireSession(sessionId).status}`);
    } catch (err) {
      if (controller.signal.aborted) {
        this.governor.releaseAllFor(sessionId);
        this.sessions.error(sessionId, "Cancelled");
        await this.fail(sessionId);
      } else if (err instanceof DebateAborted) {
        // Committed passes are kept; the session rests at ESCALATED and can be re-run.
        this.sessions.error(sessionId, err.message, "debate");
      } else if (err instanceof CasePersistenceFailure) {
        this.sessions.error(sessionId, err.message, "case_builder");
      } else {
        this.sessions.error(sessionId, errorMessage(err));
        await this.fail(sessionId);
      }
    } finally {
      this.running.delete(sessionId);
      this.drain();
    }
  }

  private async fail(sessionId: string): Promise<void> {
    const session = this.sessions.getSession(sessionId);
    if (!session || isTerminalStatus(session.status)) return;
    try {
      await this.sessions.transition(sessionId, "fail", "executor");
    } catch (err) {
      this.sessions.error(sessionId, `Could not mark session errored: ${errorMessage(err)}`);
    }
  }
}
