import type { SessionManager } from "../session_manager.js";
import type { ResourceLeaseGovernor } from "./lease_governor.js";
import type { SessionInputs } from "./types.js";

/**
 * Everything a pipeline component needs for one session, passed explicitly
 * from stage to stage.
 */
export type SessionContext = {
  readonly sessionId: string;
  readonly inputs: SessionInputs;
  readonly signal: AbortSignal;
  readonly sessions: SessionManager;
  readonly governor: ResourceLeaseGovernor;
};

export function createSessionContext(args: {
  sessionId: string;
  sessions: SessionManager;
  governor: ResourceLeaseGovernor;
  signal: AbortSignal;
}): SessionContext {
  return {
    sessionId: args.sessionId,
    inputs: args.sessions.getInputs(args.sessionId),
    signal: args.signal,
    sessions: args.sessions,
    governor: args.governor
  };
}

export function throwIfCancelled(ctx: SessionContext): void {
  if (ctx.signal.aborted) throw new Error("Cancelled");
}
