import { EventEmitter } from "node:events";
import type { CaseStore } from "./pipeline/store.js";
import { InvalidTransition, UnknownSession } from "./pipeline/errors.js";
import {
  degradationRank,
  type DebateOutput,
  type DegradationLevel,
  type EvidenceItem,
  type NewDebateOutput,
  type NewEvidenceItem,
  type NewOncoCase,
  type OncoCaseRow,
  type OverridableField,
  type SessionInputs,
  type SessionRecord,
  type SessionStatus
} from "./pipeline/types.js";
import { nowIso, randomSuffix } from "./pipeline/utils.js";

export type TransitionName = "beginTriage" | "escalate" | "beginDebate" | "abortDebate" | "finalize" | "fail";
export type TransitionActor = "scheduler" | "mode_bridge" | "debate_engine" | "case_builder" | "executor";

type TransitionRule = {
  from: readonly SessionStatus[];
  to: SessionStatus;
  actor: TransitionActor;
};

export const TRANSITIONS: Record<TransitionName, TransitionRule> = {
  beginTriage: { from: ["INITIALIZED"], to: "TRIAGE", actor: "scheduler" },
  escalate: { from: ["TRIAGE"], to: "ESCALATED", actor: "mode_bridge" },
  beginDebate: { from: ["ESCALATED"], to: "DEBATE", actor: "debate_engine" },
  abortDebate: { from: ["DEBATE"], to: "ESCALATED", actor: "debate_engine" },
  finalize: { from: ["DEBATE"], to: "FINALIZED", actor: "case_builder" },
  fail: { from: ["INITIALIZED", "TRIAGE", "ESCALATED", "DEBATE"], to: "ERRORED", actor: "executor" }
};

export const SESSION_EVENT_TYPES = [
  "status_changed",
  "degraded",
  "evidence_recorded",
  "debate_pass",
  "case_finalized",
  "override_recorded",
  "lease",
  "log",
  "error"
] as const;

export type SessionEventType = (typeof SESSION_EVENT_TYPES)[number];

export type SessionPatch = Partial<Pick<SessionRecord, "clinical_frame" | "transcript" | "staging" | "patient_id">>;

type SessionUpdate = Partial<Omit<SessionRecord, "session_id" | "created_at" | "updated_at">>;

/** Handle given to code running under a session's write lock. */
export type SessionWriter = {
  readonly current: SessionRecord;
  write(update: SessionUpdate): Promise<SessionRecord>;
};

export type SessionListItem = Pick<SessionRecord, "session_id" | "patient_id" | "status" | "degradation" | "created_at">;

const SESSION_ID_SUFFIX_LEN = 10;
const SESSION_ID_MAX_ATTEMPTS = 10;

export function isTerminalStatus(status: SessionStatus): boolean {
  return status === "FINALIZED" || status === "ERRORED";
}

export class SessionManager {
  private readonly emitters = new Map<string, EventEmitter>();
  private readonly locks = new Map<string, Promise<void>>();

  constructor(private readonly store: CaseStore) {}

  get caseStore(): CaseStore {
    return this.store;
  }

  async initFromDisk(): Promise<void> {
    await this.store.init();
    for (const session of this.store.listSessions()) {
      this.emitterFor(session.session_id);
      // Nothing is queued after a restart, so a session that never left intake can never progress.
      if (session.status === "INITIALIZED") {
        await this.transition(session.session_id, "fail", "executor");
        this.error(session.session_id, "Recovered after server restart before triage completed.");
      }
    }
  }

  async createSession(patientId: string, inputs: SessionInputs): Promise<SessionRecord> {
    const at = nowIso();
    const row: SessionRecord = {
      session_id: this.nextSessionId(),
      patient_id: patientId,
      created_at: at,
      status: "INITIALIZED",
      degradation: "FULL",
      staging: null,
      transcript: null,
      clinical_frame: null,
      updated_at: at
    };
    const created = await this.store.createSession(row, inputs);
    this.emitterFor(created.session_id);
    return created;
  }

  getSession(sessionId: string): SessionRecord | null {
    return this.store.getSession(sessionId);
  }

  requireSession(sessionId: string): SessionRecord {
    const session = this.store.getSession(sessionId);
    if (!session) throw new UnknownSession(sessionId);
    return session;
  }

  getInputs(sessionId: string): SessionInputs {
    return this.store.getInputs(sessionId) ?? {};
  }

  listSessions(): SessionListItem[] {
    return this.store
      .listSessions()
      .map((s) => ({
        session_id: s.session_id,
        patient_id: s.patient_id,
        status: s.status,
        degradation: s.degradation,
        created_at: s.created_at
      }))
      .sort((a, b) => (a.created_at < b.created_at ? 1 : -1));
  }

  /**
   * Runs `fn` while holding the session's write lock. Every change to the session
   * record goes through here, so pipeline stages and overrides never interleave.
   */
  withWriteLock<T>(sessionId: string, fn: (writer: SessionWriter) => Promise<T>): Promise<T> {
    const prev = this.locks.get(sessionId) ?? Promise.resolve();
    const run = prev.then(() => fn(this.writerFor(sessionId)));
    const tail: Promise<void> = run
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.locks.get(sessionId) === tail) this.locks.delete(sessionId);
      });
    this.locks.set(sessionId, tail);
    return run;
  }

  /** Sessions with a write still queued or running. */
  get activeLocks(): number {
    return this.locks.size;
  }

  /** Fields a clinician has overridden. Pipeline writes leave these alone. */
  overriddenFields(sessionId: string): Set<OverridableField> {
    return new Set(this.store.listOverrides(sessionId).map((o) => o.field));
  }

  transition(
    sessionId: string,
    name: TransitionName,
    actor: TransitionActor,
    patch: SessionPatch = {}
  ): Promise<SessionRecord> {
    return this.withWriteLock(sessionId, async (writer) => {
      const from = writer.current.status;
      this.checkTransition(writer.current, name, actor);
      const next = await writer.write({ ...this.withoutOverridden(sessionId, patch), status: TRANSITIONS[name].to });
      this.emit(sessionId, "status_changed", { transition: name, actor, from, to: next.status, at: next.updated_at });
      return next;
    });
  }

  /** The `finalize` transition, committed together with the case row. */
  finalizeWithCase(sessionId: string, row: NewOncoCase): Promise<{ session: SessionRecord; oncoCase: OncoCaseRow }> {
    return this.withWriteLock(sessionId, async (writer) => {
      const from = writer.current.status;
      this.checkTransition(writer.current, "finalize", "case_builder");
      // The case row keeps the computed stage; a clinician's live stage stands.
      const keepLive = this.overriddenFields(sessionId).has("staging");
      if (keepLive) {
        this.log(sessionId, `Kept clinician staging ${writer.current.staging ?? "null"} over computed ${row.staging}.`);
      }
      const next: SessionRecord = {
        ...writer.current,
        status: TRANSITIONS.finalize.to,
        staging: keepLive ? writer.current.staging : row.staging,
        updated_at: nowIso()
      };
      const oncoCase = await this.store.finalizeCase(row, next);
      this.emit(sessionId, "status_changed", {
        transition: "finalize",
        actor: "case_builder",
        from,
        to: next.status,
        at: next.updated_at
      });
      this.emit(sessionId, "case_finalized", { caseId: oncoCase.id, staging: oncoCase.staging, at: oncoCase.created_at });
      return { session: next, oncoCase };
    });
  }

  /** Lowers the degradation level. Requests to raise it are ignored. */
  degrade(sessionId: string, level: DegradationLevel, reason: string): Promise<SessionRecord> {
    return this.withWriteLock(sessionId, async (writer) => {
      const current = writer.current;
      if (degradationRank(level) <= degradationRank(current.degradation)) return current;
      const next = await writer.write({ degradation: level });
      this.emit(sessionId, "degraded", { from: current.degradation, to: level, reason, at: next.updated_at });
      return next;
    });
  }

  async recordEvidence(row: NewEvidenceItem): Promise<EvidenceItem> {
    const item = await this.store.appendEvidence(row);
    this.emit(row.session_id, "evidence_recorded", {
      id: item.id,
      modality: item.modality,
      status: item.status,
      confidence: item.confidence,
      at: item.created_at
    });
    return item;
  }

  listEvidence(sessionId: string): EvidenceItem[] {
    return this.store.listEvidence(sessionId);
  }

  async recordDebatePass(row: NewDebateOutput): Promise<DebateOutput> {
    const out = await this.store.appendDebateOutput(row);
    this.emit(row.session_id, "debate_pass", { passNumber: out.pass_number, persona: out.persona, at: out.created_at });
    return out;
  }

  listDebateOutputs(sessionId: string): DebateOutput[] {
    return this.store.listDebateOutputs(sessionId);
  }

  emit(sessionId: string, type: SessionEventType, payload: unknown): void {
    this.emitters.get(sessionId)?.emit(type, payload);
  }

  log(sessionId: string, message: string, stage?: string): void {
    this.emit(sessionId, "log", { message, stage, at: nowIso() });
  }

  error(sessionId: string, message: string, stage?: string): void {
    this.emit(sessionId, "error", { message, stage, at: nowIso() });
  }

  subscribe(sessionId: string, onEvent: (type: SessionEventType, payload: unknown) => void): (() => void) | null {
    const emitter = this.emitters.get(sessionId);
    if (!emitter) return null;

    const handlers = SESSION_EVENT_TYPES.map((type) => {
      const handler = (payload: unknown) => onEvent(type, payload);
      emitter.on(type, handler);
      return { type, handler };
    });

    return () => {
      for (const { type, handler } of handlers) emitter.off(type, handler);
    };
  }

  private withoutOverridden(sessionId: string, patch: SessionPatch): SessionPatch {
    const kept: SessionPatch = { ...patch };
    for (const field of this.overriddenFields(sessionId)) delete kept[field];
    return kept;
  }

  private checkTransition(current: SessionRecord, name: TransitionName, actor: TransitionActor): void {
    const rule = TRANSITIONS[name];
    if (rule.actor !== actor) {
      throw new InvalidTransition(
        current.session_id,
        current.status,
        name,
        `${name} may only be fired by ${rule.actor}, not ${actor}`
      );
    }
    if (!rule.from.includes(current.status)) {
      throw new InvalidTransition(
        current.session_id,
        current.status,
        name,
        `${name} is not allowed from ${current.status} (session ${current.session_id})`
      );
    }
  }

  private writerFor(sessionId: string): SessionWriter {
    const store = this.store;
    return {
      get current() {
        const session = store.getSession(sessionId);
        if (!session) throw new UnknownSession(sessionId);
        return session;
      },
      async write(update) {
        const session = store.getSession(sessionId);
        if (!session) throw new UnknownSession(sessionId);
        return store.writeSession({ ...session, ...update, updated_at: nowIso() });
      }
    };
  }

  private emitterFor(sessionId: string): EventEmitter {
    let emitter = this.emitters.get(sessionId);
    if (!emitter) {
      emitter = new EventEmitter();
      // "error" events with no listener would throw; the stream is optional.
      emitter.on("error", () => undefined);
      this.emitters.set(sessionId, emitter);
    }
    return emitter;
  }

  private nextSessionId(): string {
    for (let attempt = 0; attempt < SESSION_ID_MAX_ATTEMPTS; attempt++) {
      const id = `sess-${randomSuffix(SESSION_ID_SUFFIX_LEN)}`;
      if (!this.store.getSession(id)) return id;
    }
    throw new Error("Unable to allocate unique session id after retries");
  }
}
