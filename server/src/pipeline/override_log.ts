import type { SessionManager, SessionPatch } from "../session_manager.js";
import { AuditWriteFailure } from "./errors.js";
import type { RemoteReviewSync, SyncLedger, SyncOutcome } from "./remote_sync.js";
import type { OverridableField, OverrideRow, SessionRecord, SyncStatus } from "./types.js";
import { errorMessage, nowIso } from "./utils.js";

function liveValue(session: SessionRecord, field: OverridableField): string | null {
  switch (field) {
    case "staging":
      return session.staging;
    case "transcript":
      return session.transcript;
    case "patient_id":
      return session.patient_id;
  }
}

function patchFor(field: OverridableField, value: string): SessionPatch {
  switch (field) {
    case "staging":
      return { staging: value };
    case "transcript":
      return { transcript: value };
    case "patient_id":
      return { patient_id: value };
  }
}

/** Keeps each delivery outcome as a row beside the override it belongs to. */
export class OverrideSyncLedger implements SyncLedger {
  constructor(private readonly sessions: SessionManager) {}

  async settle(row: OverrideRow, outcome: SyncOutcome): Promise<void> {
    await this.sessions.caseStore.appendOverrideSync({
      session_id: row.session_id,
      override_id: row.id,
      status: outcome.status,
      attempts: outcome.attempts,
      error: outcome.error
    });
  }
}

/**
 * Append-only record of clinician corrections. The audit row and the live field
 * change are committed together; the frozen case snapshot is never touched.
 */
export class OverrideAuditLog {
  constructor(
    private readonly sessions: SessionManager,
    private readonly sync: RemoteReviewSync | null = null
  ) {}

  async record(
    sessionId: string,
    clinicianId: string,
    field: OverridableField,
    newValue: string,
    reason: string
  ): Promise<OverrideRow> {
    if (reason.trim().length === 0) throw new Error("an override needs a reason");
    if (clinicianId.trim().length === 0) throw new Error("an override needs a clinician id");
    this.sessions.requireSession(sessionId);

    const row = await this.sessions.withWriteLock(sessionId, async (writer) => {
      const current = writer.current;
      try {
        return await this.sessions.caseStore.recordOverride(
          {
            session_id: sessionId,
            clinician_id: clinicianId,
            field,
            old_value: liveValue(current, field),
            new_value: newValue,
            reason
          },
          { ...current, ...patchFor(field, newValue), updated_at: nowIso() }
        );
      } catch (err) {
        throw new AuditWriteFailure(sessionId, `Override not recorded: ${errorMessage(err)}`, { cause: err });
      }
    });

    this.sessions.emit(sessionId, "override_recorded", {
      id: row.id,
      field: row.field,
      old_value: row.old_value,
      new_value: row.new_value,
      clinician_id: row.clinician_id,
      at: row.created_at
    });
    this.sync?.enqueue(row);
    return row;
  }

  /** Latest delivery outcome for an override; PENDING until one is kept. */
  syncStatus(sessionId: string, overrideId: number): SyncStatus {
    const rows = this.sessions.caseStore.listOverrideSync(sessionId).filter((r) => r.override_id === overrideId);
    return rows.length === 0 ? "PENDING" : rows[rows.length - 1].status;
  }

  /** Overrides across all sessions not yet delivered, oldest first. FAILED ones count. */
  pendingSync(): Array<OverrideRow & { sync_status: SyncStatus }> {
    const pending: Array<OverrideRow & { sync_status: SyncStatus }> = [];
    for (const session of this.sessions.listSessions()) {
      for (const row of this.history(session.session_id)) {
        const status = this.syncStatus(row.session_id, row.id);
        if (status !== "SYNCED") pending.push({ ...row, sync_status: status });
      }
    }
    return pending.sort((a, b) => (a.created_at === b.created_at ? 0 : a.created_at < b.created_at ? -1 : 1));
  }

  /** Re-queues undelivered overrides after a restart. Returns how many were queued. */
  resumePendingSync(): number {
    if (!this.sync?.enabled) return 0;
    const pending = this.pendingSync();
    for (const row of pending) this.sync.enqueue(row);
    return pending.length;
  }

  /** Overrides in the order they were applied, optionally for one field. */
  history(sessionId: string, field?: OverridableField): OverrideRow[] {
    return this.sessions.caseStore
      .listOverrides(sessionId)
      .filter((o) => !field || o.field === field)
      .sort((a, b) => (a.created_at === b.created_at ? a.id - b.id : a.created_at < b.created_at ? -1 : 1));
  }

  /** The value a field held before any override, and after each one in turn. */
  replay(sessionId: string, field: OverridableField): Array<string | null> {
    const rows = this.history(sessionId, field);
    if (rows.length === 0) {
      const session = this.sessions.requireSession(sessionId);
      return [liveValue(session, field)];
    }
    return [rows[0].old_value, ...rows.map((r) => r.new_value)];
  }
}
