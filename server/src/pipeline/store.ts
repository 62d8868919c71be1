import fs from "node:fs/promises";
import path from "node:path";
import type {
  DebateOutput,
  EvidenceItem,
  NewDebateOutput,
  NewEvidenceItem,
  NewOncoCase,
  NewOverride,
  NewVramLog,
  OncoCaseRow,
  NewOverrideSync,
  OverrideRow,
  OverrideSyncRow,
  SessionInputs,
  SessionRecord,
  VramLogRow
} from "./types.js";
import { UnknownSession } from "./errors.js";
import {
  appendJsonLine,
  ensureDir,
  fileSizeOrZero,
  nowIso,
  outputRootAbs,
  readJsonLines,
  sessionDirAbs,
  tryReadJsonFile,
  writeJsonFile
} from "./utils.js";

export const CHILD_TABLES = ["evidence_items", "debate_outputs", "onco_cases", "overrides", "override_sync", "vram_logs"] as const;
export type ChildTable = (typeof CHILD_TABLES)[number];

type ChildRow = {
  evidence_items: EvidenceItem;
  debate_outputs: DebateOutput;
  onco_cases: OncoCaseRow;
  overrides: OverrideRow;
  override_sync: OverrideSyncRow;
  vram_logs: VramLogRow;
};

export const SESSION_FILENAME = "session.json";
export const INPUTS_FILENAME = "inputs.json";

export function childTablePath(sessionId: string, table: ChildTable): string {
  return path.join(sessionDirAbs(sessionId), `${table}.jsonl`);
}

/**
 * Persistence contract for the six logical tables. Child rows are append-only;
 * the session record is the only row that is ever rewritten.
 */
export interface CaseStore {
  init(): Promise<void>;
  createSession(row: SessionRecord, inputs: SessionInputs): Promise<SessionRecord>;
  writeSession(row: SessionRecord): Promise<SessionRecord>;
  getSession(sessionId: string): SessionRecord | null;
  getInputs(sessionId: string): SessionInputs | null;
  listSessions(): SessionRecord[];

  appendEvidence(row: NewEvidenceItem): Promise<EvidenceItem>;
  listEvidence(sessionId: string): EvidenceItem[];
  appendDebateOutput(row: NewDebateOutput): Promise<DebateOutput>;
  listDebateOutputs(sessionId: string): DebateOutput[];
  /** Appends the case row and rewrites the session record as one unit. */
  finalizeCase(row: NewOncoCase, next: SessionRecord): Promise<OncoCaseRow>;
  getCase(sessionId: string): OncoCaseRow | null;
  /** Appends the override row and rewrites the session record as one unit. */
  recordOverride(row: NewOverride, next: SessionRecord): Promise<OverrideRow>;
  listOverrides(sessionId: string): OverrideRow[];
  appendOverrideSync(row: NewOverrideSync): Promise<OverrideSyncRow>;
  listOverrideSync(sessionId: string): OverrideSyncRow[];
  appendVramLog(row: NewVramLog): Promise<VramLogRow>;
  listVramLogs(sessionId: string): VramLogRow[];
}

export class FileCaseStore implements CaseStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly inputs = new Map<string, SessionInputs>();
  private readonly rows: { [K in ChildTable]: Map<string, ChildRow[K][]> } = {
    evidence_items: new Map(),
    debate_outputs: new Map(),
    onco_cases: new Map(),
    overrides: new Map(),
    override_sync: new Map(),
    vram_logs: new Map()
  };
  private readonly sequences = new Map<ChildTable, number>();
  private readonly chains = new Map<string, Promise<void>>();

  async init(): Promise<void> {
    await ensureDir(outputRootAbs());
    const entries = await fs.readdir(outputRootAbs(), { withFileTypes: true });
    for (const ent of entries) {
      if (!ent.isDirectory()) continue;
      const sessionId = ent.name;
      const session = await tryReadJsonFile<SessionRecord>(path.join(sessionDirAbs(sessionId), SESSION_FILENAME));
      if (!session) continue;
      this.sessions.set(sessionId, Object.freeze(session));
      const inputs = await tryReadJsonFile<SessionInputs>(path.join(sessionDirAbs(sessionId), INPUTS_FILENAME));
      this.inputs.set(sessionId, inputs ?? {});

      for (const table of CHILD_TABLES) await this.loadTable(sessionId, table);
    }
  }

  async createSession(row: SessionRecord, inputs: SessionInputs): Promise<SessionRecord> {
    if (this.sessions.has(row.session_id)) throw new Error(`session already exists: ${row.session_id}`);
    const dir = sessionDirAbs(row.session_id);
    await ensureDir(dir);
    await writeJsonFile(path.join(dir, INPUTS_FILENAME), inputs);
    await writeJsonFile(path.join(dir, SESSION_FILENAME), row);
    const frozen = Object.freeze({ ...row });
    this.sessions.set(row.session_id, frozen);
    this.inputs.set(row.session_id, inputs);
    return frozen;
  }

  writeSession(row: SessionRecord): Promise<SessionRecord> {
    return this.serialize(`${row.session_id}:session`, async () => {
      this.requireSession(row.session_id);
      await writeJsonFile(path.join(sessionDirAbs(row.session_id), SESSION_FILENAME), row);
      const frozen = Object.freeze({ ...row });
      this.sessions.set(row.session_id, frozen);
      return frozen;
    });
  }

  getSession(sessionId: string): SessionRecord | null {
    return this.sessions.get(sessionId) ?? null;
  }

  getInputs(sessionId: string): SessionInputs | null {
    return this.inputs.get(sessionId) ?? null;
  }

  listSessions(): SessionRecord[] {
    return [...this.sessions.values()];
  }

  appendEvidence(row: NewEvidenceItem): Promise<EvidenceItem> {
    return this.append("evidence_items", row.session_id, (id) => ({ ...row, id, created_at: nowIso() }));
  }

  listEvidence(sessionId: string): EvidenceItem[] {
    return this.list("evidence_items", sessionId);
  }

  appendDebateOutput(row: NewDebateOutput): Promise<DebateOutput> {
    return this.append(
      "debate_outputs",
      row.session_id,
      (id) => ({ ...row, id, created_at: nowIso() }),
      () => {
        const expected = this.bucket("debate_outputs", row.session_id).length + 1;
        if (row.pass_number !== expected) {
          throw new Error(`debate pass ${row.pass_number} out of order for ${row.session_id}; expected ${expected}`);
        }
      }
    );
  }

  listDebateOutputs(sessionId: string): DebateOutput[] {
    return this.list("debate_outputs", sessionId);
  }

  finalizeCase(row: NewOncoCase, next: SessionRecord): Promise<OncoCaseRow> {
    return this.appendWithSession(
      "onco_cases",
      row.session_id,
      next,
      (id) => ({ ...row, id, created_at: nowIso() }),
      () => {
        if (this.list("onco_cases", row.session_id).length > 0) {
          throw new Error(`case already finalized for ${row.session_id}`);
        }
      }
    );
  }

  getCase(sessionId: string): OncoCaseRow | null {
    return this.list("onco_cases", sessionId)[0] ?? null;
  }

  recordOverride(row: NewOverride, next: SessionRecord): Promise<OverrideRow> {
    return this.appendWithSession("overrides", row.session_id, next, (id) => ({ ...row, id, created_at: nowIso() }));
  }

  listOverrides(sessionId: string): OverrideRow[] {
    return this.list("overrides", sessionId);
  }

  appendOverrideSync(row: NewOverrideSync): Promise<OverrideSyncRow> {
    return this.append("override_sync", row.session_id, (id) => ({ ...row, id, created_at: nowIso() }));
  }

  listOverrideSync(sessionId: string): OverrideSyncRow[] {
    return this.list("override_sync", sessionId);
  }

  /** Write chains still holding a pending task. */
  get activeChains(): number {
    return this.chains.size;
  }

  appendVramLog(row: NewVramLog): Promise<VramLogRow> {
    return this.append("vram_logs", row.session_id, (id) => ({ ...row, id }));
  }

  listVramLogs(sessionId: string): VramLogRow[] {
    return this.list("vram_logs", sessionId);
  }

  private requireSession(sessionId: string): void {
    if (!this.sessions.has(sessionId)) throw new UnknownSession(sessionId);
  }

  private nextId(table: ChildTable): number {
    const id = (this.sequences.get(table) ?? 0) + 1;
    this.sequences.set(table, id);
    return id;
  }

  private bucket<T extends ChildTable>(table: T, sessionId: string): ChildRow[T][] {
    const byTable: Map<string, ChildRow[T][]> = this.rows[table];
    let rows = byTable.get(sessionId);
    if (!rows) {
      rows = [];
      byTable.set(sessionId, rows);
    }
    return rows;
  }

  private list<T extends ChildTable>(table: T, sessionId: string): ChildRow[T][] {
    return [...this.bucket(table, sessionId)];
  }

  private append<T extends ChildTable>(
    table: T,
    sessionId: string,
    build: (id: number) => ChildRow[T],
    validate?: () => void
  ): Promise<ChildRow[T]> {
    return this.serialize(`${sessionId}:${table}`, async () => {
      this.requireSession(sessionId);
      validate?.();
      const row = build(this.nextId(table));
      await appendJsonLine(childTablePath(sessionId, table), row);
      Object.freeze(row);
      this.bucket(table, sessionId).push(row);
      return row;
    });
  }

  /**
   * Appends a child row and rewrites the session record together. When the
   * session write fails the row is cut back out of the table.
   */
  private appendWithSession<T extends ChildTable>(
    table: T,
    sessionId: string,
    next: SessionRecord,
    build: (id: number) => ChildRow[T],
    validate?: () => void
  ): Promise<ChildRow[T]> {
    return this.serialize(`${sessionId}:${table}`, () =>
      this.serialize(`${sessionId}:session`, async () => {
        this.requireSession(sessionId);
        if (next.session_id !== sessionId) throw new Error(`session record ${next.session_id} does not match ${sessionId}`);
        validate?.();
        const filePath = childTablePath(sessionId, table);
        const sizeBefore = await fileSizeOrZero(filePath);
        const row = build(this.nextId(table));
        await appendJsonLine(filePath, row);

        try {
          await writeJsonFile(path.join(sessionDirAbs(sessionId), SESSION_FILENAME), next);
        } catch (err) {
          await fs.truncate(filePath, sizeBefore);
          throw err;
        }

        Object.freeze(row);
        this.bucket(table, sessionId).push(row);
        this.sessions.set(sessionId, Object.freeze({ ...next }));
        return row;
      })
    );
  }

  private async loadTable<T extends ChildTable>(sessionId: string, table: T): Promise<void> {
    const loaded = await readJsonLines<ChildRow[T]>(childTablePath(sessionId, table), { repair: true });
    const rows = this.bucket(table, sessionId);
    for (const row of loaded) {
      Object.freeze(row);
      rows.push(row);
      if (row.id > (this.sequences.get(table) ?? 0)) this.sequences.set(table, row.id);
    }
  }

  private serialize<T>(key: string, task: () => Promise<T>): Promise<T> {
    const prev = this.chains.get(key) ?? Promise.resolve();
    const next = prev.then(task);
    const tail: Promise<void> = next
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.chains.get(key) === tail) this.chains.delete(key);
      });
    this.chains.set(key, tail);
    return next;
  }
}
