import type { SessionManager } from "../session_manager.js";
import type { NewVramLog } from "./types.js";
import { errorMessage } from "./utils.js";

/**
 * Persists governor samples to the session's vram_logs table and mirrors them on
 * the event stream as `lease` events. Writes are queued so the governor's
 * synchronous sampling never waits on disk.
 */
export class VramRecorder {
  private pending: Promise<void> = Promise.resolve();
  private failures = 0;

  constructor(private readonly sessions: SessionManager) {}

  readonly record = (sample: NewVramLog): void => {
    this.sessions.emit(sample.session_id, "lease", sample);
    this.pending = this.pending.then(async () => {
      try {
        await this.sessions.caseStore.appendVramLog(sample);
      } catch (err) {
        this.failures++;
        this.sessions.error(sample.session_id, `VRAM sample not recorded: ${errorMessage(err)}`, "vram");
      }
    });
  };

  get failedWrites(): number {
    return this.failures;
  }

  /** Resolves once every sample taken so far has been written or reported. */
  async flush(): Promise<void> {
    let current = this.pending;
    await current;
    while (current !== this.pending) {
      current = this.pending;
      await current;
    }
  }
}
