import { throwIfCancelled, type SessionContext } from "./context.js";
import { DebateAborted, InvalidTransition, UngroundedClaim, WorkerInferenceFailure } from "./errors.js";
import { EvidenceTrace } from "./evidence_trace.js";
import { buildPersonaPrompt, PERSONAS, type PersonaSpec, type PromptDetail } from "./personas.js";
import type { DebateOutput } from "./types.js";
import type { LanguageWorker } from "./workers.js";

type AttemptResult = { ok: true; text: string } | { ok: false; error: Error };

/**
 * Five strictly ordered persona passes. Each pass sees every committed earlier
 * pass; nothing is persisted unless every citation in it resolves.
 */
export class PersonaDebateEngine {
  constructor(
    private readonly worker: LanguageWorker,
    private readonly personas: readonly PersonaSpec[] = PERSONAS
  ) {}

  async run(ctx: SessionContext): Promise<DebateOutput[]> {
    const { sessions, sessionId } = ctx;
    const session = sessions.requireSession(sessionId);
    if (session.status === "ESCALATED") {
      await sessions.transition(sessionId, "beginDebate", "debate_engine");
    } else if (session.status !== "DEBATE") {
      throw new InvalidTransition(sessionId, session.status, "beginDebate", `cannot debate a ${session.status} session`);
    }

    const startAt = sessions.listDebateOutputs(sessionId).length + 1;
    if (startAt > 1) sessions.log(sessionId, `Resuming debate at pass ${startAt}`, "debate");

    for (let passNumber = startAt; passNumber <= this.personas.length; passNumber++) {
      throwIfCancelled(ctx);
      const persona = this.personas[passNumber - 1];

      let attempt = await this.attempt(ctx, persona, passNumber, "full");
      if (!attempt.ok) {
        sessions.log(sessionId, `${persona.name} pass rejected (${attempt.error.message}); retrying with reduced context`, "debate");
        await sessions.degrade(sessionId, "DEGRADED", `debate pass ${passNumber} retried`);
        attempt = await this.attempt(ctx, persona, passNumber, "reduced");
      }

      if (!attempt.ok) {
        sessions.error(sessionId, `${persona.name} pass failed twice: ${attempt.error.message}`, "debate");
        await sessions.transition(sessionId, "abortDebate", "debate_engine");
        throw new DebateAborted(
          sessionId,
          passNumber,
          `Debate aborted at pass ${passNumber} (${persona.name}): ${attempt.error.message}`,
          { cause: attempt.error }
        );
      }

      await sessions.recordDebatePass({
        session_id: sessionId,
        pass_number: passNumber,
        persona: persona.name,
        output_text: attempt.text
      });
    }

    return sessions.listDebateOutputs(sessionId);
  }

  private async attempt(
    ctx: SessionContext,
    persona: PersonaSpec,
    passNumber: number,
    detail: PromptDetail
  ): Promise<AttemptResult> {
    const { sessions, sessionId, governor } = ctx;
    const session = sessions.requireSession(sessionId);
    const evidence = sessions.listEvidence(sessionId);
    const prompt = buildPersonaPrompt({
      persona,
      passNumber,
      frame: session.clinical_frame,
      evidence,
      prior: sessions.listDebateOutputs(sessionId),
      detail
    });

    let text: string;
    try {
      const leased = await governor.withLease(
        this.worker.tier.estimatedMb,
        `debate_pass_${passNumber}`,
        { sessionId, model: this.worker.tier.model, signal: ctx.signal },
        () =>
          this.worker.invoke(
            { persona: persona.name, passNumber, prompt, maxTokens: persona.maxTokens },
            { sessionId, model: this.worker.tier.model, tier: 0, signal: ctx.signal }
          )
      );
      if (!leased.ok) return { ok: false, error: leased.error };
      if (leased.value.status === "FAILED") {
        return { ok: false, error: new WorkerInferenceFailure(`debate_pass_${passNumber}`, leased.value.error) };
      }
      text = leased.value.text.trim();
    } catch (err) {
      throwIfCancelled(ctx);
      return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
    }

    const check = new EvidenceTrace(sessionId, evidence).validate(text);
    if (!check.grounded) {
      const message =
        check.tags.length === 0 ? "output cites no evidence" : `unresolved citations: ${check.unresolved.join(", ")}`;
      return { ok: false, error: new UngroundedClaim(passNumber, check.unresolved, message) };
    }
    return { ok: true, text };
  }
}
