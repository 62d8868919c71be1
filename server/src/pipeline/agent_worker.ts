import { Agent, MaxTurnsExceededError, ModelBehaviorError, Runner } from "@openai/agents";
import { LANGUAGE_TIER } from "./catalog.js";
import { WorkerInferenceFailure } from "./errors.js";
import { errorMessage } from "./utils.js";
import type { LanguageRequest, LanguageResult, LanguageWorker, ModelTier, WorkerConfig } from "./workers.js";

const DEFAULT_MODEL = "gpt-4.1-mini";
const baseSettings = { temperature: 0.2 };

export type AgentCompletion = (
  agent: Agent,
  prompt: string,
  options: { maxTurns: number; signal: AbortSignal }
) => Promise<string | undefined>;

export function runnerCompletion(runner: Runner = new Runner()): AgentCompletion {
  return async (agent, prompt, options) => {
    const result = await runner.run(agent, prompt, options);
    const out: unknown = result.finalOutput;
    return typeof out === "string" ? out : undefined;
  };
}

export function configuredModel(): string {
  const env = process.env.ONCO_MODEL;
  return env && env.trim().length > 0 ? env.trim() : DEFAULT_MODEL;
}

export function makePersonaAgent(persona: string, model: string, maxTokens: number): Agent {
  return new Agent({
    name: persona,
    model,
    modelSettings: { ...baseSettings, maxTokens },
    instructions: `You are the ${persona} on a virtual tumour board reviewing one patient.

Rules:
- Answer in plain prose, no markdown headings.
- Every factual statement cites its evidence tag exactly as written in the prompt, e.g. [EV-3].
- Never cite a tag that is not listed in the prompt.
- If the evidence does not support a conclusion, say so.`
  });
}

/** Persona passes served by a hosted model through the agents runner. */
export class AgentLanguageWorker implements LanguageWorker {
  readonly name = "persona-agent";
  readonly tier: ModelTier;
  private readonly model: string;
  private readonly maxTurns: number;
  private readonly complete: AgentCompletion;
  private readonly agents = new Map<string, Agent>();

  constructor(options: { model?: string; tier?: ModelTier; maxTurns?: number; complete?: AgentCompletion } = {}) {
    this.model = options.model ?? configuredModel();
    this.tier = options.tier ?? LANGUAGE_TIER;
    this.maxTurns = options.maxTurns ?? 2;
    this.complete = options.complete ?? runnerCompletion();
  }

  async invoke(request: LanguageRequest, config: WorkerConfig): Promise<LanguageResult> {
    const agent = this.agentFor(request.persona, request.maxTokens);
    try {
      const out = await this.complete(agent, request.prompt, { maxTurns: this.maxTurns, signal: config.signal });
      const text = out?.trim();
      if (!text) return { status: "FAILED", text: null, error: `${request.persona} produced no final output` };
      return { status: "SUCCESS", text };
    } catch (err) {
      if (err instanceof ModelBehaviorError || err instanceof MaxTurnsExceededError) {
        return { status: "FAILED", text: null, error: err.message };
      }
      throw new WorkerInferenceFailure(`debate_pass_${request.passNumber}`, errorMessage(err), { cause: err });
    }
  }

  private agentFor(persona: string, maxTokens: number): Agent {
    const key = `${persona}:${maxTokens}`;
    let agent = this.agents.get(key);
    if (!agent) {
      agent = makePersonaAgent(persona, this.model, maxTokens);
      this.agents.set(key, agent);
    }
    return agent;
  }
}
