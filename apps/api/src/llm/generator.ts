import { GenerationError } from "../services/errors";
import type { LLMProvider } from "./provider";
import { STAGE_SPECS, type StageSpecs } from "./prompts";
import type { GenerateOptions, Generator, StageInputs, StageName, StageOutputs } from "./stages";

/**
 * Generator backed by chat providers: prompt per stage, JSON-only reply,
 * validated with the stage's zod schema.
 */
export class LLMGenerator implements Generator {
  constructor(
    private readonly llm: LLMProvider,
    private readonly fast: LLMProvider = llm,
    private readonly specs: StageSpecs = STAGE_SPECS
  ) {}

  async generate<S extends StageName>(
    stage: S,
    input: StageInputs[S],
    opts: GenerateOptions = {}
  ): Promise<StageOutputs[S]> {
    const spec = this.specs[stage];
    const provider = spec.tier === "fast" ? this.fast : this.llm;

    try {
      const { json } = await provider.chat({
        messages: spec.messages(input),
        temperature: spec.temperature,
        json: { instruction: spec.instruction, parse: spec.parse },
        signal: opts.signal
      });

      if (json === undefined) throw new GenerationError(`${provider.name} returned no JSON`, { stage });
      return json;
    } catch (e) {
      if (e instanceof GenerationError && e.stage === undefined) {
        throw new GenerationError(`${stage}: ${e.message}`, {
          stage,
          status: e.status,
          systemic: e.systemic,
          cause: e
        });
      }
      throw e;
    }
  }
}
