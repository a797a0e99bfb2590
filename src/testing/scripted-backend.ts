import type { TextGenerationBackend } from '../llm/types.js';

export type ScriptStep = string | Error;

/** Replays canned responses in order and records every prompt it receives. */
export class ScriptedBackend implements TextGenerationBackend {
  readonly prompts: string[] = [];
  private steps: ScriptStep[];

  constructor(steps: ScriptStep[]) {
    this.steps = [...steps];
  }

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error('ScriptedBackend ran out of responses');
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}
