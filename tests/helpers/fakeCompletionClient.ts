import type { CompletionClient, CompletionOptions } from "../../server/providers/types.js";
import type { ProviderId } from "../../server/types/contracts.js";

export type ScriptedReply = string | Error;

export interface FakeCompletionClient extends CompletionClient {
  readonly prompts: string[];
  readonly calls: CompletionOptions[];
}

/**
 * Answers each `complete` call with the next scripted reply; errors are thrown.
 * Fails loudly when the script runs out.
 */
export function createFakeCompletionClient(
  replies: ScriptedReply[],
  providerId: ProviderId = "openai"
): FakeCompletionClient {
  const queue = [...replies];
  const prompts: string[] = [];
  const calls: CompletionOptions[] = [];

  return {
    providerId,
    prompts,
    calls,
    async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
      prompts.push(prompt);
      calls.push(options);
      const reply = queue.shift();
      if (reply === undefined) {
        throw new Error(`No scripted reply left for call ${prompts.length}.`);
      }
      if (reply instanceof Error) {
        throw reply;
      }
      return reply;
    }
  };
}
