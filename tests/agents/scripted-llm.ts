import { BaseLlm } from '@google/adk';
import type { BaseLlmConnection, LlmRequest, LlmResponse } from '@google/adk';

/**
 * In-process model that replays a fixed list of responses, one per call,
 * and remembers the text of every request it was given.
 */
export class ScriptedLlm extends BaseLlm {
  readonly prompts: string[] = [];
  private step = 0;

  constructor(private readonly script: LlmResponse[]) {
    super({ model: 'scripted-model' });
  }

  async *generateContentAsync(llmRequest: LlmRequest): AsyncGenerator<LlmResponse, void> {
    this.prompts.push(
      llmRequest.contents
        .flatMap((content) => content.parts ?? [])
        .map((part) => part.text ?? '')
        .join('\n')
    );
    const response = this.script[this.step] ?? text('');
    this.step++;
    yield response;
  }

  async connect(_llmRequest: LlmRequest): Promise<BaseLlmConnection> {
    throw new Error('Live connections are not scripted');
  }

  get calls(): number {
    return this.step;
  }
}

export function toolCall(name: string, args: Record<string, unknown>): LlmResponse {
  return {
    content: { role: 'model', parts: [{ functionCall: { name, args } }] },
    turnComplete: false,
  };
}

export function text(value: string): LlmResponse {
  return {
    content: { role: 'model', parts: [{ text: value }] },
    turnComplete: true,
  };
}
