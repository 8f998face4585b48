/**
 * Ollama ADK Integration
 *
 * Lets research runs use local Ollama models through Google ADK's BaseLlm
 * interface. Model names carry an 'ollama/' prefix (e.g. 'ollama/llama3.1:8b')
 * that is stripped before calling the Ollama API.
 *
 * Dependencies:
 * - @google/adk: BaseLlm for ADK integration
 * - @google/genai: Content, Part types for message format
 * - ollama: Native Ollama client for local LLM inference
 */
import { BaseLlm } from '@google/adk';
import type { BaseLlmConnection, BaseTool, LlmRequest, LlmResponse } from '@google/adk';
import type { Content, Part } from '@google/genai';
import { Ollama } from 'ollama';
import type { ChatResponse, Message, Tool, ToolCall } from 'ollama';
import { OLLAMA_MODEL_PREFIX } from '../config/index.js';
import { agentLogger } from '../utils/logger.js';

type OllamaParameters = NonNullable<Tool['function']['parameters']>;
type OllamaProperties = NonNullable<OllamaParameters['properties']>;

const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

export class OllamaLlm extends BaseLlm {
  static readonly supportedModels: Array<string | RegExp> = [/^ollama\/.*/];

  private readonly client: Ollama;
  private readonly actualModel: string;

  constructor({ model, host }: { model: string; host?: string }) {
    super({ model });
    this.actualModel = model.startsWith(OLLAMA_MODEL_PREFIX)
      ? model.slice(OLLAMA_MODEL_PREFIX.length)
      : model;
    this.client = new Ollama({ host: host ?? process.env['OLLAMA_HOST'] ?? DEFAULT_OLLAMA_HOST });
  }

  async *generateContentAsync(llmRequest: LlmRequest, stream = false): AsyncGenerator<LlmResponse, void> {
    const messages = toOllamaMessages(llmRequest.contents, llmRequest.config?.systemInstruction);
    const tools = toOllamaTools(llmRequest.toolsDict);
    const temperature = llmRequest.config?.temperature;
    const request = {
      model: this.actualModel,
      messages,
      tools: tools.length > 0 ? tools : undefined,
      options: temperature === undefined ? undefined : { temperature },
    };

    agentLogger.debug(
      { model: this.actualModel, messages: messages.length, tools: tools.map((t) => t.function.name), stream },
      'Calling Ollama'
    );

    try {
      if (stream) {
        for await (const chunk of await this.client.chat({ ...request, stream: true })) {
          yield toLlmResponse(chunk, !chunk.done);
        }
        return;
      }

      const response = await this.client.chat({ ...request, stream: false });
      agentLogger.debug(
        { done: response.done, toolCalls: response.message.tool_calls?.map((tc) => tc.function.name) ?? [] },
        'Ollama response received'
      );
      yield toLlmResponse(response, false);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      agentLogger.error({ error: message }, 'Error calling Ollama');
      yield {
        content: { role: 'model', parts: [{ text: `Error calling Ollama: ${message}` }] },
        errorCode: 'OLLAMA_ERROR',
        errorMessage: message,
        turnComplete: true,
      };
    }
  }

  async connect(_llmRequest: LlmRequest): Promise<BaseLlmConnection> {
    throw new Error('Ollama does not support live connections');
  }
}

/**
 * Converts ADK contents into Ollama chat messages. Function responses become
 * 'tool' messages, model turns with function calls become assistant messages
 * carrying tool_calls.
 */
export function toOllamaMessages(contents: Content[], systemInstruction?: unknown): Message[] {
  const messages: Message[] = [];

  const system = instructionText(systemInstruction);
  if (system) {
    messages.push({ role: 'system', content: system });
  }

  for (const content of contents) {
    const parts = content.parts ?? [];
    const responses = parts.flatMap((part) => (part.functionResponse ? [part.functionResponse] : []));

    if (responses.length > 0) {
      for (const response of responses) {
        messages.push({
          role: 'tool',
          content: JSON.stringify(response.response ?? {}),
          tool_name: response.name,
        });
      }
      continue;
    }

    const text = textOf(parts);
    const toolCalls: ToolCall[] = parts.flatMap((part) =>
      part.functionCall
        ? [{ function: { name: part.functionCall.name ?? '', arguments: part.functionCall.args ?? {} } }]
        : []
    );

    if (toolCalls.length > 0) {
      messages.push({ role: 'assistant', content: text, tool_calls: toolCalls });
      continue;
    }

    const role = content.role === 'model' ? 'assistant' : 'user';
    if (text || role === 'user') {
      messages.push({ role, content: text });
    }
  }

  return messages;
}

export function toOllamaTools(toolsDict: Record<string, BaseTool> | undefined): Tool[] {
  const tools: Tool[] = [];

  for (const tool of Object.values(toolsDict ?? {})) {
    const declaration = tool._getDeclaration?.();
    if (!declaration?.name) continue;

    tools.push({
      type: 'function',
      function: {
        name: declaration.name,
        description: declaration.description ?? '',
        parameters: toOllamaParameters(declaration.parameters),
      },
    });
  }

  return tools;
}

/**
 * A response with tool calls is never turn-complete, so ADK runs the tools
 * and asks the model again.
 */
export function toLlmResponse(response: Pick<ChatResponse, 'message' | 'done'>, partial: boolean): LlmResponse {
  const parts: Part[] = [];

  if (response.message.content) {
    parts.push({ text: response.message.content });
  }

  const toolCalls = response.message.tool_calls ?? [];
  for (const toolCall of toolCalls) {
    parts.push({ functionCall: { name: toolCall.function.name, args: toolCall.function.arguments } });
  }

  if (parts.length === 0) {
    parts.push({ text: '' });
  }

  return {
    content: { role: 'model', parts },
    partial,
    turnComplete: response.done && toolCalls.length === 0,
  };
}

/** Gemini schemas spell types in upper case ('OBJECT'); Ollama expects JSON Schema. */
function toOllamaParameters(schema: unknown): OllamaParameters {
  const source = isRecord(schema) ? schema : {};
  const declared = isRecord(source['properties']) ? source['properties'] : {};
  const properties: OllamaProperties = {};

  for (const [name, property] of Object.entries(declared)) {
    if (!isRecord(property)) continue;
    properties[name] = {
      type: typeName(property['type']),
      description: typeof property['description'] === 'string' ? property['description'] : '',
      ...(Array.isArray(property['enum']) ? { enum: property['enum'] } : {}),
    };
  }

  const required = Array.isArray(source['required'])
    ? source['required'].filter((key): key is string => typeof key === 'string')
    : [];

  return { type: 'object', required, properties };
}

function typeName(value: unknown): string {
  return typeof value === 'string' ? value.toLowerCase() : 'string';
}

function instructionText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map(instructionText).filter(Boolean).join('\n');
  if (isRecord(value)) {
    if (typeof value['text'] === 'string') return value['text'];
    if (Array.isArray(value['parts'])) return value['parts'].map(instructionText).join('');
  }
  return '';
}

function textOf(parts: Part[]): string {
  return parts.map((part) => part.text ?? '').join('');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
