// Google Vertex AI Provider
// Uses @google-cloud/vertexai SDK for Gemini models with function calling

import {
  VertexAI,
  SchemaType,
  type ChatSession as VertexChatSession,
  type FunctionDeclaration,
  type FunctionDeclarationSchemaProperty,
  type GenerateContentResponse,
  type Part,
  type Tool,
} from '@google-cloud/vertexai';
import type { ChatSession, ModelClient, ModelReply, ModelTurn } from './types.js';
import type { ToolDeclaration, ToolParameter, ToolPayload } from '../services/tools/types.js';
import { MalformedCallError, RateLimitedError } from '../services/orchestrator/errors.js';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('vertex');

const RATE_LIMIT_PATTERN = /\b429\b|RESOURCE_EXHAUSTED|Resource exhausted/i;
const MALFORMED_FINISH_REASON = 'MALFORMED_FUNCTION_CALL';

export interface VertexProviderOptions {
  projectId: string;
  location: string;
  model: string;
  timeoutMs?: number;
}

const SCHEMA_TYPES: Record<ToolParameter['type'], SchemaType> = {
  string: SchemaType.STRING,
  number: SchemaType.NUMBER,
  boolean: SchemaType.BOOLEAN,
  array: SchemaType.ARRAY,
  object: SchemaType.OBJECT,
};

function toSchemaProperty(param: ToolParameter): FunctionDeclarationSchemaProperty {
  const property: FunctionDeclarationSchemaProperty = {
    type: SCHEMA_TYPES[param.type],
    description: param.description,
  };
  if (param.enum) property.enum = param.enum;
  if (param.type === 'array') property.items = { type: SchemaType.STRING };
  return property;
}

export function toVertexTools(declarations: ToolDeclaration[]): Tool[] {
  if (declarations.length === 0) return [];

  const functionDeclarations: FunctionDeclaration[] = declarations.map(decl => ({
    name: decl.name,
    description: decl.description,
    parameters: {
      type: SchemaType.OBJECT,
      properties: Object.fromEntries(decl.parameters.map(p => [p.name, toSchemaProperty(p)])),
      required: decl.parameters.filter(p => p.required).map(p => p.name),
    },
  }));

  return [{ functionDeclarations }];
}

// Function responses must be objects; scalars are wrapped
function toResponseObject(payload: ToolPayload): object {
  return typeof payload === 'object' ? payload : { result: payload };
}

export function toVertexParts(turn: ModelTurn): string | Part[] {
  if (turn.type === 'text') return turn.text;
  return [
    {
      functionResponse: {
        name: turn.result.name,
        response: toResponseObject(turn.result.payload),
      },
    },
  ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readReply(response: GenerateContentResponse): ModelReply {
  const candidate = response.candidates?.[0];
  const finishReason: string | undefined = candidate?.finishReason;

  if (finishReason === MALFORMED_FINISH_REASON) {
    throw new MalformedCallError('Malformed function call returned by the model');
  }

  const parts = candidate?.content?.parts ?? [];
  const text = parts
    .map(part => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');

  const first = parts[0];
  const call = first && 'functionCall' in first ? first.functionCall : undefined;
  if (call) {
    const args: unknown = call.args;
    return {
      text,
      finishReason,
      toolCall: { name: call.name, args: isRecord(args) ? { ...args } : {} },
    };
  }

  return { text, finishReason };
}

export function mapVertexError(err: unknown): unknown {
  const message = err instanceof Error ? err.message : String(err);
  if (RATE_LIMIT_PATTERN.test(message)) {
    return new RateLimitedError(message);
  }
  return err;
}

class VertexChat implements ChatSession {
  constructor(private readonly chat: VertexChatSession) {}

  async send(turn: ModelTurn): Promise<ModelReply> {
    let response: GenerateContentResponse;
    try {
      response = (await this.chat.sendMessage(toVertexParts(turn))).response;
    } catch (err) {
      const mapped = mapVertexError(err);
      if (mapped instanceof RateLimitedError) {
        log.warn({ err }, 'Vertex rate limited');
      }
      throw mapped;
    }
    return readReply(response);
  }
}

export class VertexProvider implements ModelClient {
  name = 'vertex';
  private client: VertexAI;

  constructor(private readonly options: VertexProviderOptions) {
    if (!options.projectId) {
      throw new Error('VERTEX_PROJECT_ID is required');
    }
    this.client = new VertexAI({
      project: options.projectId,
      location: options.location || 'asia-south1',
    });
  }

  startChat(tools: ToolDeclaration[]): ChatSession {
    const model = this.client.getGenerativeModel(
      {
        model: this.options.model,
        tools: toVertexTools(tools),
      },
      this.options.timeoutMs ? { timeout: this.options.timeoutMs } : undefined,
    );
    return new VertexChat(model.startChat());
  }
}
