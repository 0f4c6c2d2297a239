// Model client interface
// A chat session exchanges turns with a tool-capable model; each reply carries at most one tool call

import type { ToolCallRequest, ToolCallResult, ToolDeclaration } from '../services/tools/types.js';

export type ModelTurn =
  | { type: 'text'; text: string }
  | { type: 'tool_result'; result: ToolCallResult };

export interface ModelReply {
  text: string;
  toolCall?: ToolCallRequest;
  finishReason?: string;
}

export interface ChatSession {
  send(turn: ModelTurn): Promise<ModelReply>;
}

export interface ModelClient {
  name: string;
  startChat(tools: ToolDeclaration[]): ChatSession;
}
