// Conversation Orchestrator
// Drives one tool-augmented exchange with the model until it answers in text

import type { ModelClient, ModelReply } from '../../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolArguments, ToolDefinition, ToolParameter } from '../tools/types.js';
import { MalformedCallError } from './errors.js';
import { throwIfAborted } from '../../utils/deadline.js';
import { moduleLogger, type Logger } from '../../logger.js';

export interface RunOptions {
  signal?: AbortSignal;
}

function matchesType(value: unknown, type: ToolParameter['type']): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}

/**
 * Checks the model's arguments against the tool's declared parameters.
 * Throws MalformedCallError on a missing required argument or a type mismatch.
 */
export function validateToolArguments(tool: ToolDefinition, args: ToolArguments): void {
  for (const param of tool.parameters) {
    const value = args[param.name];
    if (value === undefined || value === null) {
      if (param.required) {
        throw new MalformedCallError(`Missing required argument "${param.name}" for ${tool.name}`, tool.name);
      }
      continue;
    }
    if (!matchesType(value, param.type)) {
      throw new MalformedCallError(
        `Argument "${param.name}" for ${tool.name} must be of type ${param.type}`,
        tool.name,
      );
    }
    if (param.enum && typeof value === 'string' && !param.enum.includes(value)) {
      throw new MalformedCallError(
        `Argument "${param.name}" for ${tool.name} must be one of: ${param.enum.join(', ')}`,
        tool.name,
      );
    }
  }
}

export class ConversationOrchestrator {
  private log: Logger;

  constructor(private readonly model: ModelClient, logger?: Logger) {
    this.log = logger ?? moduleLogger('orchestrator');
  }

  /**
   * Sends the prompt and services tool calls until the model replies without one.
   * At most `callBudget` tools are executed; past that the latest reply text is returned as is.
   */
  async run(prompt: string, tools: ToolRegistry, callBudget: number, options: RunOptions = {}): Promise<string> {
    const { signal } = options;
    throwIfAborted(signal, 'conversation');

    const chat = this.model.startChat(tools.describeAll());
    let reply: ModelReply = await chat.send({ type: 'text', text: prompt });
    let callCount = 0;

    while (reply.toolCall) {
      const call = reply.toolCall;
      callCount++;

      if (callCount > callBudget) {
        this.log.warn({ callBudget, tool: call.name }, 'Tool call budget exceeded, using latest reply');
        return reply.text;
      }

      const tool = tools.get(call.name);
      if (!tool) {
        this.log.warn({ tool: call.name }, 'Model requested an unknown tool, using latest reply');
        return reply.text;
      }

      validateToolArguments(tool, call.args);

      this.log.info({ tool: call.name, args: call.args, call: callCount }, 'Executing tool');
      const payload = await tool.execute(call.args);

      throwIfAborted(signal, 'conversation');
      reply = await chat.send({ type: 'tool_result', result: { name: call.name, payload } });
    }

    return reply.text;
  }
}
