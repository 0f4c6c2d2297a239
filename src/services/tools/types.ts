// Tool system types and interfaces
// Declarations are advertised to the model; definitions add the executor

export type ToolParameterType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum?: string[];
  default?: string | number | boolean;
}

export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: ToolParameter[];
}

export type ToolArguments = Record<string, unknown>;

export type ToolPayload = Record<string, unknown> | string | number | boolean;

export interface ToolDefinition extends ToolDeclaration {
  // Must not throw: failures come back as a default value or an error-shaped payload
  execute: (args: ToolArguments) => Promise<ToolPayload>;
}

export interface ToolCallRequest {
  name: string;
  args: ToolArguments;
}

export interface ToolCallResult {
  name: string;
  payload: ToolPayload;
}
