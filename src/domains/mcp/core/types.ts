// MCP Core Types
import type { Tool } from '@modelcontextprotocol/sdk/types.js'

export interface TextContent {
  type: 'text'
  text: string
}

// Every tool answers with exactly one text item
export interface ToolResponse {
  [key: string]: unknown
  content: [TextContent]
  isError?: boolean
}

export interface ToolHandler {
  getTools(): Tool[]
  handles(toolName: string): boolean
  handle(toolName: string, args: Record<string, unknown> | undefined): Promise<ToolResponse>
}

export function textResponse(text: string, isError = false): ToolResponse {
  return isError ? { content: [{ type: 'text', text }], isError: true } : { content: [{ type: 'text', text }] }
}
