/**
 * Chat model capability used by the agent to rank retrieved context
 */
export interface ChatModel {
  readonly name: string
  readonly model: string
  invoke(prompt: string): Promise<string>
  isTransientError(error: unknown): boolean
}
