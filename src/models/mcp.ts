// MCP-level shapes exchanged with tool, resource and prompt collaborators.
import type { JsonObject } from './jsonrpc';
import type { CancellationToken } from '../services/cancellation';
import type { ProgressTracker } from '../services/progress';
import type { RequestScope } from '../services/requestScope';
import type { Session } from '../server/session';

export interface TextContent {
  type: 'text';
  text: string;
}

/** Binary media travels base64 encoded. */
export interface ImageContent {
  type: 'image';
  data: string;
  mimeType: string;
}

export interface AudioContent {
  type: 'audio';
  data: string;
  mimeType: string;
}

export type ToolContent = TextContent | ImageContent | AudioContent;

export interface ToolCallResult {
  content: ToolContent[];
  isError?: boolean;
}

/** What every collaborator handler receives alongside its arguments. */
export interface HandlerContext {
  scope: RequestScope;
  session: Session;
  cancellation?: CancellationToken;
  /** Present when the caller asked for progress with `_meta.progressToken`. */
  progress?: ProgressTracker;
}

export interface ResourceContent {
  uri: string;
  mimeType?: string;
  text?: string;
  /** base64 */
  blob?: string;
}

export interface PromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

export interface PromptMessage {
  role: 'user' | 'assistant';
  content: TextContent;
}

export interface InitializeResult extends JsonObject {
  protocolVersion: string;
  capabilities: JsonObject;
  serverInfo: { name: string; version: string };
}
