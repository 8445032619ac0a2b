import type {
  FrameDecodeError,
  TransportError,
} from "../errors/assist-errors";

export type ChatRole = "user" | "assistant" | "system";

export const CHAT_ROLES: readonly ChatRole[] = ["user", "assistant", "system"];

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  stream: boolean;
}

export interface ChatUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatDelta {
  role?: ChatRole;
  // Absent means the frame carries no new text; never an empty insertion.
  content?: string;
}

export interface ChoiceDelta {
  index: number;
  delta: ChatDelta;
  finish_reason?: string;
}

export interface ChatStreamEvent {
  id?: string;
  object: string;
  created: number;
  model: string;
  choices: ChoiceDelta[];
  usage?: ChatUsage;
}

export type StreamItem =
  | { ok: true; event: ChatStreamEvent }
  | { ok: false; error: FrameDecodeError | TransportError };

export type ModelResolutionSource = "cli" | "default";
