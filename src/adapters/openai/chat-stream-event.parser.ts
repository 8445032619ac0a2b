import {
  CHAT_ROLES,
  ChatDelta,
  ChatRole,
  ChatStreamEvent,
  ChatUsage,
  ChoiceDelta,
} from "../../shared/types/chat";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, field: string): JsonObject {
  if (!isObject(value)) {
    throw new Error(`'${field}' must be an object`);
  }
  return value;
}

function requireString(source: JsonObject, field: string): string {
  const value = source[field];
  if (typeof value !== "string") {
    throw new Error(`'${field}' must be a string`);
  }
  return value;
}

function requireNumber(source: JsonObject, field: string): number {
  const value = source[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`'${field}' must be a number`);
  }
  return value;
}

// null and missing are the same thing on this wire.
function optionalString(source: JsonObject, field: string): string | undefined {
  const value = source[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`'${field}' must be a string or null`);
  }
  return value;
}

function isChatRole(value: string): value is ChatRole {
  return CHAT_ROLES.some((role) => role === value);
}

function parseDelta(value: unknown): ChatDelta {
  const raw = requireObject(value, "delta");
  const delta: ChatDelta = {};

  const role = optionalString(raw, "role");
  if (role !== undefined) {
    if (!isChatRole(role)) {
      throw new Error(`unknown role '${role}'`);
    }
    delta.role = role;
  }

  const content = optionalString(raw, "content");
  if (content !== undefined) {
    delta.content = content;
  }
  return delta;
}

function parseChoice(value: unknown): ChoiceDelta {
  const raw = requireObject(value, "choices[]");
  const choice: ChoiceDelta = {
    index: requireNumber(raw, "index"),
    delta: parseDelta(raw.delta),
  };

  const finishReason = optionalString(raw, "finish_reason");
  if (finishReason !== undefined) {
    choice.finish_reason = finishReason;
  }
  return choice;
}

function parseUsage(value: unknown): ChatUsage | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const raw = requireObject(value, "usage");
  return {
    prompt_tokens: requireNumber(raw, "prompt_tokens"),
    completion_tokens: requireNumber(raw, "completion_tokens"),
    total_tokens: requireNumber(raw, "total_tokens"),
  };
}

/**
 * Parses the JSON payload of one `data: ` frame. Throws when the text is not
 * JSON or does not have the shape of a chat completion chunk.
 */
export function parseChatStreamEvent(payload: string): ChatStreamEvent {
  const raw = requireObject(JSON.parse(payload), "event");

  if (!Array.isArray(raw.choices)) {
    throw new Error("'choices' must be an array");
  }

  const event: ChatStreamEvent = {
    object: requireString(raw, "object"),
    created: requireNumber(raw, "created"),
    model: requireString(raw, "model"),
    choices: raw.choices.map(parseChoice),
  };

  const id = optionalString(raw, "id");
  if (id !== undefined) {
    event.id = id;
  }
  const usage = parseUsage(raw.usage);
  if (usage) {
    event.usage = usage;
  }
  return event;
}
