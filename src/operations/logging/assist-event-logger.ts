import { promises as fsp } from "fs";
import * as path from "path";
import { resolveConfigDir } from "../../adapters/config/file-config.adapter";
import { errorCode } from "../../shared/errors/assist-errors";
import { ModelResolutionSource } from "../../shared/types/chat";

const DEFAULT_LOG_FILE = "assist-events.jsonl";
const DEFAULT_MAX_LOG_BYTES = 1024 * 1024;

export interface AssistEventLogEntry {
  timestamp: string;
  invocation_id: string;
  event_type: "assist_started" | "assist_completed" | "assist_failed";
  document_path?: string;
  model?: string;
  resolution_source?: ModelResolutionSource;
  selection_count?: number;
  prompt?: string;
  inserted_text?: string;
  applied_deltas?: number;
  skipped_frames?: number;
  finish_reason?: string;
  total_tokens?: number;
  duration_ms?: number;
  error_name?: string;
  error_message?: string;
  status_code?: number;
}

export type AssistEventLogger = (entry: AssistEventLogEntry) => Promise<void>;

interface EventLogTarget {
  file: string;
  maxBytes: number;
  // Only a directory this module picked is narrowed to the owner.
  restrictDirectory: boolean;
}

const MASKING_RULES: ReadonlyArray<readonly [RegExp, string]> = [
  [/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi, "[REDACTED_EMAIL]"],
  [/\b(?:sk|pk)-[A-Za-z0-9_-]{16,}\b/g, "[REDACTED_KEY]"],
  [/\b(?:Bearer\s+)?[A-Za-z0-9._-]{32,}\b/g, "[REDACTED_TOKEN]"],
  [/\b(?:\d[ -]?){13,19}\b/g, "[REDACTED_NUMBER]"],
];

const MASKED_FIELDS = ["prompt", "inserted_text", "error_message"] as const;

function resolveTarget(): EventLogTarget {
  const explicitFile = process.env.ASSIST_EVENT_LOG_FILE?.trim();
  const logDir =
    process.env.ASSIST_EVENT_LOG_DIR?.trim() ||
    path.join(resolveConfigDir(), "logs");
  const maxBytes = Number(process.env.ASSIST_EVENT_LOG_MAX_BYTES);

  return {
    file: explicitFile || path.join(logDir, DEFAULT_LOG_FILE),
    maxBytes:
      Number.isFinite(maxBytes) && maxBytes > 0 ? maxBytes : DEFAULT_MAX_LOG_BYTES,
    restrictDirectory: !explicitFile,
  };
}

async function restrictMode(targetPath: string, mode: number): Promise<void> {
  try {
    await fsp.chmod(targetPath, mode);
  } catch (error) {
    // FAT and some Windows mounts have no POSIX modes.
    if (errorCode(error) !== "EPERM" && errorCode(error) !== "ENOTSUP") {
      throw error;
    }
  }
}

async function currentSize(file: string): Promise<number> {
  try {
    return (await fsp.stat(file)).size;
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return 0;
    }
    throw error;
  }
}

/** Creates the log directory and moves a full log aside under a timestamped name. */
async function prepareLogFile(target: EventLogTarget): Promise<void> {
  const logDir = path.dirname(target.file);
  await fsp.mkdir(logDir, { recursive: true });
  if (target.restrictDirectory) {
    await restrictMode(logDir, 0o700);
  }

  if ((await currentSize(target.file)) < target.maxBytes) {
    return;
  }
  const rotated = `${target.file}.${new Date().toISOString().replace(/[:.]/g, "-")}`;
  await fsp.rename(target.file, rotated);
  await restrictMode(rotated, 0o600);
}

export function maskSensitiveText(text: string): string {
  return MASKING_RULES.reduce(
    (masked, [pattern, replacement]) => masked.replace(pattern, replacement),
    text,
  );
}

export function sanitizeAssistEventLogEntry(
  entry: AssistEventLogEntry,
): AssistEventLogEntry {
  const sanitized = { ...entry };
  for (const field of MASKED_FIELDS) {
    const value = sanitized[field];
    if (value) {
      sanitized[field] = maskSensitiveText(value);
    }
  }
  return sanitized;
}

export const writeAssistEventLog: AssistEventLogger = async (entry) => {
  const target = resolveTarget();
  await prepareLogFile(target);

  const line = `${JSON.stringify(sanitizeAssistEventLogEntry(entry))}\n`;
  await fsp.appendFile(target.file, line, { encoding: "utf-8", mode: 0o600 });
  await restrictMode(target.file, 0o600);
};
