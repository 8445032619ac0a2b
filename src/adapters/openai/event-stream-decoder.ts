import { UnboundedChannel } from "../../shared/async/unbounded-channel";
import {
  FrameDecodeError,
  TransportError,
  errorCode,
  toErrorMessage,
} from "../../shared/errors/assist-errors";
import { StreamItem } from "../../shared/types/chat";
import { Logger, logger as defaultLogger } from "../../utils/logger";
import { parseChatStreamEvent } from "./chat-stream-event.parser";

export const DATA_PREFIX = "data: ";
const DONE_PAYLOAD = "[DONE]";

export type StreamBody = AsyncIterable<Uint8Array | string>;

export interface DecodeSummary {
  lines: number;
  events: number;
  decodeFailures: number;
  transportFailed: boolean;
}

function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  return new TransportError(
    `レスポンスの読み取り中に接続エラーが発生しました: ${toErrorMessage(error)}`,
    errorCode(error),
  );
}

/**
 * Reads a line-delimited event stream and republishes every `data: ` frame
 * onto `channel`, in arrival order. A frame that fails to decode is sent as
 * an error item and reading goes on. A partial line left when the body ends
 * is dropped. The channel is closed when reading stops, whatever the reason;
 * the returned promise never rejects.
 */
export async function decodeEventStream(
  body: StreamBody,
  channel: UnboundedChannel<StreamItem>,
  logger: Logger = defaultLogger,
): Promise<DecodeSummary> {
  const summary: DecodeSummary = {
    lines: 0,
    events: 0,
    decodeFailures: 0,
    transportFailed: false,
  };
  const decoder = new TextDecoder("utf-8");
  let buffer = "";

  const handleLine = (rawLine: string): void => {
    summary.lines += 1;
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (!line.startsWith(DATA_PREFIX)) {
      return;
    }

    const payload = line.slice(DATA_PREFIX.length);
    if (payload.trim() === DONE_PAYLOAD) {
      return;
    }

    try {
      channel.send({ ok: true, event: parseChatStreamEvent(payload) });
      summary.events += 1;
    } catch (error) {
      summary.decodeFailures += 1;
      channel.send({
        ok: false,
        error: new FrameDecodeError(line, toErrorMessage(error)),
      });
    }
  };

  try {
    for await (const chunk of body) {
      buffer +=
        typeof chunk === "string"
          ? chunk
          : decoder.decode(chunk, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      lines.forEach(handleLine);
    }
  } catch (error) {
    summary.transportFailed = true;
    channel.send({ ok: false, error: toTransportError(error) });
  } finally {
    channel.close();
  }

  await logger.debug(
    `event stream ended: lines=${summary.lines}, events=${summary.events}, decode_failures=${summary.decodeFailures}, transport_failed=${summary.transportFailed}`,
  );
  return summary;
}
