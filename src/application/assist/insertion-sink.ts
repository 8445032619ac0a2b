import { Anchor } from "../../domain/document/entities/anchor";
import { EditableDocument } from "../../ports/outbound/document.port";
import { FrameDecodeError } from "../../shared/errors/assist-errors";
import {
  ChatStreamEvent,
  ChatUsage,
  StreamItem,
} from "../../shared/types/chat";
import { Logger, logger as defaultLogger } from "../../utils/logger";

export interface InsertionSummary {
  insertedText: string;
  appliedDeltas: number;
  receivedEvents: number;
  skippedFrames: number;
  finishReason?: string;
  usage?: ChatUsage;
}

export interface InsertionOptions {
  onInsert?: (text: string) => void;
  logger?: Logger;
}

/**
 * Only the last choice of an event is applied; streams are requested with a
 * single choice.
 */
export function selectDeltaText(event: ChatStreamEvent): string | undefined {
  const choice = event.choices[event.choices.length - 1];
  return choice?.delta.content;
}

/**
 * Applies streamed deltas at `anchor`, strictly in arrival order. The anchor
 * is right-biased, so each insertion lands after the previous one without the
 * anchor ever being recreated. Undecodable frames are logged and skipped; a
 * transport failure ends the loop by throwing.
 */
export async function drainIntoDocument(
  document: EditableDocument,
  anchor: Anchor,
  items: AsyncIterable<StreamItem>,
  options: InsertionOptions = {},
): Promise<InsertionSummary> {
  const logger = options.logger ?? defaultLogger;
  const summary: InsertionSummary = {
    insertedText: "",
    appliedDeltas: 0,
    receivedEvents: 0,
    skippedFrames: 0,
  };

  for await (const item of items) {
    if (!item.ok) {
      if (item.error instanceof FrameDecodeError) {
        summary.skippedFrames += 1;
        await logger.warn(`${item.error.message} (frame: ${item.error.line})`);
        continue;
      }
      throw item.error;
    }

    summary.receivedEvents += 1;
    const { event } = item;
    const lastChoice = event.choices[event.choices.length - 1];
    if (lastChoice?.finish_reason) {
      summary.finishReason = lastChoice.finish_reason;
    }
    if (event.usage) {
      summary.usage = event.usage;
    }

    const text = selectDeltaText(event);
    if (text === undefined) {
      continue;
    }

    document.edit([{ range: [anchor, anchor], text }]);
    summary.insertedText += text;
    summary.appliedDeltas += 1;
    options.onInsert?.(text);
  }

  return summary;
}
