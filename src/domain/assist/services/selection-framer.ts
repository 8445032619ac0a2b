import { Anchor } from "../../document/entities/anchor";
import { EditableDocument } from "../../../ports/outbound/document.port";
import { SelectionRange } from "./selection-policy";

export const SELECTION_START_MARKER = "->->";
export const SELECTION_END_MARKER = "<-<-";
export const TRAILING_NEWLINES = 4;

export interface FramedSelection {
  userMessage: string;
  insertionSite: Anchor;
}

/**
 * Builds the user message by wrapping every selection in sentinel markers,
 * then pads the document to four trailing newlines and anchors the response
 * two characters before the end, inside that padding.
 *
 * `selections` must be sorted and non-overlapping (see normalizeSelections).
 */
export function frameSelections(
  document: EditableDocument,
  selections: readonly SelectionRange[],
): FramedSelection {
  const snapshot = document.snapshot();
  let userMessage = "";
  let cursor = 0;

  for (const selection of selections) {
    userMessage += snapshot.textForRange(cursor, selection.start);
    userMessage += SELECTION_START_MARKER;
    userMessage += snapshot.textForRange(selection.start, selection.end);
    userMessage += SELECTION_END_MARKER;
    cursor = selection.end;
  }
  if (cursor < snapshot.length) {
    userMessage += snapshot.textForRange(cursor, snapshot.length);
  }

  const existing = countTrailingNewlines(
    snapshot.reversedCharsAt(snapshot.length),
  );
  const missing = TRAILING_NEWLINES - existing;
  document.edit([
    { range: [snapshot.length, snapshot.length], text: "\n".repeat(missing) },
  ]);

  const padded = document.snapshot();
  return {
    userMessage,
    insertionSite: padded.anchorAfter(padded.length - 2),
  };
}

// Counting stops at the cap, so a longer run is left as it is.
function countTrailingNewlines(reversedChars: Iterable<string>): number {
  let count = 0;
  for (const char of reversedChars) {
    if (char !== "\n" || count === TRAILING_NEWLINES) {
      break;
    }
    count += 1;
  }
  return count;
}
