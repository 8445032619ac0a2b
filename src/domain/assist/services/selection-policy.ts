import { InvalidSelectionError } from "../../../shared/errors/assist-errors";

/** Half-open `[start, end)` offsets into the document at invocation time. */
export interface SelectionRange {
  start: number;
  end: number;
}

const SELECTION_PATTERN = /^(\d+)\s*:\s*(\d+)$/;

export function parseSelectionRange(value: string): SelectionRange {
  const match = SELECTION_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidSelectionError(
      `選択範囲は <start>:<end> の形式で指定してください: ${value}`,
    );
  }
  return { start: Number(match[1]), end: Number(match[2]) };
}

export function normalizeSelections(
  selections: readonly SelectionRange[],
  documentLength: number,
): SelectionRange[] {
  const sorted = selections
    .map((selection) => ({ start: selection.start, end: selection.end }))
    .sort((a, b) => a.start - b.start || a.end - b.end);

  sorted.forEach((selection, i) => {
    if (
      !Number.isInteger(selection.start) ||
      !Number.isInteger(selection.end) ||
      selection.start < 0 ||
      selection.end < selection.start
    ) {
      throw new InvalidSelectionError(
        `不正な選択範囲です: ${selection.start}:${selection.end}`,
      );
    }
    if (selection.end > documentLength) {
      throw new InvalidSelectionError(
        `選択範囲がドキュメントの長さ (${documentLength}) を超えています: ${selection.start}:${selection.end}`,
      );
    }
    const previous = sorted[i - 1];
    if (previous && selection.start < previous.end) {
      throw new InvalidSelectionError(
        `選択範囲が重なっています: ${previous.start}:${previous.end} と ${selection.start}:${selection.end}`,
      );
    }
  });

  return sorted;
}
