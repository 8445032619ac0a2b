import { randomUUID } from "crypto";
import {
  DocumentEdit,
  DocumentPosition,
  DocumentSnapshot,
  EditableDocument,
} from "../../../ports/outbound/document.port";
import { Anchor, EditPatch, transformOffset } from "./anchor";

// Offsets are UTF-16 code unit indices, the same unit as String#length.

class BufferSnapshot implements DocumentSnapshot {
  constructor(
    private readonly bufferId: string,
    readonly version: number,
    private readonly content: string,
    // Shared, append-only: history[v] holds the patches that produced v + 1.
    private readonly history: readonly EditPatch[][],
  ) {}

  get length(): number {
    return this.content.length;
  }

  text(): string {
    return this.content;
  }

  textForRange(start: number, end: number): string {
    this.assertOffset(start);
    this.assertOffset(end);
    if (end < start) {
      throw new RangeError(`Invalid range: ${start}..${end}`);
    }
    return this.content.slice(start, end);
  }

  *reversedCharsAt(offset: number): Generator<string> {
    this.assertOffset(offset);
    for (let i = offset - 1; i >= 0; i -= 1) {
      yield this.content[i];
    }
  }

  anchorAfter(offset: number): Anchor {
    this.assertOffset(offset);
    return { bufferId: this.bufferId, version: this.version, offset, bias: "right" };
  }

  resolveAnchor(anchor: Anchor): number {
    if (anchor.bufferId !== this.bufferId) {
      throw new Error(
        `Anchor belongs to buffer '${anchor.bufferId}', not '${this.bufferId}'.`,
      );
    }
    if (anchor.version > this.version) {
      throw new RangeError(
        `Anchor version ${anchor.version} is newer than snapshot version ${this.version}.`,
      );
    }

    let offset = anchor.offset;
    for (let v = anchor.version; v < this.version; v += 1) {
      offset = transformOffset(offset, anchor.bias, this.history[v]);
    }
    return offset;
  }

  private assertOffset(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.content.length) {
      throw new RangeError(
        `Offset ${offset} is outside the document (length ${this.content.length}).`,
      );
    }
  }
}

interface ResolvedEdit {
  start: number;
  end: number;
  text: string;
}

/**
 * In-memory, versioned text document. Every `edit` call produces exactly one
 * new version; anchors created from any earlier snapshot stay resolvable.
 */
export class TextBuffer implements EditableDocument {
  readonly id: string;
  private content: string;
  private version = 0;
  private readonly history: EditPatch[][] = [];

  constructor(initialText = "", id: string = randomUUID()) {
    this.id = id;
    this.content = initialText;
  }

  snapshot(): DocumentSnapshot {
    return new BufferSnapshot(this.id, this.version, this.content, this.history);
  }

  edit(edits: readonly DocumentEdit[]): void {
    const current = this.snapshot();
    const resolved = edits
      .map((edit) => this.resolveEdit(current, edit))
      .filter((edit) => edit.start !== edit.end || edit.text.length > 0)
      .sort((a, b) => a.start - b.start);

    if (resolved.length === 0) {
      return;
    }

    for (let i = 1; i < resolved.length; i += 1) {
      if (resolved[i].start < resolved[i - 1].end) {
        throw new RangeError(
          `Overlapping edits: ${resolved[i - 1].start}..${resolved[i - 1].end} and ${resolved[i].start}..${resolved[i].end}`,
        );
      }
    }

    let next = "";
    let cursor = 0;
    for (const edit of resolved) {
      next += this.content.slice(cursor, edit.start) + edit.text;
      cursor = edit.end;
    }
    next += this.content.slice(cursor);

    this.history.push(
      resolved.map((edit) => ({
        oldStart: edit.start,
        oldEnd: edit.end,
        newLength: edit.text.length,
      })),
    );
    this.content = next;
    this.version += 1;
  }

  private resolveEdit(
    snapshot: DocumentSnapshot,
    edit: DocumentEdit,
  ): ResolvedEdit {
    const start = this.resolvePosition(snapshot, edit.range[0]);
    const end = this.resolvePosition(snapshot, edit.range[1]);
    if (end < start) {
      throw new RangeError(`Invalid edit range: ${start}..${end}`);
    }
    return { start, end, text: edit.text };
  }

  private resolvePosition(
    snapshot: DocumentSnapshot,
    position: DocumentPosition,
  ): number {
    if (typeof position === "number") {
      if (!Number.isInteger(position) || position < 0 || position > snapshot.length) {
        throw new RangeError(
          `Offset ${position} is outside the document (length ${snapshot.length}).`,
        );
      }
      return position;
    }
    return snapshot.resolveAnchor(position);
  }
}
