import { Anchor } from "../../domain/document/entities/anchor";

export type DocumentPosition = number | Anchor;

export interface DocumentEdit {
  range: readonly [DocumentPosition, DocumentPosition];
  text: string;
}

export interface DocumentSnapshot {
  readonly version: number;
  readonly length: number;
  text(): string;
  textForRange(start: number, end: number): string;
  reversedCharsAt(offset: number): Iterable<string>;
  anchorAfter(offset: number): Anchor;
  resolveAnchor(anchor: Anchor): number;
}

export interface EditableDocument {
  readonly id: string;
  snapshot(): DocumentSnapshot;
  edit(edits: readonly DocumentEdit[]): void;
}

export interface DocumentStorePort {
  open(filePath: string): Promise<EditableDocument>;
  save(filePath: string, document: EditableDocument): Promise<void>;
}
