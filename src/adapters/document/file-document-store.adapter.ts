import { promises as fsp } from "fs";
import { TextBuffer } from "../../domain/document/entities/text-buffer";
import {
  DocumentStorePort,
  EditableDocument,
} from "../../ports/outbound/document.port";
import { errorCode } from "../../shared/errors/assist-errors";

export class FileDocumentStoreAdapter implements DocumentStorePort {
  async open(filePath: string): Promise<EditableDocument> {
    try {
      const text = await fsp.readFile(filePath, "utf-8");
      return new TextBuffer(text, filePath);
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        throw new Error(`ファイルが見つかりません: ${filePath}`);
      }
      throw error;
    }
  }

  async save(filePath: string, document: EditableDocument): Promise<void> {
    const tmpFile = `${filePath}.tmp-${process.pid}`;
    await fsp.writeFile(tmpFile, document.snapshot().text(), "utf-8");
    await fsp.rename(tmpFile, filePath);
  }
}
