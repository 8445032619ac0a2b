import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import { FileDocumentStoreAdapter } from "../../../adapters/document/file-document-store.adapter";

describe("FileDocumentStoreAdapter", () => {
  let tempDir: string;
  const store = new FileDocumentStoreAdapter();

  beforeEach(async () => {
    tempDir = await fsp.mkdtemp(path.join(os.tmpdir(), "assist-doc-"));
  });

  afterEach(async () => {
    await fsp.rm(tempDir, { recursive: true, force: true });
  });

  it("opens a file as an editable document and saves edits back", async () => {
    const filePath = path.join(tempDir, "notes.md");
    await fsp.writeFile(filePath, "# Notes\n", "utf-8");

    const document = await store.open(filePath);
    document.edit([{ range: [8, 8], text: "added\n" }]);
    await store.save(filePath, document);

    await expect(fsp.readFile(filePath, "utf-8")).resolves.toBe("# Notes\nadded\n");
    await expect(fsp.readdir(tempDir)).resolves.toEqual(["notes.md"]);
  });

  it("reports a missing file", async () => {
    const filePath = path.join(tempDir, "missing.md");

    await expect(store.open(filePath)).rejects.toThrow(
      `ファイルが見つかりません: ${filePath}`,
    );
  });
});
