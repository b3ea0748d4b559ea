import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { IOError } from "../errors";
import type { SourceDocument } from "../types/records";
import { NotionExportSource, extractMarkdownTitle } from "./notionExport";

const collect = async (source: NotionExportSource) => {
  const documents: SourceDocument[] = [];
  for await (const document of source.documents()) {
    documents.push(document);
  }
  return documents;
};

describe("extractMarkdownTitle", () => {
  it("uses the first level-one heading", () => {
    expect(extractMarkdownTitle("intro\n# Refund policy ##\n# Second")).toBe(
      "Refund policy"
    );
  });

  it("ignores deeper headings", () => {
    expect(extractMarkdownTitle("## Not a title\ntext")).toBeNull();
  });
});

describe("NotionExportSource", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "notion-export-"));
    await fs.mkdir(path.join(root, "Guides"));
    await fs.writeFile(
      path.join(root, "Guides", "Reset password 0123456789abcdef0123456789abcdef.md"),
      "Open settings and choose reset."
    );
    await fs.writeFile(path.join(root, "billing.md"), "# Billing FAQ\nInvoices go out monthly.");
    await fs.writeFile(path.join(root, "notes.txt"), "Plain text notes.");
    await fs.writeFile(path.join(root, "logo.png"), "not text");
    await fs.writeFile(path.join(root, ".hidden.md"), "# Hidden");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("yields one document per markdown or text file in a stable order", async () => {
    const documents = await collect(new NotionExportSource({ path: root, id: "kb" }));

    expect(documents.map((d) => d.id)).toEqual([
      "kb:Guides/Reset password 0123456789abcdef0123456789abcdef",
      "kb:billing",
      "kb:notes",
    ]);
    expect(documents.map((d) => d.title)).toEqual([
      "Reset password",
      "Billing FAQ",
      "notes",
    ]);
    expect(documents[1]).toMatchObject({
      sourceKind: "notion",
      origin: path.join(root, "billing.md"),
      text: "# Billing FAQ\nInvoices go out monthly.",
    });
  });

  it("accepts a single file as the export root", async () => {
    const documents = await collect(
      new NotionExportSource({ path: path.join(root, "notes.txt"), id: "single" })
    );

    expect(documents).toHaveLength(1);
    expect(documents[0].id).toBe("single:notes");
  });

  it("fails with an IOError when the export is missing", async () => {
    const source = new NotionExportSource({ path: path.join(root, "absent"), id: "kb" });

    await expect(collect(source)).rejects.toBeInstanceOf(IOError);
  });
});
