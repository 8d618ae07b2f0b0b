import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ExtractionError, NotFoundError } from "@docboard/errors";
import type { IExtractor } from "./parser.interface.js";
import { TextExtractor } from "./text-extractor.js";
import { DocxExtractor } from "./docx-extractor.js";
import { getExtractor } from "./factory.js";
import { extractText, type FileDownloader } from "./extract-text.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "docboard-parser-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function downloaderOf(content: Buffer): FileDownloader {
  return {
    async downloadToFile(_key, destination) {
      await writeFile(destination, content);
      return content.length;
    },
  };
}

describe("TextExtractor", () => {
  it("decodes utf-8", async () => {
    const file = path.join(dir, "a.txt");
    await writeFile(file, "héllo wörld", "utf8");

    await expect(new TextExtractor().extract(file)).resolves.toBe("héllo wörld");
  });

  it("replaces invalid sequences instead of failing", async () => {
    const file = path.join(dir, "b.txt");
    await writeFile(file, Buffer.from([0x61, 0xff, 0x62]));

    await expect(new TextExtractor().extract(file)).resolves.toBe("a�b");
  });
});

describe("DocxExtractor", () => {
  it("rejects content that is not a docx archive", async () => {
    const file = path.join(dir, "broken.docx");
    await writeFile(file, "not a zip archive");

    await expect(new DocxExtractor().extract(file)).rejects.toThrow();
  });
});

describe("getExtractor", () => {
  it.each(["pdf", "docx", "txt"])("resolves %s", (fileType) => {
    expect(getExtractor(fileType).fileTypes).toContain(fileType);
  });

  it.each(["xlsx", "pptx", "exe"])("raises ExtractionError for %s", (fileType) => {
    expect(() => getExtractor(fileType)).toThrow(ExtractionError);
  });
});

describe("extractText", () => {
  it("downloads, extracts and removes the temporary file", async () => {
    const text = await extractText("docs/a.txt", "txt", {
      downloader: downloaderOf(Buffer.from("plain text body")),
      tmpDir: dir,
    });

    expect(text).toBe("plain text body");
    await expect(readdir(dir)).resolves.toEqual([]);
  });

  it("dispatches on the file type", async () => {
    const fakePdf: IExtractor = {
      fileTypes: ["pdf"],
      extract: vi.fn().mockResolvedValue("page one\n\npage two"),
    };

    const text = await extractText("docs/a.pdf", "pdf", {
      downloader: downloaderOf(Buffer.from("%PDF-1.4")),
      tmpDir: dir,
      extractors: [fakePdf, new TextExtractor()],
    });

    expect(text).toBe("page one\n\npage two");
    expect(fakePdf.extract).toHaveBeenCalledWith(expect.stringMatching(/^.*extract-.*\.pdf$/));
  });

  it("wraps extractor failures in ExtractionError and still cleans up", async () => {
    const failing: IExtractor = {
      fileTypes: ["docx"],
      extract: vi.fn().mockRejectedValue(new Error("corrupt zip")),
    };

    const err = await extractText("docs/a.docx", "docx", {
      downloader: downloaderOf(Buffer.from("x")),
      tmpDir: dir,
      extractors: [failing],
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExtractionError);
    expect(err).toMatchObject({ fileType: "docx" });
    await expect(readdir(dir)).resolves.toEqual([]);
  });

  it("lets storage errors through unchanged", async () => {
    const downloader: FileDownloader = {
      downloadToFile: vi.fn().mockRejectedValue(new NotFoundError("Object docs/gone.txt not found")),
    };

    await expect(
      extractText("docs/gone.txt", "txt", { downloader, tmpDir: dir }),
    ).rejects.toBeInstanceOf(NotFoundError);
    await expect(readdir(dir)).resolves.toEqual([]);
  });

  it("refuses unsupported types before downloading", async () => {
    const downloader: FileDownloader = { downloadToFile: vi.fn() };

    await expect(
      extractText("docs/a.xlsx", "xlsx", { downloader, tmpDir: dir }),
    ).rejects.toBeInstanceOf(ExtractionError);
    expect(downloader.downloadToFile).not.toHaveBeenCalled();
  });
});
