import fs from "fs";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  FileStorage,
  buildDocumentPath,
  sanitizeFilename,
} from "../../src/services/file-storage.service";
import { StorageFailureError, ValidationFailureError } from "../../src/utils/app-errors";

describe("file storage", () => {
  let root: string;
  let storage: FileStorage;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "file-storage-"));
    storage = new FileStorage(root);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("writes a stream below the root and reports its size", async () => {
    const size = await storage.save(Readable.from([Buffer.from("hello "), Buffer.from("world")]), "amendments/4/a.txt");

    expect(size).toBe(11);
    expect(fs.readFileSync(path.join(root, "amendments", "4", "a.txt"), "utf8")).toBe("hello world");
    expect(await storage.exists("amendments/4/a.txt")).toBe(true);
  });

  it("removes the partial file when the stream fails", async () => {
    const failing = new Readable({
      read() {
        this.push("partial");
        this.destroy(new Error("client went away"));
      },
    });

    await expect(storage.save(failing, "amendments/5/broken.bin")).rejects.toBeInstanceOf(StorageFailureError);
    expect(fs.existsSync(path.join(root, "amendments", "5", "broken.bin"))).toBe(false);
  });

  it("ignores removal of a missing file", async () => {
    await expect(storage.remove("amendments/9/nothing.txt")).resolves.toBeUndefined();
    expect(await storage.exists("amendments/9/nothing.txt")).toBe(false);
  });

  it("refuses paths outside the root", () => {
    expect(() => storage.resolve("../outside.txt")).toThrow(ValidationFailureError);
    expect(storage.resolve("amendments/1/x.txt")).toBe(path.join(root, "amendments", "1", "x.txt"));
  });
});

describe("document paths", () => {
  it("reduces names to a safe segment", () => {
    expect(sanitizeFilename("Test Plan (v2).pdf")).toBe("Test_Plan_v2.pdf");
    expect(sanitizeFilename("../../etc/passwd")).toBe("passwd");
    expect(sanitizeFilename(".hidden")).toBe("hidden");
    expect(sanitizeFilename("???")).toBe("file");
  });

  it("groups files by amendment with a timestamp and token prefix", () => {
    expect(buildDocumentPath(12, "notes 1.txt", 1700000000000, "a1b2c3d4")).toBe(
      "amendments/12/1700000000000-a1b2c3d4-notes_1.txt"
    );
  });

  it("keeps same-name uploads in the same millisecond apart", () => {
    const first = buildDocumentPath(12, "plan.txt", 1700000000000);
    const second = buildDocumentPath(12, "plan.txt", 1700000000000);

    expect(first).toMatch(/^amendments\/12\/1700000000000-[0-9a-f]{8}-plan\.txt$/);
    expect(second).not.toBe(first);
  });
});
