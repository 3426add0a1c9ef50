import fs from "fs";
import path from "path";
import request from "supertest";
import { afterAll, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "../../src/app";
import { fileStorage } from "../../src/services/file-storage.service";
import { dbInstance, insertAmendment, resetDatabase } from "../helpers/database";

const app = createApp();

const upload = (amendmentId: number | string, content: string, filename: string) =>
  request(app)
    .post(`/api/amendments/${amendmentId}/documents`)
    .attach("file", Buffer.from(content), filename);

describe("documents API", () => {
  let amendmentId: number;

  beforeEach(async () => {
    await resetDatabase();
    fs.rmSync(fileStorage.root, { recursive: true, force: true });
    amendmentId = (await insertAmendment()).id;
  });

  afterAll(async () => {
    await dbInstance.close();
  });

  it("stores an upload with its metadata", async () => {
    const res = await upload(amendmentId, "plan contents", "test plan.txt")
      .field("documentType", "Test Plan")
      .field("description", "First draft")
      .query({ uploaded_by: "frank" });

    expect(res.status).toBe(201);
    expect(res.body.data.documentName).toBe("test plan.txt");
    expect(res.body.data.originalFilename).toBe("test plan.txt");
    expect(res.body.data.documentType).toBe("Test Plan");
    expect(res.body.data.description).toBe("First draft");
    expect(res.body.data.uploadedBy).toBe("frank");
    expect(res.body.data.fileSize).toBe(13);
    expect(res.body.data.filePath).toMatch(new RegExp(`^amendments/${amendmentId}/\\d+-[0-9a-f]{8}-test_plan\\.txt$`));
    expect(fs.readFileSync(fileStorage.resolve(res.body.data.filePath), "utf8")).toBe("plan contents");
  });

  it("lists documents and downloads the original bytes", async () => {
    const created = await upload(amendmentId, "hello", "notes.txt").field("documentName", "Release notes");
    expect(created.body.data.documentName).toBe("Release notes");

    const list = await request(app).get(`/api/amendments/${amendmentId}/documents`);
    expect(list.status).toBe(200);
    expect(list.body.data).toHaveLength(1);

    const download = await request(app).get(`/api/amendments/documents/${created.body.data.id}/download`);
    expect(download.status).toBe(200);
    expect(download.text).toBe("hello");
    expect(download.headers["content-disposition"]).toContain('filename="notes.txt"');
  });

  it("answers 404 when the stored file has gone", async () => {
    const created = await upload(amendmentId, "gone soon", "gone.txt");
    fs.rmSync(fileStorage.resolve(created.body.data.filePath));

    const download = await request(app).get(`/api/amendments/documents/${created.body.data.id}/download`);
    expect(download.status).toBe(404);
  });

  it("requires a file", async () => {
    const res = await request(app).post(`/api/amendments/${amendmentId}/documents`).field("documentName", "empty");
    expect(res.status).toBe(400);
    expect(res.body.message).toBe("A file is required in the 'file' field");
  });

  it("rejects an invalid document type and removes the stored file", async () => {
    const res = await upload(amendmentId, "x", "x.txt").field("documentType", "Poster");
    expect(res.status).toBe(400);

    const folder = path.join(fileStorage.root, "amendments", String(amendmentId));
    expect(fs.readdirSync(folder)).toEqual([]);
  });

  it("removes the stored file when the amendment does not exist", async () => {
    const res = await upload(999, "orphan", "orphan.txt");
    expect(res.status).toBe(404);
    expect(fs.readdirSync(path.join(fileStorage.root, "amendments", "999"))).toEqual([]);
  });

  it("rejects a non-numeric amendment id before storing anything", async () => {
    const res = await upload("abc", "nope", "nope.txt");
    expect(res.status).toBe(400);
    expect(fs.existsSync(path.join(fileStorage.root, "amendments", "abc"))).toBe(false);
  });

  it("deletes a document row and its file", async () => {
    const created = await upload(amendmentId, "bye", "bye.txt");
    const filePath: string = created.body.data.filePath;

    const res = await request(app).delete(`/api/amendments/documents/${created.body.data.id}`);
    expect(res.status).toBe(200);
    expect(await fileStorage.exists(filePath)).toBe(false);

    const again = await request(app).delete(`/api/amendments/documents/${created.body.data.id}`);
    expect(again.status).toBe(404);
  });

  it("removes document files when the amendment is deleted", async () => {
    const created = await upload(amendmentId, "attached", "attached.txt");
    const filePath: string = created.body.data.filePath;

    const res = await request(app).delete(`/api/amendments/${amendmentId}`);
    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ deletedFiles: 1 });
    expect(await fileStorage.exists(filePath)).toBe(false);
  });
});
