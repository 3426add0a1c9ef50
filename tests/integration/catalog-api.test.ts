import request from "supertest";
import { afterAll, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "../../src/app";
import { dbInstance, resetDatabase } from "../helpers/database";

const app = createApp();

afterAll(async () => {
  await dbInstance.close();
});

describe("employees API", () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  it("creates, filters and updates employees", async () => {
    const qa = await request(app)
      .post("/api/employees")
      .send({ employeeName: "QA Golf", initials: "QG", email: "qa.golf@example.test" });
    expect(qa.status).toBe(201);
    expect(qa.body.data.isActive).toBe(true);

    await request(app).post("/api/employees").send({ employeeName: "Dev Alpha", isActive: false });

    const all = await request(app).get("/api/employees");
    expect(all.body.data.map((employee: { employeeName: string }) => employee.employeeName)).toEqual([
      "Dev Alpha",
      "QA Golf",
    ]);

    const active = await request(app).get("/api/employees").query({ active: "true" });
    expect(active.body.data.map((employee: { employeeName: string }) => employee.employeeName)).toEqual(["QA Golf"]);

    const updated = await request(app).put(`/api/employees/${qa.body.data.id}`).send({ windowsLogin: "qgolf" });
    expect(updated.status).toBe(200);
    expect(updated.body.data.windowsLogin).toBe("qgolf");
    expect(updated.body.data.initials).toBe("QG");
  });

  it("validates the payload and the filter", async () => {
    const badEmail = await request(app).post("/api/employees").send({ employeeName: "X", email: "not-an-email" });
    expect(badEmail.status).toBe(400);

    const badFilter = await request(app).get("/api/employees").query({ active: "sometimes" });
    expect(badFilter.status).toBe(400);
  });

  it("deletes employees", async () => {
    const created = await request(app).post("/api/employees").send({ employeeName: "Temp" });
    const removed = await request(app).delete(`/api/employees/${created.body.data.id}`);
    expect(removed.status).toBe(200);

    const missing = await request(app).get(`/api/employees/${created.body.data.id}`);
    expect(missing.status).toBe(404);
  });
});

describe("applications API", () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  it("keeps application names unique", async () => {
    const first = await request(app).post("/api/applications").send({ applicationName: "Core Platform" });
    expect(first.status).toBe(201);

    const duplicate = await request(app).post("/api/applications").send({ applicationName: "Core Platform" });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body.message).toBe('Application "Core Platform" already exists');

    const second = await request(app).post("/api/applications").send({ applicationName: "Web Portal" });
    const rename = await request(app)
      .put(`/api/applications/${second.body.data.id}`)
      .send({ applicationName: "Core Platform" });
    expect(rename.status).toBe(409);

    const keep = await request(app)
      .put(`/api/applications/${first.body.data.id}`)
      .send({ applicationName: "Core Platform", description: "Main product" });
    expect(keep.status).toBe(200);
    expect(keep.body.data.description).toBe("Main product");
  });

  it("manages versions under an application", async () => {
    const app1 = await request(app).post("/api/applications").send({ applicationName: "Core Platform" });
    const id: number = app1.body.data.id;

    const v1 = await request(app).post(`/api/applications/${id}/versions`).send({ version: "2.0.0" });
    expect(v1.status).toBe(201);
    await request(app).post(`/api/applications/${id}/versions`).send({ version: "2.1.0", releasedDate: "2024-03-01" });

    const versions = await request(app).get(`/api/applications/${id}/versions`);
    expect(versions.body.data.map((version: { version: string }) => version.version)).toEqual(["2.0.0", "2.1.0"]);

    const withVersions = await request(app).get(`/api/applications/${id}`);
    expect(withVersions.body.data.versions).toHaveLength(2);

    const removed = await request(app).delete(`/api/applications/versions/${v1.body.data.id}`);
    expect(removed.status).toBe(200);

    const list = await request(app).get("/api/applications");
    expect(list.body.data[0].versions.map((version: { version: string }) => version.version)).toEqual(["2.1.0"]);

    const noApp = await request(app).post("/api/applications/999/versions").send({ version: "1.0" });
    expect(noApp.status).toBe(404);
  });

  it("deletes an application with its versions", async () => {
    const created = await request(app).post("/api/applications").send({ applicationName: "Legacy Tool" });
    await request(app).post(`/api/applications/${created.body.data.id}/versions`).send({ version: "0.9" });

    const removed = await request(app).delete(`/api/applications/${created.body.data.id}`);
    expect(removed.status).toBe(200);

    const list = await request(app).get("/api/applications");
    expect(list.body.data).toEqual([]);
  });
});
