import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createLocalServer } from "../src/server";
import { buildNotesContext, createSilentLogger } from "./fixtures/notes";

describe("createLocalServer", () => {
  let app: Express;

  beforeEach(() => {
    delete process.env.AWS_LAMBDA_RUNTIME_API;
    app = createLocalServer(buildNotesContext()).app;
  });

  it("creates and reads an item through the in-memory table", async () => {
    // Act
    const created = await request(app)
      .post("/notes")
      .set("content-type", "application/json")
      .send(JSON.stringify({ title: "Buy Milk", pinned: true }));
    const fetched = await request(app).get("/notes/buy-milk");

    // Assert
    expect(created.status).toBe(200);
    expect(created.body).toEqual({ id: "buy-milk", title: "Buy Milk", pinned: true });
    expect(fetched.status).toBe(200);
    expect(fetched.headers["content-type"]).toMatch(/^application\/json/);
    expect(fetched.body).toEqual({ id: "buy-milk", title: "Buy Milk", pinned: true });
  });

  it("binds query parameters with their field types", async () => {
    for (const title of ["One", "Two", "Three"]) {
      await request(app)
        .post("/notes")
        .send(JSON.stringify({ title, pinned: title !== "Two" }));
    }

    const response = await request(app).get("/notes?pinned=true&limit=1");

    expect(response.status).toBe(200);
    expect(response.body).toEqual([{ id: "one", title: "One", pinned: true }]);
  });

  it("answers 204 for a function without a result", async () => {
    const response = await request(app).delete("/notes/anything");

    expect(response.status).toBe(204);
  });

  it("maps HTTP exceptions to their status", async () => {
    await request(app).post("/notes").send(JSON.stringify({ title: "Dup" }));

    const missing = await request(app).get("/notes/nope");
    const conflict = await request(app).post("/notes").send(JSON.stringify({ title: "Dup" }));

    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "Note nope not found" });
    expect(conflict.status).toBe(409);
    expect(conflict.body).toEqual({ error: "Note dup already exists" });
  });

  it("rejects request bodies that do not bind", async () => {
    const missingTitle = await request(app).post("/notes").send(JSON.stringify({ pinned: true }));
    const malformed = await request(app).post("/notes").send("{not json");
    const badQuery = await request(app).get("/notes?limit=many");

    expect(missingTitle.status).toBe(400);
    expect(missingTitle.body).toEqual({ error: "Field 'title': is required" });
    expect(malformed.status).toBe(400);
    expect(malformed.body.error).toMatch(/^Malformed JSON body: /);
    expect(badQuery.body).toEqual({ error: "Field 'limit': 'many' is not a valid integer" });
  });

  it("hides unexpected errors behind a 500", async () => {
    const logger = createSilentLogger();
    const server = createLocalServer(buildNotesContext(logger));

    const response = await request(server.app).get("/crash");

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: "Internal server error" });
    expect(logger.error).toHaveBeenCalledWith("Crash failed during invoke: disk on fire", {
      stage: "invoke",
      stack: expect.stringContaining("disk on fire"),
    });
  });

  it("answers unknown routes with a JSON 404", async () => {
    const response = await request(app).put("/elsewhere");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "No function found for PUT /elsewhere" });
  });
});
