import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LocalStorageProvider } from "../src/providers/storage.js";
import { authHeader, buildTestApp, registerUser, type RegisteredUser, type TestApp } from "./helpers.js";

let ctx: TestApp;
let account: RegisteredUser;

describe("storage routes", () => {
  beforeEach(async () => {
    ctx = await buildTestApp();
    account = await registerUser(ctx.app);
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  async function upload(name: string, text: string, token = account.token) {
    return ctx.app.inject({
      method: "POST",
      url: "/api/storage/files",
      headers: authHeader(token),
      payload: { name, contentType: "text/plain", contentBase64: Buffer.from(text).toString("base64") },
    });
  }

  it("uploads, lists, downloads and deletes a user's files", async () => {
    const created = await upload("notes.txt", "hello world");
    expect(created.statusCode).toBe(201);
    expect(created.json()).toMatchObject({
      key: `users/${account.user.id}/notes.txt`,
      size: 11,
      contentType: "text/plain",
      url: `http://localhost:8000/files/users/${account.user.id}/notes.txt`,
    });

    await upload("agenda.txt", "monday");
    const listed = await ctx.app.inject({ method: "GET", url: "/api/storage/files", headers: authHeader(account.token) });
    const { files } = listed.json() as { files: Array<{ key: string }> };
    expect(files.map((file) => file.key)).toEqual([
      `users/${account.user.id}/agenda.txt`,
      `users/${account.user.id}/notes.txt`,
    ]);

    const downloaded = await ctx.app.inject({
      method: "GET",
      url: "/api/storage/files/notes.txt",
      headers: authHeader(account.token),
    });
    const body = downloaded.json() as { contentBase64: string; size: number };
    expect(Buffer.from(body.contentBase64, "base64").toString("utf8")).toBe("hello world");
    expect(body.size).toBe(11);

    const deleted = await ctx.app.inject({
      method: "DELETE",
      url: "/api/storage/files/notes.txt",
      headers: authHeader(account.token),
    });
    expect(deleted.json()).toEqual({ deleted: true });

    const again = await ctx.app.inject({
      method: "DELETE",
      url: "/api/storage/files/notes.txt",
      headers: authHeader(account.token),
    });
    expect(again.statusCode).toBe(404);
    expect(again.json()).toEqual({ error: "File not found" });
  });

  it("keeps each user's files apart", async () => {
    await upload("private.txt", "mine");
    const other = await registerUser(ctx.app, "grace@example.test");

    const response = await ctx.app.inject({
      method: "GET",
      url: "/api/storage/files/private.txt",
      headers: authHeader(other.token),
    });
    expect(response.statusCode).toBe(404);

    const listed = await ctx.app.inject({ method: "GET", url: "/api/storage/files", headers: authHeader(other.token) });
    expect(listed.json()).toEqual({ files: [] });
  });

  it("rejects file names that could escape the user's folder", async () => {
    expect((await upload("../escape.txt", "x")).statusCode).toBe(400);

    const response = await ctx.app.inject({
      method: "GET",
      url: "/api/storage/files/.hidden",
      headers: authHeader(account.token),
    });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: "Invalid file name" });
  });
});

describe("LocalStorageProvider", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), "saasrelay-storage-"));
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it("writes files with their metadata and reads them back", async () => {
    const storage = new LocalStorageProvider(rootDir, "https://files.example.test/");
    const stored = await storage.uploadFile("users/u1/report.csv", Buffer.from("a,b\n1,2\n"), "text/csv");

    expect(stored.url).toBe("https://files.example.test/users/u1/report.csv");
    expect(await fs.readFile(path.join(rootDir, "users", "u1", "report.csv"), "utf8")).toBe("a,b\n1,2\n");

    const downloaded = await storage.downloadFile("users/u1/report.csv");
    expect(downloaded?.file).toEqual(stored);
    expect(downloaded?.content.toString("utf8")).toBe("a,b\n1,2\n");

    expect((await storage.listFiles("users/u1/")).map((file) => file.key)).toEqual(["users/u1/report.csv"]);
  });

  it("keeps files named like metadata separate from the metadata", async () => {
    const storage = new LocalStorageProvider(rootDir, "https://files.example.test");
    await storage.uploadFile("users/u1/report", Buffer.from("quarterly"), "text/plain");
    await storage.uploadFile("users/u1/report.meta.json", Buffer.from("not metadata"), "application/json");

    const files = await storage.listFiles("users/u1/");
    expect(files.map((file) => [file.key, file.contentType])).toEqual([
      ["users/u1/report", "text/plain"],
      ["users/u1/report.meta.json", "application/json"],
    ]);
    expect((await storage.downloadFile("users/u1/report"))?.content.toString("utf8")).toBe("quarterly");
    expect(await fs.readdir(path.join(rootDir, ".meta", "users", "u1"))).toEqual(
      expect.arrayContaining(["report.json", "report.meta.json.json"]),
    );
  });

  it("returns nothing for missing files and folders", async () => {
    const storage = new LocalStorageProvider(rootDir, "https://files.example.test");

    expect(await storage.downloadFile("users/u2/none.txt")).toBeNull();
    expect(await storage.deleteFile("users/u2/none.txt")).toBe(false);
    expect(await storage.listFiles("users/u2/")).toEqual([]);
  });

  it("refuses keys that leave the root", async () => {
    const storage = new LocalStorageProvider(rootDir, "https://files.example.test");

    await expect(storage.uploadFile("../outside.txt", Buffer.from("x"), "text/plain")).rejects.toThrow(
      "Invalid storage key: ../outside.txt",
    );
    await expect(storage.uploadFile(".meta/users/u1/report.json", Buffer.from("x"), "text/plain")).rejects.toThrow(
      "Invalid storage key: .meta/users/u1/report.json",
    );
  });
});
