import { createServer } from "node:http";
import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { FunctionCompletionService, HttpCompletionService } from "../src/planner/completion.js";

let server: Server;
let baseUrl: string;
let lastBody: unknown;

beforeAll(async () => {
  server = createServer((req, res) => {
    let raw = "";
    req.on("data", (chunk) => (raw += chunk));
    req.on("end", () => {
      lastBody = JSON.parse(raw);
      res.setHeader("Content-Type", "application/json");
      if (req.url === "/ok") {
        res.end(JSON.stringify({ text: '{"subtasks": []}' }));
      } else if (req.url === "/shape") {
        res.end(JSON.stringify({ output: "wrong field" }));
      } else {
        res.statusCode = 503;
        res.end("busy");
      }
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe("HttpCompletionService", () => {
  it("posts the prompts and returns the text", async () => {
    const service = new HttpCompletionService({ url: `${baseUrl}/ok` });
    expect(await service.complete("plan this", "be brief")).toEqual({ success: true, text: '{"subtasks": []}' });
    expect(lastBody).toEqual({ prompt: "plan this", systemPrompt: "be brief" });
  });

  it("fails on a response without text", async () => {
    const service = new HttpCompletionService({ url: `${baseUrl}/shape` });
    expect(await service.complete("x")).toEqual({
      success: false,
      error: "Completion response is missing a text field",
    });
  });

  it("fails on an error status", async () => {
    const service = new HttpCompletionService({ url: `${baseUrl}/down` });
    expect(await service.complete("x")).toEqual({ success: false, error: "HTTP 503: busy" });
  });
});

describe("FunctionCompletionService", () => {
  it("turns a throw into a failed completion", async () => {
    const service = new FunctionCompletionService(async () => {
      throw new Error("model unavailable");
    });
    expect(await service.complete("x")).toEqual({ success: false, error: "model unavailable" });
  });
});
