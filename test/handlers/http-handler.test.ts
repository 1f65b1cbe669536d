import { createServer } from "node:http";
import type { IncomingHttpHeaders, Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { HttpHandler } from "../../src/handlers/http-handler.js";
import { makeInput } from "./helpers.js";

let server: Server;
let baseUrl: string;
const received: Array<{ headers: IncomingHttpHeaders; body: unknown }> = [];

beforeAll(async () => {
  server = createServer((req, res) => {
    let raw = "";
    req.on("data", (chunk) => (raw += chunk));
    req.on("end", () => {
      received.push({ headers: req.headers, body: JSON.parse(raw) });
      switch (req.url) {
        case "/outcome":
          res.setHeader("Content-Type", "application/json");
          res.end(JSON.stringify({ success: false, error: "handler said no" }));
          break;
        case "/json":
          res.setHeader("Content-Type", "application/json");
          res.end(JSON.stringify({ filename: "a.txt" }));
          break;
        case "/text":
          res.end("plain answer");
          break;
        case "/error":
          res.statusCode = 500;
          res.end("broken");
          break;
        case "/slow":
          setTimeout(() => res.end("late"), 300);
          break;
        default:
          res.statusCode = 404;
          res.end();
      }
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe("HttpHandler", () => {
  it("posts the task and takes an outcome-shaped body as the outcome", async () => {
    const handler = new HttpHandler({ name: "api", url: `${baseUrl}/outcome`, headers: { "X-Api-Key": "test-key" } });
    const input = makeInput("summarise", { headlines: ["H1"] });

    const outcome = await handler.handle(input);

    expect(outcome).toEqual({ success: false, error: "handler said no" });
    const last = received[received.length - 1];
    expect(last?.body).toEqual({
      taskId: input.task.id,
      taskType: "general_task",
      description: "summarise",
      artifacts: { headlines: ["H1"] },
    });
    expect(last?.headers["x-api-key"]).toBe("test-key");
  });

  it("treats other JSON as a successful result", async () => {
    const handler = new HttpHandler({ name: "api", url: `${baseUrl}/json` });
    expect(await handler.handle(makeInput("x"))).toEqual({ success: true, result: { filename: "a.txt" } });
  });

  it("treats a text body as a successful result", async () => {
    const handler = new HttpHandler({ name: "api", url: `${baseUrl}/text` });
    expect(await handler.handle(makeInput("x"))).toEqual({ success: true, result: "plain answer" });
  });

  it("fails on an error status", async () => {
    const handler = new HttpHandler({ name: "api", url: `${baseUrl}/error` });
    expect(await handler.handle(makeInput("x"))).toEqual({ success: false, error: "HTTP 500: broken" });
  });

  it("fails when the endpoint is too slow", async () => {
    const handler = new HttpHandler({ name: "slow", url: `${baseUrl}/slow`, timeout: 50 });
    expect(await handler.handle(makeInput("x"))).toEqual({
      success: false,
      error: 'Handler "slow" timed out after 50ms',
    });
  });
});
