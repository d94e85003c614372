import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as http from "http";
import { fetchWithTimeout } from "../../src/lib/http";

describe("fetchWithTimeout", () => {
  let server: http.Server;
  let base: string;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      res.writeHead(200, { "Content-Type": "application/rss+xml" });
      if (req.url === "/stall") {
        // Headers and part of the body, then nothing.
        res.write("<rss><channel>");
        return;
      }
      res.end("<rss><channel></channel></rss>");
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (typeof address !== "object" || address === null) {
      throw new Error("server has no address");
    }
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("reads a complete body", async () => {
    const res = await fetchWithTimeout(`${base}/ok`, { method: "GET" }, 2000);
    expect(await res.text()).toBe("<rss><channel></channel></rss>");
  });

  it("times out a body that stalls after the headers", async () => {
    const started = Date.now();
    const res = await fetchWithTimeout(`${base}/stall`, { method: "GET" }, 200);
    expect(res.status).toBe(200);

    await expect(res.text()).rejects.toThrow();
    expect(Date.now() - started).toBeLessThan(2000);
  });
});
