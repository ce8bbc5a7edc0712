import { describe, it } from "node:test";
import assert from "node:assert/strict";
import express from "express";
import { apiKeyMiddleware } from "./middleware.js";
import { errorHandler } from "../middleware/error-handler.js";
import { at, request } from "../testing/http.js";

function buildApp(): express.Express {
  const app = express();
  app.get("/protected", apiKeyMiddleware("test-secret"), (_req, res) => {
    res.json({ ok: true });
  });
  app.use(errorHandler);
  return app;
}

describe("apiKeyMiddleware", () => {
  const app = buildApp();

  it("rejects a request without credentials", async () => {
    const resp = await request(app, "GET", "/protected");
    assert.equal(resp.status, 401);
    assert.deepEqual(resp.body, { error: { code: "UNAUTHORIZED", message: "Missing API key" } });
  });

  it("rejects a non-bearer scheme", async () => {
    const resp = await request(app, "GET", "/protected", { headers: { Authorization: "Basic dGVzdA==" } });
    assert.equal(resp.status, 401);
    assert.equal(at(resp.body, "error", "message"), "Invalid auth header format");
  });

  it("rejects a wrong key", async () => {
    for (const key of ["wrong", "test-secret-but-longer", "test-secreT"]) {
      const resp = await request(app, "GET", "/protected", { headers: { Authorization: `Bearer ${key}` } });
      assert.equal(resp.status, 401, key);
      assert.equal(at(resp.body, "error", "message"), "Invalid API key");
    }
  });

  it("accepts the configured key with either scheme casing", async () => {
    for (const scheme of ["Bearer", "bearer"]) {
      const resp = await request(app, "GET", "/protected", { headers: { Authorization: `${scheme} test-secret` } });
      assert.equal(resp.status, 200);
      assert.deepEqual(resp.body, { ok: true });
    }
  });
});
