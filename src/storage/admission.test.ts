import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Readable, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { Admission, SizeLimiter } from "./admission.js";
import { isAppError } from "./errors.js";

const admission = new Admission({
  allowed_extensions: ["jpg", "png", "pdf"],
  allow_extensionless: false,
  services: ["web", "ai"],
  max_file_size: 10,
});

function drain(): Writable {
  return new Writable({
    write(_chunk, _enc, cb) {
      cb();
    },
  });
}

describe("Admission.checkExtension", () => {
  it("accepts allowed extensions regardless of case", () => {
    assert.doesNotThrow(() => admission.checkExtension("photo.jpg"));
    assert.doesNotThrow(() => admission.checkExtension("PHOTO.JPG"));
    assert.doesNotThrow(() => admission.checkExtension("Scan.Pdf"));
  });

  it("rejects extensions outside the allow-list", () => {
    assert.throws(() => admission.checkExtension("script.exe"), (err) => isAppError(err, "UNSUPPORTED_TYPE"));
    assert.throws(() => admission.checkExtension("image.jpg.exe"), (err) => isAppError(err, "UNSUPPORTED_TYPE"));
  });

  it("rejects files without an extension unless configured", () => {
    assert.throws(() => admission.checkExtension("README"), (err) => isAppError(err, "UNSUPPORTED_TYPE"));
    const lenient = new Admission({
      allowed_extensions: ["jpg"],
      allow_extensionless: true,
      services: ["web"],
      max_file_size: 10,
    });
    assert.doesNotThrow(() => lenient.checkExtension("README"));
  });
});

describe("Admission.checkService", () => {
  it("accepts configured services", () => {
    assert.doesNotThrow(() => admission.checkService("web"));
  });

  it("rejects unknown services", () => {
    assert.throws(() => admission.checkService("office"), (err) => isAppError(err, "UNKNOWN_SERVICE"));
    assert.throws(() => admission.checkService("WEB"), (err) => isAppError(err, "UNKNOWN_SERVICE"));
  });

  it("treats separators in a service name as a path violation", () => {
    assert.throws(() => admission.checkService("web/../../etc"), (err) => isAppError(err, "PATH_VIOLATION"));
    assert.throws(() => admission.checkService(".."), (err) => isAppError(err, "PATH_VIOLATION"));
  });
});

describe("Admission.checkDeclaredSize", () => {
  it("allows the maximum and rejects one byte more", () => {
    assert.doesNotThrow(() => admission.checkDeclaredSize(10));
    assert.doesNotThrow(() => admission.checkDeclaredSize(undefined));
    assert.throws(() => admission.checkDeclaredSize(11), (err) => isAppError(err, "SIZE_EXCEEDED"));
  });
});

describe("SizeLimiter", () => {
  it("passes exactly max bytes", async () => {
    const limiter = new SizeLimiter(10);
    await pipeline(Readable.from([Buffer.alloc(4), Buffer.alloc(6)]), limiter, drain());
    assert.equal(limiter.bytes, 10);
  });

  it("fails as soon as the total exceeds max", async () => {
    let pulled = 0;
    const source = Readable.from(
      (function* () {
        for (let i = 0; i < 100; i++) {
          pulled++;
          yield Buffer.alloc(4);
        }
      })(),
    );

    await assert.rejects(
      pipeline(source, new SizeLimiter(10), drain()),
      (err) => isAppError(err, "SIZE_EXCEEDED") && err.message === "File size 12 exceeds maximum 10",
    );
    assert.ok(pulled < 100, `source should stop early, pulled ${pulled}`);
  });
});
