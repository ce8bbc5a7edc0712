import http from "node:http";
import type express from "express";

export interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  raw: Buffer;
  /** Parsed JSON when the response is JSON, otherwise the text. */
  body: unknown;
}

export interface RequestOptions {
  body?: Buffer | string;
  headers?: Record<string, string>;
}

/** Sends one request to `app` on an ephemeral port and closes the server. */
export async function request(
  app: express.Express,
  method: string,
  urlPath: string,
  opts: RequestOptions = {},
): Promise<TestResponse> {
  const server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const addr = server.address();
  if (addr === null || typeof addr === "string") {
    server.close();
    throw new Error("test server has no TCP address");
  }

  try {
    return await new Promise<TestResponse>((resolve, reject) => {
      const req = http.request(
        {
          hostname: "127.0.0.1",
          port: addr.port,
          path: urlPath,
          method,
          headers: {
            ...(opts.body !== undefined ? { "Content-Length": String(Buffer.byteLength(opts.body)) } : {}),
            ...(opts.headers ?? {}),
          },
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on("data", (chunk: Buffer) => chunks.push(chunk));
          res.on("end", () => {
            const raw = Buffer.concat(chunks);
            const isJSON = (res.headers["content-type"] ?? "").includes("application/json");
            resolve({
              status: res.statusCode ?? 0,
              headers: res.headers,
              raw,
              body: isJSON ? JSON.parse(raw.toString("utf8")) : raw.toString("utf8"),
            });
          });
          res.on("error", reject);
        },
      );
      req.on("error", reject);
      if (opts.body !== undefined) req.write(opts.body);
      req.end();
    });
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

export interface MultipartFile {
  field: string;
  filename: string;
  content: Buffer | string;
  contentType?: string;
}

/** Builds a multipart/form-data body. */
export function multipart(
  fields: Record<string, string>,
  file?: MultipartFile,
): { body: Buffer; contentType: string } {
  const boundary = "----depot-test-boundary";
  const parts: Buffer[] = [];
  for (const [name, value] of Object.entries(fields)) {
    parts.push(
      Buffer.from(`--${boundary}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`),
    );
  }
  if (file) {
    parts.push(
      Buffer.from(
        `--${boundary}\r\nContent-Disposition: form-data; name="${file.field}"; filename="${file.filename}"\r\n` +
          `Content-Type: ${file.contentType ?? "application/octet-stream"}\r\n\r\n`,
      ),
      Buffer.from(file.content),
      Buffer.from("\r\n"),
    );
  }
  parts.push(Buffer.from(`--${boundary}--\r\n`));
  return { body: Buffer.concat(parts), contentType: `multipart/form-data; boundary=${boundary}` };
}

/** Walks into a parsed JSON value; undefined when a step is missing. */
export function at(value: unknown, ...keys: (string | number)[]): unknown {
  let cur = value;
  for (const key of keys) {
    if (typeof cur !== "object" || cur === null) return undefined;
    cur = Reflect.get(cur, key);
  }
  return cur;
}
