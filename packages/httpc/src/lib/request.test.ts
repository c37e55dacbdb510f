import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import { Headers } from "node-fetch";
import { Readable } from "stream";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { brotliCompressSync, gzipSync } from "zlib";
import { HttpRequest, fileNameFromUrl, parseCookieHeader } from "./request.js";
import { FORM_CONTENT_TYPE } from "./body.js";
import type { RequestDiagnostic } from "./ports/diagnostics.js";
import type { WireRequest, WireResponse } from "./ports/transport.js";

function respond(
  status: number,
  body: Buffer | string = "",
  headers: Record<string, string> = {},
  statusText = "OK"
): WireResponse {
  return {
    status,
    statusText,
    headers: new Headers(headers),
    body: Readable.from([Buffer.from(body)]),
  };
}

function setup(result: WireResponse | Error = respond(200)) {
  const transport = {
    do: vi.fn(async (_request: WireRequest): Promise<WireResponse> => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
  const diagnostics = { report: vi.fn((_record: RequestDiagnostic) => {}) };
  const request = new HttpRequest({ transport, diagnostics });
  const sent = () => transport.do.mock.calls[0][0];
  return { request, transport, diagnostics, sent };
}

async function* failingBody(): AsyncGenerator<Buffer> {
  yield Buffer.from("partial");
  throw new Error("connection reset");
}

describe("HttpRequest", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "httpc-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("url-encoded mode", () => {
    it("defaults Content-Type for POST and sorts fields", async () => {
      const { request, sent } = setup();

      await request
        .setMethod("post")
        .setUrl("https://example.test/login")
        .setData("b", "x y")
        .setData("a", "1")
        .send();

      expect(sent().method).toBe("POST");
      expect(sent().headers.get("Content-Type")).toBe(FORM_CONTENT_TYPE);
      expect(sent().body.toString()).toBe("a=1&b=x+y");
    });

    it("keeps an explicit Content-Type", async () => {
      const { request, sent } = setup();

      await request
        .setMethod("POST")
        .setUrl("https://example.test/")
        .setHeader("content-type", "text/plain")
        .send();

      expect(sent().headers.get("Content-Type")).toBe("text/plain");
    });

    it("sets no Content-Type for GET", async () => {
      const { request, sent } = setup();

      await request.setUrl("https://example.test/").send();

      expect(sent().method).toBe("GET");
      expect(sent().headers.get("Content-Type")).toBeNull();
    });

    it("replaces a field set twice", async () => {
      const { request, sent } = setup();

      await request.setMethod("POST").setUrl("https://example.test/").setData("k", "1").setData("k", "2").send();

      expect(sent().body.toString()).toBe("k=2");
    });
  });

  describe("json mode", () => {
    it("sends the text verbatim without a Content-Type", async () => {
      const { request, sent } = setup();

      await request.setMethod("POST").setUrl("https://example.test/").setJsonData('{"a":1}').send("json");

      expect(sent().body.toString()).toBe('{"a":1}');
      expect(sent().headers.get("Content-Type")).toBeNull();
    });
  });

  describe("multipart mode", () => {
    it("keeps only the last file entry set with setFileData", async () => {
      const first = join(dir, "x.txt");
      const second = join(dir, "y.txt");
      await writeFile(first, "first file");
      await writeFile(second, "second file");
      const { request, sent } = setup();

      await request
        .setMethod("POST")
        .setUrl("https://example.test/upload")
        .setFileData("a", first, true)
        .setFileData("b", second, true)
        .send("multipart");

      const body = sent().body.toString();
      expect(body).toContain('Content-Disposition: form-data; name="b"; filename="y.txt"');
      expect(body).toContain("second file");
      expect(body).not.toContain('name="a"');
      expect(body).not.toContain("first file");
      expect(sent().headers.get("Content-Type")).toMatch(/^multipart\/form-data; boundary=/);
    });

    it("keeps one file entry and one plain entry side by side", async () => {
      const file = join(dir, "report.csv");
      await writeFile(file, "id,total");
      const { request, sent } = setup();

      await request
        .setMethod("POST")
        .setUrl("https://example.test/upload")
        .setFileData("note", "hello", false)
        .setFileData("report", file, true)
        .send("multipart");

      const body = sent().body.toString();
      expect(body).toContain('Content-Disposition: form-data; name="note"\r\n\r\nhello\r\n');
      expect(body).toContain('name="report"; filename="report.csv"');
      expect(body).toContain("Content-Type: application/octet-stream");
    });

    it("sends every entry added with addFileData", async () => {
      const first = join(dir, "x.txt");
      const second = join(dir, "y.txt");
      await writeFile(first, "first file");
      await writeFile(second, "second file");
      const { request, sent } = setup();

      await request
        .setMethod("POST")
        .setUrl("https://example.test/upload")
        .addFileData("a", first, true)
        .addFileData("b", second, true)
        .send("multipart");

      const body = sent().body.toString();
      expect(body).toContain('name="a"; filename="x.txt"');
      expect(body).toContain('name="b"; filename="y.txt"');
    });

    it("fails the dispatch when a file cannot be read", async () => {
      const { request, transport } = setup();

      await request
        .setUrl("https://example.test/upload")
        .setFileData("a", join(dir, "missing.txt"), true)
        .send("multipart");

      expect(transport.do).not.toHaveBeenCalled();
      await expect(request.end()).rejects.toMatchObject({ code: "FILE_NOT_READABLE" });
    });
  });

  describe("headers and cookies", () => {
    it("renders cookies into one header", async () => {
      const { request, sent } = setup();

      await request
        .setUrl("https://example.test/")
        .setCookies([
          { name: "a", value: "1" },
          { name: "b", value: "2" },
        ])
        .send();

      expect(sent().headers.get("Cookie")).toBe("a=1; b=2");
    });

    it("appends cookies to a Cookie header set by hand", async () => {
      const { request, sent } = setup();

      await request
        .setUrl("https://example.test/")
        .setHeader("Cookie", "x=y")
        .setCookies([{ name: "a", value: "1" }])
        .send();

      expect(sent().headers.get("Cookie")).toBe("x=y; a=1");
    });

    it("keeps the last value set for a header", async () => {
      const { request, sent } = setup();

      await request.setUrl("https://example.test/").setHeader("X-Trace", "1").setHeader("X-Trace", "2").send();

      expect(sent().headers.get("x-trace")).toBe("2");
    });

    it("starts from the headers given at construction", async () => {
      const transport = { do: vi.fn(async (_request: WireRequest) => respond(200)) };
      const request = new HttpRequest({ transport, headers: { "User-Agent": "httpc" } });

      await request.setUrl("https://example.test/").send();

      expect(transport.do.mock.calls[0][0].headers.get("User-Agent")).toBe("httpc");
    });
  });

  describe("dispatch failures", () => {
    it("records an invalid URL", async () => {
      const { request, transport } = setup();

      await request.setUrl("not a url").send();

      expect(transport.do).not.toHaveBeenCalled();
      await expect(request.end()).rejects.toMatchObject({
        code: "REQUEST_INVALID",
        message: 'invalid URL "not a url"',
      });
    });

    it("records an invalid method", async () => {
      const { request } = setup();

      await request.setMethod("get it").setUrl("https://example.test/").send();

      await expect(request.endBytes()).rejects.toMatchObject({
        code: "REQUEST_INVALID",
        message: 'invalid method "GET IT"',
      });
    });

    it("treats an empty method as GET", async () => {
      const { request, sent } = setup();

      await request.setMethod("").setUrl("https://example.test/").send();

      expect(sent().method).toBe("GET");
    });

    it("rethrows a transport failure from every terminal operation", async () => {
      const { request } = setup(new Error("connect ECONNREFUSED"));

      await request.setUrl("https://example.test/").send();

      await expect(request.end()).rejects.toMatchObject({
        code: "TRANSPORT_FAILED",
        message: "connect ECONNREFUSED",
      });
      await expect(request.endFile(dir + "/")).rejects.toThrow("connect ECONNREFUSED");
    });

    it("dispatches only once", async () => {
      const { request, transport } = setup();

      await request.setUrl("https://example.test/").send();
      await request.send();

      expect(transport.do).toHaveBeenCalledTimes(1);
    });
  });

  describe("verbose diagnostics", () => {
    it("reports the request when verbose", async () => {
      const { request, diagnostics } = setup();

      await request
        .setMethod("POST")
        .setUrl("https://example.test/form")
        .setVerbose(true)
        .setData("k", "v")
        .setCookies([{ name: "a", value: "1" }])
        .send();

      expect(diagnostics.report).toHaveBeenCalledTimes(1);
      expect(diagnostics.report).toHaveBeenCalledWith({
        method: "POST",
        url: "https://example.test/form",
        headers: { "content-type": FORM_CONTENT_TYPE, cookie: "a=1" },
        cookies: [{ name: "a", value: "1" }],
        body: { mode: "url", fields: { k: "v" } },
      });
    });

    it("reports the raw JSON text in json mode", async () => {
      const { request, diagnostics } = setup();

      await request.setUrl("https://example.test/").setVerbose(true).setJsonData("[1,2]").send("json");

      expect(diagnostics.report.mock.calls[0][0].body).toEqual({ mode: "json", text: "[1,2]" });
    });

    it("prints to the console when no diagnostics are given", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const transport = { do: vi.fn(async (_request: WireRequest) => respond(200)) };

      try {
        await new HttpRequest({ transport }).setUrl("https://example.test/").setVerbose(true).send();

        expect(log).toHaveBeenCalledTimes(6);
        expect(log.mock.calls[1][0]).toBe("Request: GET https://example.test/");
        expect(log.mock.calls[4][0]).toBe("Body: {}");
      } finally {
        log.mockRestore();
      }
    });

    it("stays silent otherwise", async () => {
      const { request, diagnostics } = setup();

      await request.setUrl("https://example.test/").send();

      expect(diagnostics.report).not.toHaveBeenCalled();
    });
  });

  describe("end / endBytes", () => {
    it("rejects before send", async () => {
      const { request } = setup();

      await expect(request.end()).rejects.toMatchObject({ code: "NOT_SENT" });
    });

    it("returns the body as text", async () => {
      const { request } = setup(respond(200, "plain body"));

      await request.setUrl("https://example.test/").send();
      const { response, body } = await request.end();

      expect(response.status).toBe(200);
      expect(body).toBe("plain body");
    });

    it("rejects any status but 200 with the status line and the response", async () => {
      const response = respond(404, "missing", {}, "Not Found");
      const { request } = setup(response);

      await request.setUrl("https://example.test/").send();

      await expect(request.endBytes()).rejects.toMatchObject({
        code: "HTTP_STATUS",
        message: "404 Not Found",
        response,
      });
      await expect(request.endFile(dir + "/")).rejects.toMatchObject({
        code: "NOT_WRITTEN",
        message: "Not written",
        response: undefined,
      });
    });

    it("treats 204 as a failure", async () => {
      const { request } = setup(respond(204, "", {}, "No Content"));

      await request.setUrl("https://example.test/").send();

      await expect(request.end()).rejects.toThrow("204 No Content");
    });

    it("decodes a gzip body", async () => {
      const { request } = setup(respond(200, gzipSync("hello gzip"), { "Content-Encoding": "gzip" }));

      await request.setUrl("https://example.test/").send();

      await expect(request.end()).resolves.toMatchObject({ body: "hello gzip" });
    });

    it("returns an empty body when a gzip body has no gzip header", async () => {
      const { request } = setup(respond(200, "definitely not gzip", { "Content-Encoding": "gzip" }));

      await request.setUrl("https://example.test/").send();
      const { body } = await request.endBytes();

      expect(body.length).toBe(0);
    });

    it("returns an empty body for a corrupt gzip body", async () => {
      const header = gzipSync("x").subarray(0, 10);
      const corrupt = Buffer.concat([header, Buffer.from([0x07, 0x00, 0x00, 0x00])]);
      const { request } = setup(respond(200, corrupt, { "Content-Encoding": "gzip" }));

      await request.setUrl("https://example.test/").send();

      await expect(request.end()).resolves.toMatchObject({ body: "" });
    });

    it("decodes a gzip body cut off before its trailer", async () => {
      const whole = gzipSync("hello world");
      const { request } = setup(respond(200, whole.subarray(0, whole.length - 8), { "Content-Encoding": "gzip" }));

      await request.setUrl("https://example.test/").send();

      await expect(request.end()).resolves.toMatchObject({ body: "hello world" });
    });

    it("decodes what arrived when a gzip body stream errors", async () => {
      async function* interrupted(): AsyncGenerator<Buffer> {
        yield gzipSync("arrived");
        throw new Error("connection reset");
      }
      const { request } = setup({
        status: 200,
        statusText: "OK",
        headers: new Headers({ "Content-Encoding": "gzip" }),
        body: Readable.from(interrupted()),
      });

      await request.setUrl("https://example.test/").send();

      await expect(request.end()).resolves.toMatchObject({ body: "arrived" });
    });

    it("decodes a brotli body", async () => {
      const { request } = setup(respond(200, brotliCompressSync("hello brotli"), { "Content-Encoding": "br" }));

      await request.setUrl("https://example.test/").send();

      await expect(request.end()).resolves.toMatchObject({ body: "hello brotli" });
    });

    it("passes other encodings through untouched", async () => {
      const { request } = setup(respond(200, "raw", { "Content-Encoding": "deflate" }));

      await request.setUrl("https://example.test/").send();

      await expect(request.end()).resolves.toMatchObject({ body: "raw" });
    });

    it("fails when the body stream errors", async () => {
      const { request } = setup({
        status: 200,
        statusText: "OK",
        headers: new Headers(),
        body: Readable.from(failingBody()),
      });

      await request.setUrl("https://example.test/").send();

      await expect(request.endBytes()).rejects.toMatchObject({
        code: "DECODE_FAILED",
        message: "connection reset",
      });
    });

    it("refuses to read the body twice", async () => {
      const { request } = setup(respond(200, "once"));

      await request.setUrl("https://example.test/").send();
      await request.end();

      await expect(request.endBytes()).rejects.toMatchObject({ code: "BODY_CONSUMED" });
    });
  });

  describe("endFile", () => {
    it("derives the file name from the URL", async () => {
      const { request } = setup(respond(200, "id,total\n1,10\n"));

      await request.setUrl("https://h/dir/report.csv").send();
      const response = await request.endFile(dir + "/");

      expect(response.status).toBe(200);
      await expect(readFile(join(dir, "report.csv"), "utf-8")).resolves.toBe("id,total\n1,10\n");
    });

    it("concatenates path and name without a separator", async () => {
      const { request } = setup(respond(200, "data"));

      await request.setUrl("https://h/dir/report.csv").send();
      await request.endFile(join(dir, "out-"), "saved.bin");

      await expect(readFile(join(dir, "out-saved.bin"), "utf-8")).resolves.toBe("data");
    });

    it("writes the raw body without decoding", async () => {
      const compressed = gzipSync("zipped");
      const { request } = setup(respond(200, compressed, { "Content-Encoding": "gzip" }));

      await request.setUrl("https://h/archive.gz").send();
      await request.endFile(dir + "/");

      await expect(readFile(join(dir, "archive.gz"))).resolves.toEqual(compressed);
    });

    it("ignores a body read failure and writes what arrived", async () => {
      const { request } = setup({
        status: 200,
        statusText: "OK",
        headers: new Headers(),
        body: Readable.from(failingBody()),
      });

      await request.setUrl("https://h/partial.txt").send();
      await request.endFile(dir + "/");

      await expect(readFile(join(dir, "partial.txt"), "utf-8")).resolves.toBe("partial");
    });

    it("reports a destination that cannot be written", async () => {
      const { request } = setup(respond(200, "data"));

      await request.setUrl("https://h/file.txt").send();

      await expect(request.endFile(join(dir, "no-such-dir") + "/")).rejects.toMatchObject({
        code: "WRITE_FAILED",
      });
    });
  });
});

describe("fileNameFromUrl", () => {
  it("returns the last segment", () => {
    expect(fileNameFromUrl("https://h/dir/report.csv")).toBe("report.csv");
  });

  it("returns an empty name for a trailing slash", () => {
    expect(fileNameFromUrl("https://h/dir/")).toBe("");
  });

  it("returns an empty name without any separator", () => {
    expect(fileNameFromUrl("report.csv")).toBe("");
  });
});

describe("parseCookieHeader", () => {
  it("splits pairs", () => {
    expect(parseCookieHeader("x=y; a=1")).toEqual([
      { name: "x", value: "y" },
      { name: "a", value: "1" },
    ]);
  });

  it("returns nothing for a missing header", () => {
    expect(parseCookieHeader(null)).toEqual([]);
  });
});
