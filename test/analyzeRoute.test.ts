import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { POST } from "@/app/api/reports/analyze/route";

const URL_ = "http://localhost/api/reports/analyze";

function jsonRequest(body: string) {
  return new Request(URL_, { method: "POST", headers: { "content-type": "application/json" }, body });
}

function uploadRequest(filename: string, content: string) {
  const form = new FormData();
  form.append("file", new Blob([content]), filename);
  return new Request(URL_, { method: "POST", body: form });
}

describe("POST /api/reports/analyze", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("analyzes JSON text", async () => {
    const res = await POST(jsonRequest(JSON.stringify({ text: "Subjects\nMathematics 88 / 100\nScience 70 / 100" })));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    expect(body.analysisId).toMatch(/^[0-9a-f-]{36}$/);
    expect(body.subjects).toEqual({ scores: { Mathematics: 88, Science: 70 }, strength: "Mathematics", weakness: "Science" });
    expect(body.hasExtractableData).toBe(true);
  });

  it("analyzes an uploaded csv", async () => {
    const res = await POST(uploadRequest("marks.csv", "Section,Label,Score,Maximum\nSubjects,History,64,100\n"));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.records).toEqual([
      { Section: "Subjects", Label: "History", Score: 64, Maximum: 100, Value: null, Notes: null },
    ]);
  });

  it("rejects invalid JSON with 400", async () => {
    const res = await POST(jsonRequest("{not json"));
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.code).toBe("REPORT_INVALID_JSON");
    expect(body.requestId).toBe(res.headers.get("x-request-id"));
  });

  it("rejects a body without input", async () => {
    const res = await POST(jsonRequest("{}"));
    expect(res.status).toBe(400);
    expect((await res.json()).code).toBe("REPORT_MISSING_INPUT");
  });

  it("rejects unsupported uploads with 415", async () => {
    const res = await POST(uploadRequest("scan.png", "not an image"));
    expect(res.status).toBe(415);
    expect((await res.json()).code).toBe("REPORT_UNSUPPORTED_FILE");
  });

  it("rejects oversized bodies with 413", async () => {
    vi.stubEnv("REPORT_MAX_UPLOAD_BYTES", "1024");
    const res = await POST(jsonRequest(JSON.stringify({ text: "x".repeat(2000) })));
    expect(res.status).toBe(413);
    expect((await res.json()).code).toBe("REPORT_BODY_TOO_LARGE");
  });

  it("requires a file field on multipart requests", async () => {
    const form = new FormData();
    form.append("note", "hello");
    const res = await POST(new Request(URL_, { method: "POST", body: form }));
    expect(res.status).toBe(400);
    expect((await res.json()).code).toBe("REPORT_MISSING_FILE");
  });
});
