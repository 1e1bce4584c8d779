/**
 * API tests.
 *
 * Builds the Express app around an orchestrator whose providers are
 * in-process fakes, then drives it through supertest. Verifies request
 * validation, the success and failure JSON shapes, and the health report.
 */

import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import { createApp } from "../app";
import { GenerationOrchestrator } from "../services/generation";
import { monitoringService } from "../services/monitoringService";
import type { GenerateCall, GenerateOutcome } from "../services/generation/types";
import {
  FALLBACK_MODEL,
  FakeClient,
  PREFERRED_MODEL,
  absent,
  fakePlan,
  ok,
  pngHeader,
} from "./fakes";

function buildApp(
  libraryRespond: (call: GenerateCall) => GenerateOutcome,
  httpRespond: (call: GenerateCall) => GenerateOutcome = () => absent(),
  available = true
) {
  const library = new FakeClient("managed-library", libraryRespond, { available });
  const http = new FakeClient("raw-network", httpRespond, { available });
  const orchestrator = new GenerationOrchestrator(fakePlan(library, http));
  return { app: createApp({ orchestrator }), library, http };
}

beforeEach(() => {
  monitoringService.resetMetrics();
});

// ---------------------------------------------------------------------------
// Summarization
// ---------------------------------------------------------------------------

describe("POST /api/analyze (summarize)", () => {
  it("returns the summary with provider metadata", async () => {
    const { app } = buildApp(() => ok("Short summary."));

    const res = await request(app)
      .post("/api/analyze")
      .send({
        mode: "summarize",
        text: "Revenue grew 12% to $4.2M.",
        options: { length: "short", tone: "bullet", language: "French" },
      });

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/json/);
    expect(res.body).toEqual({
      summary: "Short summary.",
      tokensUsed: null,
      meta: {
        model: PREFERRED_MODEL,
        mode: "summarize",
        source: "managed-library",
        options: { length: "short", tone: "bullet", language: "French" },
      },
    });
    expect(monitoringService.getMetrics().generations["managed-library"]).toBe(1);
  });

  it("defaults the mode to summarize and normalizes unknown options", async () => {
    const { app, library } = buildApp(() => ok("ok"));

    const res = await request(app)
      .post("/api/analyze")
      .send({ text: "Some text", options: { length: "huge", tone: "angry" } });

    expect(res.status).toBe(200);
    expect(res.body.meta.options).toEqual({ length: "medium", tone: "neutral", language: "" });
    expect(library.calls[0].prompt).toContain(
      "as a tight single paragraph using neutral, factual prose. "
    );
  });

  it("accepts options as a JSON string and strips markup from the language", async () => {
    const { app, library } = buildApp(() => ok("ok"));

    const res = await request(app)
      .post("/api/analyze")
      .send({
        text: "Some text",
        options: JSON.stringify({ tone: "technical", language: " <i>German</i> " }),
      });

    expect(res.status).toBe(200);
    expect(res.body.meta.options).toEqual({
      length: "medium",
      tone: "technical",
      language: "German",
    });
    expect(library.calls[0].prompt).toContain("using precise technical language in German. ");
  });

  it("falls back to the defaults for an unparsable options string", async () => {
    const { app } = buildApp(() => ok("ok"));

    const res = await request(app)
      .post("/api/analyze")
      .send({ text: "Some text", options: "{not json" });

    expect(res.status).toBe(200);
    expect(res.body.meta.options).toEqual({ length: "medium", tone: "neutral", language: "" });
  });

  it("reports the fallback tier when only the secondary model answers", async () => {
    const { app } = buildApp(
      () => absent("SDK client unavailable"),
      (call) => (call.model === FALLBACK_MODEL ? ok("X") : absent("HTTP 500"))
    );

    const res = await request(app).post("/api/analyze").send({ text: "Some text" });

    expect(res.status).toBe(200);
    expect(res.body.summary).toBe("X");
    expect(res.body.meta.source).toBe("raw-network-fallback");
    expect(res.body.meta.model).toBe(FALLBACK_MODEL);
  });

  it("returns 400 for missing text", async () => {
    const { app, library } = buildApp(() => ok("never"));

    const res = await request(app).post("/api/analyze").send({ mode: "summarize" });

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      message: "No text provided",
      code: "VALIDATION_ERROR",
      details: [{ field: "text", message: "No text provided" }],
    });
    expect(library.calls).toHaveLength(0);
  });

  it("returns 400 for whitespace-only text", async () => {
    const { app } = buildApp(() => ok("never"));

    const res = await request(app).post("/api/analyze").send({ text: "   \n\t" });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
  });

  it("returns 502 with every attempt's cause when all tiers fail", async () => {
    const { app } = buildApp(
      () => absent("SDK call failed: quota"),
      (call) => absent(`HTTP model ${call.model} error 500: boom`)
    );

    const res = await request(app).post("/api/analyze").send({ text: "Some text" });

    expect(res.status).toBe(502);
    expect(res.body.error.code).toBe("GENERATION_FAILED");
    expect(res.body.error.message).toBe(
      "All summarization methods failed; last attempt raw-network-fallback " +
        "(gemini-1.5-flash): HTTP model gemini-1.5-flash error 500: boom"
    );
    expect(res.body.error.requestId).toBe(res.headers["x-request-id"]);
    expect(res.body.error.details).toHaveLength(3);
    expect(res.body.error.details[0]).toEqual({
      tier: "managed-library",
      providerKind: "managed-library",
      modelName: PREFERRED_MODEL,
      reason: "SDK call failed: quota",
    });

    const metrics = monitoringService.getMetrics();
    expect(metrics.exhaustedCount).toBe(1);
    expect(metrics.errorCount).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Image context
// ---------------------------------------------------------------------------

describe("POST /api/analyze (image_context)", () => {
  const png = pngHeader(2, 3);

  it("describes a data-URL image and reports its size", async () => {
    const { app, library } = buildApp(() => ok("Two by three pixels."));

    const res = await request(app)
      .post("/api/analyze")
      .send({
        mode: "image_context",
        image: `data:image/png;base64,${png.toString("base64")}`,
        options: { language: "Italian" },
      });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      analysis: "Two by three pixels.",
      tokensUsed: null,
      meta: {
        model: PREFERRED_MODEL,
        mode: "image_context",
        source: "managed-library",
        imageSize: "2x3",
        options: { length: "medium", tone: "neutral", language: "Italian" },
      },
    });
    expect(library.calls[0].image?.mimeType).toBe("image/png");
    expect(library.calls[0].image?.data.equals(png)).toBe(true);
  });

  it("accepts bare base64 with an explicit mime type", async () => {
    const { app, library } = buildApp(() => ok("ok"));

    const res = await request(app)
      .post("/api/analyze")
      .send({ mode: "image_context", image: png.toString("base64"), mimeType: "image/webp" });

    expect(res.status).toBe(200);
    expect(library.calls[0].image?.mimeType).toBe("image/webp");
  });

  it("answers 200 with the placeholder when vision is unavailable", async () => {
    const { app, http } = buildApp(() => absent("SDK client unavailable"), () => ok("never"), false);

    const res = await request(app)
      .post("/api/analyze")
      .send({ mode: "image_context", image: png.toString("base64") });

    expect(res.status).toBe(200);
    expect(res.body.analysis).toBe("(Vision model unavailable or failed. No analysis produced.)");
    expect(res.body.meta.source).toBe("unavailable");
    expect(res.body.meta.model).toBe(PREFERRED_MODEL);
    expect(http.calls).toHaveLength(0);
    expect(monitoringService.getMetrics().sentinelCount).toBe(1);
  });

  it("reports an unknown size for unrecognized bytes", async () => {
    const { app } = buildApp(() => ok("ok"));

    const res = await request(app)
      .post("/api/analyze")
      .send({ mode: "image_context", image: Buffer.from("plain").toString("base64") });

    expect(res.status).toBe(200);
    expect(res.body.meta.imageSize).toBe("unknown");
  });

  it("returns 400 when the image is missing", async () => {
    const { app } = buildApp(() => ok("never"));

    const res = await request(app).post("/api/analyze").send({ mode: "image_context" });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual([{ field: "image", message: "Image file missing" }]);
  });

  it("returns 400 when the image is not base64", async () => {
    const { app } = buildApp(() => ok("never"));

    const res = await request(app)
      .post("/api/analyze")
      .send({ mode: "image_context", image: "not an image!" });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
  });

  it("rejects a long whitespace run before an invalid character quickly", async () => {
    const { app, library } = buildApp(() => ok("never"));

    const startedAt = performance.now();
    const res = await request(app)
      .post("/api/analyze")
      .send({ mode: "image_context", image: `data:image/png;base64,A${" ".repeat(100_000)}!` });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual([{ field: "image", message: "Image file missing" }]);
    expect(performance.now() - startedAt).toBeLessThan(1000);
    expect(library.calls).toHaveLength(0);
  });

  it("accepts line-wrapped base64", async () => {
    const { app, library } = buildApp(() => ok("ok"));
    const encoded = png.toString("base64");
    const wrapped = `${encoded.slice(0, 16)}\n${encoded.slice(16)}\n`;

    const res = await request(app)
      .post("/api/analyze")
      .send({ mode: "image_context", image: wrapped });

    expect(res.status).toBe(200);
    expect(library.calls[0].image?.data.equals(png)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Request plumbing
// ---------------------------------------------------------------------------

describe("request handling", () => {
  it("returns 400 for an unsupported mode", async () => {
    const { app } = buildApp(() => ok("never"));

    const res = await request(app).post("/api/analyze").send({ mode: "translate", text: "x" });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("UNSUPPORTED_MODE");
  });

  it("returns 400 JSON for a malformed body", async () => {
    const { app } = buildApp(() => ok("never"));

    const res = await request(app)
      .post("/api/analyze")
      .set("Content-Type", "application/json")
      .send('{"text":');

    expect(res.status).toBe(400);
    expect(res.headers["content-type"]).toMatch(/json/);
    expect(res.body.error.code).toBe("REQUEST_ERROR");
  });

  it("returns 404 JSON for unknown API routes", async () => {
    const { app } = buildApp(() => ok("never"));

    const res = await request(app).get("/api/nonexistent");

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe("NOT_FOUND");
  });

  it("echoes a caller-supplied request id", async () => {
    const { app } = buildApp(() => ok("ok"));

    const res = await request(app)
      .post("/api/analyze")
      .set("X-Request-Id", "req-123")
      .send({ text: "Some text" });

    expect(res.headers["x-request-id"]).toBe("req-123");
  });

  it("assigns a request id when none is supplied", async () => {
    const { app } = buildApp(() => ok("ok"));

    const res = await request(app).post("/api/analyze").send({ text: "Some text" });

    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });
});

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

describe("GET /api/health", () => {
  it("is ok and lists the provider tiers", async () => {
    const { app } = buildApp(() => ok("ok"));

    const res = await request(app).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
    expect(res.body.providers).toEqual([
      { tier: "managed-library", kind: "managed-library", model: PREFERRED_MODEL, available: true },
      { tier: "raw-network-primary", kind: "raw-network", model: PREFERRED_MODEL, available: true },
      { tier: "raw-network-fallback", kind: "raw-network", model: FALLBACK_MODEL, available: true },
    ]);
    expect(res.body.metrics).toHaveProperty("generations");
  });

  it("is degraded with 503 when no tier is available", async () => {
    const { app } = buildApp(() => absent(), () => absent(), false);

    const res = await request(app).get("/api/health");

    expect(res.status).toBe(503);
    expect(res.body.status).toBe("degraded");
  });
});
