import { describe, test, expect, afterAll, beforeAll, vi } from "vitest";
import type { Server } from "node:http";
import type {
  ITranslationRequest,
  ITranslationResult,
  ITranslator,
} from "@lexalign/pipeline";
import { startHttpServer } from "../http-server";

class FakeTranslator implements ITranslator {
  readonly pairs = ["en-de"];

  hasPair(sourceLang: string, targetLang: string): boolean {
    return sourceLang === "en" && targetLang === "de";
  }

  async translate({
    sourceSentence,
  }: ITranslationRequest): Promise<ITranslationResult> {
    if (sourceSentence === "crash") throw new Error("decoder crashed");
    return { rankedTranslations: ["das Haus"], constraintSpans: [[]] };
  }

  close = vi.fn(async () => {});
}

const translateBody = (sourceSentence: string) =>
  JSON.stringify({
    source_lang: "en",
    target_lang: "de",
    source_sentence: sourceSentence,
  });

describe("startHttpServer", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = await startHttpServer({
      translator: new FakeTranslator(),
      port: 0,
      host: "127.0.0.1",
      maxBodyBytes: 100,
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve())),
    );
  });

  const post = (path: string, body: string) =>
    fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    });

  test("serves a translation as JSON", async () => {
    const response = await post("/translate", translateBody("the house"));

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("application/json");
    expect(await response.json()).toEqual({
      ranked_translations: ["das Haus"],
      constraint_spans: [[]],
    });
  });

  test("answers 413 to a body over the limit", async () => {
    const response = await post("/translate", "x".repeat(1024 * 1024));

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({
      error: "PAYLOAD_TOO_LARGE",
      message: "Body exceeds 100 bytes",
    });
  });

  test("answers 500 when the translator throws", async () => {
    const response = await post("/translate", translateBody("crash"));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: "INTERNAL",
      message: "decoder crashed",
    });
  });

  test("answers the health check as plain text", async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/plain");
    expect(await response.text()).toBe("OK");
  });

  test("records one sample per response", async () => {
    await fetch(`${baseUrl}/nope`);

    const metrics = await (await fetch(`${baseUrl}/metrics`)).text();

    expect(metrics).toContain(
      'lexalign_requests_total{route="/translate",status="200"} 1',
    );
    expect(metrics).toContain(
      'lexalign_requests_total{route="/translate",status="413"} 1',
    );
    expect(metrics).toContain(
      'lexalign_requests_total{route="/translate",status="500"} 1',
    );
    expect(metrics).toContain(
      'lexalign_requests_total{route="/health",status="200"} 1',
    );
    expect(metrics).toContain(
      'lexalign_requests_total{route="unknown",status="404"} 1',
    );
    expect(metrics).toContain(
      'lexalign_request_duration_seconds_count{route="/translate"} 3',
    );
  });
});
