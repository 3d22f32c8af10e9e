import { describe, test, expect, vi } from "vitest";
import {
  ModelNotFoundError,
  type ITranslationRequest,
  type ITranslationResult,
  type ITranslator,
} from "@lexalign/pipeline";
import { route, translateRoute } from "../routes";
import { recordRequest } from "../metrics";

class FakeTranslator implements ITranslator {
  readonly pairs = ["en-de"];
  requests: ITranslationRequest[] = [];

  constructor(private readonly _failure?: Error) {}

  hasPair(sourceLang: string, targetLang: string): boolean {
    return sourceLang === "en" && targetLang === "de";
  }

  async translate(request: ITranslationRequest): Promise<ITranslationResult> {
    this.requests.push(request);
    if (this._failure) throw this._failure;
    if (!this.hasPair(request.sourceLang, request.targetLang)) {
      throw new ModelNotFoundError(request.sourceLang, request.targetLang);
    }
    return {
      rankedTranslations: ["das Haus"],
      constraintSpans: [[[4, 8]]],
    };
  }

  close = vi.fn(async () => {});
}

describe("translateRoute", () => {
  test("maps the wire format onto a translation request", async () => {
    const translator = new FakeTranslator();
    const response = await translateRoute(
      {
        source_lang: "en",
        target_lang: "de",
        source_sentence: "the house",
        target_constraints: ["Haus"],
        n_best: 2,
      },
      translator,
    );

    expect(translator.requests).toEqual([
      {
        sourceLang: "en",
        targetLang: "de",
        sourceSentence: "the house",
        targetConstraints: ["Haus"],
        nBest: 2,
      },
    ]);
    expect(response).toEqual({
      status: 200,
      body: {
        ranked_translations: ["das Haus"],
        constraint_spans: [[[4, 8]]],
      },
    });
  });

  test("defaults n_best to 1 and treats null constraints as absent", async () => {
    const translator = new FakeTranslator();
    await translateRoute(
      {
        source_lang: "en",
        target_lang: "de",
        source_sentence: "the house",
        target_constraints: null,
      },
      translator,
    );

    expect(translator.requests[0]?.nBest).toBe(1);
    expect(translator.requests[0]?.targetConstraints).toBeUndefined();
  });

  test("rejects a body missing required fields", async () => {
    const translator = new FakeTranslator();
    const response = await translateRoute(
      { source_lang: "en", source_sentence: "hi" },
      translator,
    );

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ error: "INVALID_REQUEST" });
    expect(translator.requests).toHaveLength(0);
  });

  test("answers 404 for an unknown language pair", async () => {
    const response = await translateRoute(
      { source_lang: "en", target_lang: "fr", source_sentence: "hi" },
      new FakeTranslator(),
    );

    expect(response).toEqual({
      status: 404,
      body: {
        error: "MODEL_NOT_FOUND",
        message: "No model is loaded for en-fr",
      },
    });
  });

  test("propagates other failures", async () => {
    const failure = new Error("decoder crashed");
    await expect(
      translateRoute(
        { source_lang: "en", target_lang: "de", source_sentence: "hi" },
        new FakeTranslator(failure),
      ),
    ).rejects.toBe(failure);
  });
});

describe("route", () => {
  const translator = new FakeTranslator();

  test("answers the health check", async () => {
    const response = await route(
      { method: "GET", pathname: "/health", body: "" },
      translator,
    );
    expect(response).toEqual({
      status: 200,
      body: "OK",
      contentType: "text/plain",
    });
  });

  test("parses the JSON body of POST /translate", async () => {
    const response = await route(
      {
        method: "POST",
        pathname: "/translate",
        body: JSON.stringify({
          source_lang: "en",
          target_lang: "de",
          source_sentence: "the house",
        }),
      },
      translator,
    );
    expect(response.status).toBe(200);
  });

  test("rejects a body that is not JSON", async () => {
    const response = await route(
      { method: "POST", pathname: "/translate", body: "{not json" },
      translator,
    );
    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ error: "INVALID_JSON" });
  });

  test("only accepts POST on /translate", async () => {
    const response = await route(
      { method: "GET", pathname: "/translate", body: "" },
      translator,
    );
    expect(response.status).toBe(405);
  });

  test("answers 404 for unknown paths", async () => {
    const response = await route(
      { method: "GET", pathname: "/nope", body: "" },
      translator,
    );
    expect(response).toEqual({
      status: 404,
      body: { error: "NOT_FOUND", message: "No route for /nope" },
    });
  });

  test("exposes request metrics", async () => {
    recordRequest("/translate", 200, 12);

    const response = await route(
      { method: "GET", pathname: "/metrics", body: "" },
      translator,
    );

    expect(response.status).toBe(200);
    expect(typeof response.body).toBe("string");
    expect(response.body).toContain(
      'lexalign_requests_total{route="/translate",status="200"} 1',
    );
    expect(response.body).toContain("lexalign_request_duration_seconds_bucket");
  });
});
