import { z } from "zod";
import {
  ModelNotFoundError,
  type ITranslator,
} from "@lexalign/pipeline";
import { register } from "./metrics";

export interface RouteRequest {
  method: string;
  pathname: string;
  body: string;
}

export interface RouteResponse {
  status: number;
  body: string | Record<string, unknown>;
  contentType?: string;
}

export const ROUTES = ["/translate", "/health", "/metrics"] as const;

export const translateRequestSchema = z.object({
  source_lang: z.string().min(1),
  target_lang: z.string().min(1),
  source_sentence: z.string(),
  target_constraints: z.array(z.string()).nullish(),
  n_best: z.number().int().positive().default(1),
});

export type TranslateRequestBody = z.infer<typeof translateRequestSchema>;

const errorResponse = (
  status: number,
  error: string,
  message: string,
  extra: Record<string, unknown> = {},
): RouteResponse => ({ status, body: { error, message, ...extra } });

/**
 * POST /translate. Field names follow the wire format; a missing model is a
 * 404, every other translation failure propagates.
 */
export async function translateRoute(
  body: unknown,
  translator: ITranslator,
): Promise<RouteResponse> {
  const parsed = translateRequestSchema.safeParse(body);
  if (!parsed.success) {
    return errorResponse(400, "INVALID_REQUEST", "Invalid translate request", {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    });
  }

  const request = parsed.data;
  try {
    const result = await translator.translate({
      sourceLang: request.source_lang,
      targetLang: request.target_lang,
      sourceSentence: request.source_sentence,
      targetConstraints: request.target_constraints ?? undefined,
      nBest: request.n_best,
    });

    return {
      status: 200,
      body: {
        ranked_translations: result.rankedTranslations,
        constraint_spans: result.constraintSpans,
      },
    };
  } catch (error) {
    if (error instanceof ModelNotFoundError) {
      return errorResponse(404, error.code, error.message);
    }
    throw error;
  }
}

export async function route(
  { method, pathname, body }: RouteRequest,
  translator: ITranslator,
): Promise<RouteResponse> {
  switch (pathname) {
    case "/health":
      return { status: 200, body: "OK", contentType: "text/plain" };

    case "/metrics":
      return {
        status: 200,
        body: await register.metrics(),
        contentType: register.contentType,
      };

    case "/translate": {
      if (method !== "POST") {
        return errorResponse(405, "METHOD_NOT_ALLOWED", "Use POST /translate");
      }

      let json: unknown;
      try {
        json = JSON.parse(body);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return errorResponse(400, "INVALID_JSON", message);
      }
      return translateRoute(json, translator);
    }

    default:
      return errorResponse(404, "NOT_FOUND", `No route for ${pathname}`);
  }
}
