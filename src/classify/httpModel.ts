import { fetch as undiciFetch } from "undici";
import type { Agent } from "undici";
import { getFetchDispatcher } from "../core/fetch";
import { ModelError, TransientModelError } from "../core/errors";
import type { ClassificationModel, ModelPrediction } from "./modelTier";
import type { ClassifierInput } from "./types";

interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body: string;
    signal: AbortSignal;
    dispatcher?: Agent;
  },
) => Promise<HttpResponseLike>;

export interface HttpClassificationModelOptions {
  baseUrl: string;
  token?: string;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
}

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function isPrediction(value: unknown): value is ModelPrediction {
  if (!value || typeof value !== "object") {
    return false;
  }
  const candidate = value as Partial<ModelPrediction>;
  return typeof candidate.label === "string" && typeof candidate.score === "number";
}

/**
 * Client for a remote inference service: `POST {baseUrl}/v1/classify` with `{ text, pageCount }`,
 * answered by `{ predictions: [{ label, score }] }`.
 */
export class HttpClassificationModel implements ClassificationModel {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly dispatcher: Agent | undefined;
  private readonly fetchFn: FetchLike;

  constructor(options: HttpClassificationModelOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.name = `http:${this.baseUrl}`;
    this.token = options.token;
    this.dispatcher = getFetchDispatcher(options.ignoreHttpsErrors ?? false);
    this.fetchFn = options.fetchFn ?? ((url, init) => undiciFetch(url, init));
  }

  async predict(input: ClassifierInput, signal: AbortSignal): Promise<ModelPrediction[]> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let response: HttpResponseLike;
    try {
      response = await this.fetchFn(`${this.baseUrl}/v1/classify`, {
        method: "POST",
        headers,
        body: JSON.stringify({ text: input.text, pageCount: input.layout.pageCount }),
        signal,
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientModelError(`model service unreachable: ${message}`);
    }

    const responseText = await response.text();
    if (!response.ok) {
      if (isRetriableStatus(response.status)) {
        throw new TransientModelError(`model service error ${response.status}: ${responseText}`);
      }
      throw new ModelError(`model service rejected request ${response.status}: ${responseText}`);
    }

    let payload: unknown;
    try {
      payload = responseText.length > 0 ? JSON.parse(responseText) : {};
    } catch {
      throw new ModelError("model service returned invalid JSON");
    }

    const predictions =
      payload && typeof payload === "object" && "predictions" in payload ? payload.predictions : undefined;
    if (!Array.isArray(predictions)) {
      throw new ModelError("model service response has no predictions array");
    }
    return predictions.filter(isPrediction);
  }
}
