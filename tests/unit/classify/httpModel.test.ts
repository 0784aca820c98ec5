import { describe, expect, it, vi } from "vitest";
import { HttpClassificationModel } from "../../../src/classify";
import { ModelError, TransientModelError } from "../../../src/core/errors";
import { buildLayoutFromText } from "../../../src/extract";

const INPUT = { text: "Quarterly update", layout: buildLayoutFromText("Quarterly update") };

function response(status: number, body: string) {
  return { ok: status >= 200 && status < 300, status, text: async () => body };
}

describe("HttpClassificationModel", () => {
  it("posts the text and returns well-formed predictions", async () => {
    const fetchFn = vi.fn(async (_url: string, _init: { headers: Record<string, string>; body: string }) =>
      response(200, JSON.stringify({ predictions: [{ label: "quarterly", score: 0.8 }, { bad: 1 }] })),
    );
    const model = new HttpClassificationModel({ baseUrl: "http://model.test/", token: "test-secret", fetchFn });

    const predictions = await model.predict(INPUT, new AbortController().signal);

    expect(predictions).toEqual([{ label: "quarterly", score: 0.8 }]);
    expect(model.name).toBe("http:http://model.test");
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("http://model.test/v1/classify");
    expect(init.headers.Authorization).toBe("Bearer test-secret");
    expect(JSON.parse(init.body)).toEqual({ text: "Quarterly update", pageCount: 1 });
  });

  it("treats 5xx and network failures as transient", async () => {
    const busy = new HttpClassificationModel({ baseUrl: "http://model.test", fetchFn: async () => response(503, "busy") });
    await expect(busy.predict(INPUT, new AbortController().signal)).rejects.toThrow(
      new TransientModelError("model service error 503: busy"),
    );

    const down = new HttpClassificationModel({
      baseUrl: "http://model.test",
      fetchFn: async () => {
        throw new Error("ECONNREFUSED");
      },
    });
    await expect(down.predict(INPUT, new AbortController().signal)).rejects.toThrow("model service unreachable: ECONNREFUSED");
  });

  it("treats rejected requests and unusable bodies as permanent", async () => {
    const rejected = new HttpClassificationModel({ baseUrl: "http://model.test", fetchFn: async () => response(400, "bad") });
    await expect(rejected.predict(INPUT, new AbortController().signal)).rejects.toThrow(
      new ModelError("model service rejected request 400: bad"),
    );

    const garbled = new HttpClassificationModel({ baseUrl: "http://model.test", fetchFn: async () => response(200, "<html>") });
    await expect(garbled.predict(INPUT, new AbortController().signal)).rejects.toThrow("model service returned invalid JSON");

    const empty = new HttpClassificationModel({ baseUrl: "http://model.test", fetchFn: async () => response(200, "") });
    await expect(empty.predict(INPUT, new AbortController().signal)).rejects.toThrow("model service response has no predictions array");
  });
});
