import { describe, it, expect, vi, afterEach } from "vitest";
import {
  AuthenticationError,
  HttpTransport,
  NetworkError,
  ServerError,
  createCallerMessage,
  type AgentRequest,
  type Frame,
  type FrameStream,
} from "../src/index.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type FetchFn = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

const encoder = new TextEncoder();

const request: AgentRequest = {
  conversation: { messages: [createCallerMessage("How many orders shipped?")] },
  toolConstraint: { mode: "auto", allowedTools: ["sql"] },
};

function transport(): HttpTransport {
  return new HttpTransport({
    endpoint: "https://agent.test/run",
    credentials: { token: "test-secret" },
    headers: { "User-Agent": "agent-ledger-tests" },
  });
}

function sseResponse(chunks: string[]): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
  return new Response(body, {
    status: 200,
    headers: { "Content-Type": "text/event-stream" },
  });
}

async function collect(stream: FrameStream): Promise<Frame[]> {
  const frames: Frame[] = [];
  for await (const frame of stream) frames.push(frame);
  return frames;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("HttpTransport.open", () => {
  it("posts the request body with streaming and auth headers", async () => {
    const mockFn = vi.fn<FetchFn>().mockResolvedValue(sseResponse([]));
    vi.stubGlobal("fetch", mockFn);

    await transport().open(request);

    const init = mockFn.mock.calls[0]?.[1];
    expect(mockFn.mock.calls[0]?.[0]).toBe("https://agent.test/run");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      "User-Agent": "agent-ledger-tests",
      Accept: "text/event-stream",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      messages: [
        { role: "user", content: [{ type: "text", text: "How many orders shipped?" }] },
      ],
      stream: true,
      tool_choice: { type: "auto", name: ["sql"] },
    });
  });

  it("uses the configured authorization scheme", async () => {
    const mockFn = vi.fn<FetchFn>().mockResolvedValue(sseResponse([]));
    vi.stubGlobal("fetch", mockFn);

    await new HttpTransport({
      endpoint: "https://agent.test/run",
      credentials: { token: "test-secret", scheme: "Token" },
    }).open(request);

    expect(mockFn.mock.calls[0]?.[1]?.headers).toMatchObject({
      Authorization: "Token test-secret",
    });
  });

  it("yields frames in order and stops at the end marker", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<FetchFn>().mockResolvedValue(
        sseResponse([
          'event: response.text.delta\ndata: {"text":"Hel"}\n\n',
          'event: response.text.delta\ndata: {"text":"lo"}\n\n',
          "data: [DONE]\n\n",
          'event: response.text.delta\ndata: {"text":"ignored"}\n\n',
        ]),
      ),
    );

    const frames = await collect(await transport().open(request));
    expect(frames.map((f) => [f.event, f.data])).toEqual([
      ["response.text.delta", '{"text":"Hel"}'],
      ["response.text.delta", '{"text":"lo"}'],
    ]);
  });

  it("maps a failed handshake to a typed ConnectionError", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<FetchFn>().mockResolvedValue(
        new Response('{"message":"token expired"}', { status: 401 }),
      ),
    );

    const failure = transport().open(request);
    await expect(failure).rejects.toBeInstanceOf(AuthenticationError);
    await expect(failure).rejects.toThrow("token expired");
  });

  it("keeps 5xx handshakes retryable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<FetchFn>().mockResolvedValue(new Response("busy", { status: 503 })),
    );
    const error = await transport().open(request).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ServerError);
    expect(error).toMatchObject({ retryable: true, status_code: 503 });
  });

  it("wraps network failures in a retryable NetworkError", async () => {
    vi.stubGlobal("fetch", vi.fn<FetchFn>().mockRejectedValue(new TypeError("fetch failed")));
    const error = await transport().open(request).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({
      message: "Could not reach agent endpoint: fetch failed",
      retryable: true,
    });
  });
});

describe("SSE frame stream", () => {
  it("reports a broken body as an interrupted stream", async () => {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('event: response.status\ndata: {"status":"a"}\n\n'));
      },
      pull(controller) {
        controller.error(new Error("socket reset"));
      },
    });
    vi.stubGlobal("fetch", vi.fn<FetchFn>().mockResolvedValue(new Response(body)));

    const stream = await transport().open(request);
    const seen: Frame[] = [];
    const error = await (async () => {
      for await (const frame of stream) seen.push(frame);
    })().catch((err: unknown) => err);

    expect(seen).toHaveLength(1);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ message: "Agent stream was interrupted" });
  });

  it("ends quietly when closed during a read", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<FetchFn>().mockImplementation(async (_input, init) => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            init?.signal?.addEventListener("abort", () =>
              controller.error(new DOMException("aborted", "AbortError")),
            );
          },
        });
        return new Response(body);
      }),
    );

    const stream = await transport().open(request);
    const iterator = stream[Symbol.asyncIterator]();
    const pending = iterator.next();
    await stream.close();

    await expect(pending).resolves.toEqual({ done: true, value: undefined });
  });
});
