import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { firstValueFrom, lastValueFrom, VirtualTimeScheduler } from "rxjs";
import { RequestDispatcher } from "./dispatcher.js";
import { defineRequest } from "./request.js";
import { RequestDescriptor } from "./descriptor.js";
import { jsonDecoder, type Decoder } from "./decoder.js";
import {
  BackendError,
  ConfigurationError,
  NetworkError,
  StatusCodeError,
  TransportError,
  isBackendError,
  isTransportError,
} from "./errors.js";
import { FileExtension } from "./multipart.js";
import type { Logger } from "./logger.js";
import type {
  ExecuteRequest,
  HttpTransport,
  TransportResponse,
  UploadRequest,
} from "./types.js";

// ============================================================================
// Test Helpers
// ============================================================================

function jsonResponse(status: number, body: unknown, statusText = ""): TransportResponse<null> {
  return {
    status,
    statusText,
    headers: { "content-type": "application/json" },
    body: new TextEncoder().encode(JSON.stringify(body)),
    raw: null,
  };
}

function textResponse(status: number, body: string, statusText = ""): TransportResponse<null> {
  return {
    status,
    statusText,
    headers: { "content-type": "text/html" },
    body: new TextEncoder().encode(body),
    raw: null,
  };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

class StubTransport implements HttpTransport<null> {
  readonly executed: ExecuteRequest[] = [];
  readonly uploads: Array<{ request: UploadRequest; form: FormData }> = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(private readonly respond: () => Promise<TransportResponse<null>>) {}

  async execute(request: ExecuteRequest, signal?: AbortSignal): Promise<TransportResponse<null>> {
    this.executed.push(request);
    this.signals.push(signal);
    return this.respond();
  }

  async upload(request: UploadRequest, signal?: AbortSignal): Promise<TransportResponse<null>> {
    const form = new FormData();
    request.build(form);
    this.uploads.push({ request, form });
    this.signals.push(signal);
    return this.respond();
  }
}

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

const login = () =>
  defineRequest({
    host: "https://api.example.com",
    endpoint: "/login",
    method: "POST",
    body: { user: "a", pass: "b" },
    response: z.object({ token: z.string() }),
    backendError: z.object({ code: z.string() }),
  });

const brokenDecoder: Decoder<never> = {
  decode() {
    throw new Error("boom");
  },
};

const brokenLogin = () => ({
  networkRequest: new RequestDescriptor({ host: "https://api.example.com", endpoint: "/login" }),
  response: brokenDecoder,
  backendError: jsonDecoder(z.object({ code: z.string() })),
});

// ============================================================================
// send
// ============================================================================

describe("RequestDispatcher", () => {
  describe("send", () => {
    it("resolves with the decoded success value", async () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({ transport });

      await expect(dispatcher.send(login())).resolves.toEqual({ token: "abc" });
    });

    it("rejects with the decoded backend error", async () => {
      const transport = new StubTransport(async () => jsonResponse(401, { code: "bad_credentials" }));
      const dispatcher = new RequestDispatcher({ transport });

      const error = await dispatcher.send(login()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendError);
      expect(isBackendError(error)).toBe(true);
      if (isBackendError(error)) {
        expect(error.payload).toEqual({ code: "bad_credentials" });
        expect(error.status).toBe(401);
        expect(error._tag).toBe("BackendError");
      }
    });

    it("sends the body parameters form-encoded", async () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({ transport });

      await dispatcher.send(login());

      expect(transport.executed).toEqual([
        {
          url: "https://api.example.com/login",
          method: "POST",
          parameters: { user: "a", pass: "b" },
          encoding: "httpBody",
          headers: {},
          timeout: undefined,
        },
      ]);
    });

    it("rejects with a TransportError keeping the status failure when the body is not the error shape", async () => {
      const transport = new StubTransport(async () =>
        textResponse(502, "<h1>Bad Gateway</h1>", "Bad Gateway"),
      );
      const dispatcher = new RequestDispatcher({ transport });

      const error = await dispatcher.send(login()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (isTransportError(error)) {
        expect(error.cause).toBeInstanceOf(StatusCodeError);
        expect(error.status).toBe(502);
        expect(error.message).toBe("Response status code was unacceptable: 502 Bad Gateway");
      }
    });

    it("rejects with a TransportError wrapping the transport's own failure", async () => {
      const failure = new NetworkError("https://api.example.com/login", "POST", new Error("ECONNREFUSED"));
      const transport = new StubTransport(() => Promise.reject(failure));
      const dispatcher = new RequestDispatcher({ transport });

      const error = await dispatcher.send(login()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (isTransportError(error)) {
        expect(error.cause).toBe(failure);
        expect(error.status).toBeUndefined();
      }
    });

    it("wraps non-Error rejections", async () => {
      const transport = new StubTransport(() => Promise.reject("socket closed"));
      const dispatcher = new RequestDispatcher({ transport });

      const error = await dispatcher.send(login()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (isTransportError(error)) {
        expect(error.message).toBe("Non-error value thrown: socket closed");
      }
    });

    it("rejects with a TransportError when a 2xx body does not decode", async () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: 42 }));
      const dispatcher = new RequestDispatcher({ transport });

      const error = await dispatcher.send(login()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (isTransportError(error)) {
        expect(error.message).toBe("Response body does not match the declared shape");
      }
    });

    it("rejects with a TransportError when the success decoder throws", async () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({ transport });

      const error = await dispatcher.send(brokenLogin()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (isTransportError(error)) {
        expect(error.message).toBe("boom");
        expect(error.status).toBe(200);
      }
    });

    it("does not track the call in the registry", async () => {
      const gate = deferred<TransportResponse<null>>();
      const transport = new StubTransport(() => gate.promise);
      const dispatcher = new RequestDispatcher({ transport });

      const pending = dispatcher.send(login());
      expect(dispatcher.pendingCount).toBe(0);

      gate.resolve(jsonResponse(200, { token: "abc" }));
      await expect(pending).resolves.toEqual({ token: "abc" });
    });

    it("works with hand-written ApiRequest implementations", async () => {
      class ProfileRequest {
        readonly networkRequest = new RequestDescriptor({
          host: "https://api.example.com",
          endpoint: "/me",
          query: { fields: ["name", "email"] },
        });
        readonly response = jsonDecoder(z.object({ name: z.string() }));
        readonly backendError = jsonDecoder(z.object({ message: z.string() }));
      }
      const transport = new StubTransport(async () => jsonResponse(200, { name: "Ada" }));
      const dispatcher = new RequestDispatcher({ transport });

      await expect(dispatcher.send(new ProfileRequest())).resolves.toEqual({ name: "Ada" });
      expect(transport.executed[0]?.encoding).toBe("queryString");
      expect(transport.executed[0]?.parameters).toEqual({ fields: ["name", "email"] });
    });
  });

  // ==========================================================================
  // Request assembly
  // ==========================================================================

  describe("request assembly", () => {
    it("layers request headers over the dispatcher's default headers", async () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({
        transport,
        headers: { Accept: "application/json", "X-Client": "default" },
        timeout: 2500,
      });
      const request = login();
      request.networkRequest.mergeHeaders({ "X-Client": "login-screen" });

      await dispatcher.send(request);

      expect(transport.executed[0]?.headers).toEqual({
        Accept: "application/json",
        "X-Client": "login-screen",
      });
      expect(transport.executed[0]?.timeout).toBe(2500);
    });

    it("snapshots the descriptor when the call is issued", async () => {
      const gate = deferred<TransportResponse<null>>();
      const transport = new StubTransport(() => gate.promise);
      const dispatcher = new RequestDispatcher({ transport });
      const request = login();

      const pending = dispatcher.send(request);
      request.networkRequest.mergeBody({ user: "changed" });
      gate.resolve(jsonResponse(200, { token: "abc" }));
      await pending;

      expect(transport.executed[0]?.parameters).toEqual({ user: "a", pass: "b" });
    });

    it("rejects invalid options at construction", () => {
      const transport = new StubTransport(async () => jsonResponse(200, {}));
      expect(() => new RequestDispatcher({ transport, timeout: -1 })).toThrow(ConfigurationError);
    });
  });

  // ==========================================================================
  // outcome
  // ==========================================================================

  describe("outcome", () => {
    it("resolves with the classified outcome instead of rejecting", async () => {
      const transport = new StubTransport(async () => jsonResponse(401, { code: "bad_credentials" }));
      const dispatcher = new RequestDispatcher({ transport });

      const outcome = await dispatcher.outcome(login());

      expect(outcome._tag).toBe("BackendFailure");
      if (outcome._tag === "BackendFailure") {
        expect(outcome.error.payload).toEqual({ code: "bad_credentials" });
      }
    });
  });

  // ==========================================================================
  // subscribe
  // ==========================================================================

  describe("subscribe", () => {
    it("calls onSuccess exactly once", async () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({ transport });
      const onSuccess = vi.fn();
      const onError = vi.fn();

      dispatcher.subscribe(login(), onSuccess, onError);
      await flush();

      expect(onSuccess).toHaveBeenCalledTimes(1);
      expect(onSuccess).toHaveBeenCalledWith({ token: "abc" });
      expect(onError).not.toHaveBeenCalled();
    });

    it("calls onError exactly once with the classified error", async () => {
      const transport = new StubTransport(async () => jsonResponse(401, { code: "bad_credentials" }));
      const dispatcher = new RequestDispatcher({ transport });
      const onSuccess = vi.fn();
      const onError = vi.fn();

      dispatcher.subscribe(login(), onSuccess, onError);
      await flush();

      expect(onSuccess).not.toHaveBeenCalled();
      expect(onError).toHaveBeenCalledTimes(1);
      const [error] = onError.mock.calls[0] ?? [];
      expect(error).toBeInstanceOf(BackendError);
    });

    it("tracks the call until it completes", async () => {
      const gate = deferred<TransportResponse<null>>();
      const transport = new StubTransport(() => gate.promise);
      const dispatcher = new RequestDispatcher({ transport });

      dispatcher.subscribe(login(), vi.fn(), vi.fn());
      dispatcher.subscribe(login(), vi.fn(), vi.fn());
      expect(dispatcher.pendingCount).toBe(2);

      gate.resolve(jsonResponse(200, { token: "abc" }));
      await flush();

      expect(dispatcher.pendingCount).toBe(0);
    });

    it("delivers nothing after cancelAll, even when the response arrives later", async () => {
      const gate = deferred<TransportResponse<null>>();
      const transport = new StubTransport(() => gate.promise);
      const logger = createLogger();
      const dispatcher = new RequestDispatcher({ transport, logger });
      const onSuccess = vi.fn();
      const onError = vi.fn();

      dispatcher.subscribe(login(), onSuccess, onError);
      dispatcher.subscribe(login(), onSuccess, onError);

      expect(dispatcher.cancelAll()).toBe(2);
      expect(dispatcher.pendingCount).toBe(0);

      gate.resolve(jsonResponse(200, { token: "abc" }));
      await flush();

      expect(onSuccess).not.toHaveBeenCalled();
      expect(onError).not.toHaveBeenCalled();
      expect(transport.signals.map((signal) => signal?.aborted)).toEqual([true, true]);
      expect(logger.debug).toHaveBeenCalledWith("Cancelled pending requests", { count: 2 });
    });

    it("does not affect calls issued after cancelAll", async () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({ transport });
      dispatcher.cancelAll();
      const onSuccess = vi.fn();

      dispatcher.subscribe(login(), onSuccess, vi.fn());
      await flush();

      expect(onSuccess).toHaveBeenCalledTimes(1);
    });

    it("cancels a single call through its subscription", async () => {
      const gate = deferred<TransportResponse<null>>();
      const transport = new StubTransport(() => gate.promise);
      const dispatcher = new RequestDispatcher({ transport });
      const cancelled = vi.fn();
      const kept = vi.fn();

      const subscription = dispatcher.subscribe(login(), cancelled, vi.fn());
      dispatcher.subscribe(login(), kept, vi.fn());
      subscription.unsubscribe();

      expect(dispatcher.pendingCount).toBe(1);

      gate.resolve(jsonResponse(200, { token: "abc" }));
      await flush();

      expect(cancelled).not.toHaveBeenCalled();
      expect(kept).toHaveBeenCalledTimes(1);
    });

    it("calls onError once with a TransportError when the success decoder throws", async () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({ transport });
      const onSuccess = vi.fn();
      const onError = vi.fn();

      dispatcher.subscribe(brokenLogin(), onSuccess, onError);
      await flush();

      expect(onSuccess).not.toHaveBeenCalled();
      expect(onError).toHaveBeenCalledTimes(1);
      const [error] = onError.mock.calls[0] ?? [];
      expect(error).toBeInstanceOf(TransportError);
      expect(isTransportError(error) && error.cause.message).toBe("boom");
      expect(dispatcher.pendingCount).toBe(0);
    });

    it("delivers outcomes on the configured scheduler", async () => {
      const scheduler = new VirtualTimeScheduler();
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({ transport, scheduler });
      const onSuccess = vi.fn();

      dispatcher.subscribe(login(), onSuccess, vi.fn());
      await flush();

      expect(onSuccess).not.toHaveBeenCalled();
      expect(dispatcher.pendingCount).toBe(1);

      scheduler.flush();

      expect(onSuccess).toHaveBeenCalledTimes(1);
      expect(onSuccess).toHaveBeenCalledWith({ token: "abc" });
      expect(dispatcher.pendingCount).toBe(0);
    });
  });

  // ==========================================================================
  // observe
  // ==========================================================================

  describe("observe", () => {
    it("is lazy", () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({ transport });

      dispatcher.observe(login());

      expect(transport.executed).toHaveLength(0);
    });

    it("emits one value then completes", async () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({ transport });
      const values: unknown[] = [];

      await new Promise<void>((resolve, reject) => {
        dispatcher.observe(login()).subscribe({
          next: (value) => values.push(value),
          error: reject,
          complete: resolve,
        });
      });

      expect(values).toEqual([{ token: "abc" }]);
    });

    it("errors with the classified error", async () => {
      const transport = new StubTransport(async () => jsonResponse(401, { code: "bad_credentials" }));
      const dispatcher = new RequestDispatcher({ transport });

      await expect(lastValueFrom(dispatcher.observe(login()))).rejects.toBeInstanceOf(BackendError);
    });

    it("issues a fresh call for every subscription", async () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({ transport });
      const token$ = dispatcher.observe(login());

      await firstValueFrom(token$);
      await firstValueFrom(token$);

      expect(transport.executed).toHaveLength(2);
    });

    it("stops delivery and aborts when unsubscribed", async () => {
      const gate = deferred<TransportResponse<null>>();
      const transport = new StubTransport(() => gate.promise);
      const dispatcher = new RequestDispatcher({ transport });
      const next = vi.fn();

      const subscription = dispatcher.observe(login()).subscribe({ next });
      subscription.unsubscribe();
      gate.resolve(jsonResponse(200, { token: "abc" }));
      await flush();

      expect(next).not.toHaveBeenCalled();
      expect(transport.signals[0]?.aborted).toBe(true);
      expect(dispatcher.pendingCount).toBe(0);
    });

    it("tracks each subscription until it completes", async () => {
      const gate = deferred<TransportResponse<null>>();
      const transport = new StubTransport(() => gate.promise);
      const dispatcher = new RequestDispatcher({ transport });

      dispatcher.observe(login()).subscribe({ next: vi.fn() });
      dispatcher.observe(login()).subscribe({ next: vi.fn() });
      expect(dispatcher.pendingCount).toBe(2);

      gate.resolve(jsonResponse(200, { token: "abc" }));
      await flush();

      expect(dispatcher.pendingCount).toBe(0);
    });

    it("delivers nothing to observers after cancelAll", async () => {
      const gate = deferred<TransportResponse<null>>();
      const transport = new StubTransport(() => gate.promise);
      const dispatcher = new RequestDispatcher({ transport });
      const next = vi.fn();
      const error = vi.fn();
      const complete = vi.fn();

      dispatcher.observe(login()).subscribe({ next, error, complete });

      expect(dispatcher.cancelAll()).toBe(1);
      expect(dispatcher.pendingCount).toBe(0);

      gate.resolve(jsonResponse(200, { token: "abc" }));
      await flush();

      expect(next).not.toHaveBeenCalled();
      expect(error).not.toHaveBeenCalled();
      expect(complete).not.toHaveBeenCalled();
      expect(transport.signals[0]?.aborted).toBe(true);
    });

    it("errors with a TransportError when the success decoder throws", async () => {
      const transport = new StubTransport(async () => jsonResponse(200, { token: "abc" }));
      const dispatcher = new RequestDispatcher({ transport });

      await expect(lastValueFrom(dispatcher.observe(brokenLogin()))).rejects.toBeInstanceOf(
        TransportError,
      );
    });
  });

  // ==========================================================================
  // multipart
  // ==========================================================================

  describe("multipart", () => {
    const upload = () =>
      defineRequest({
        host: "https://api.example.com",
        endpoint: "/photos",
        method: "POST",
        query: { tags: ["x", "y"], album: "summer" },
        response: z.object({ id: z.string() }),
        backendError: z.object({ code: z.string() }),
      });

    const photo = {
      kind: "image",
      extension: FileExtension.jpg,
      data: new Uint8Array([255, 216, 255]),
    } as const;

    it("uploads files and parameters as multipart form data", async () => {
      const transport = new StubTransport(async () => jsonResponse(201, { id: "p1" }));
      const dispatcher = new RequestDispatcher({ transport, headers: { Accept: "application/json" } });

      await expect(dispatcher.send(upload(), { multipart: { photo } })).resolves.toEqual({ id: "p1" });

      expect(transport.executed).toHaveLength(0);
      expect(transport.uploads).toHaveLength(1);
      const sent = transport.uploads[0];
      expect(sent?.request.url).toBe("https://api.example.com/photos");
      expect(sent?.request.method).toBe("POST");
      expect(sent?.request.headers).toEqual({ Accept: "application/json" });
      expect(sent?.form.getAll("tags[]")).toEqual(["x", "y"]);
      expect(sent?.form.get("album")).toBe("summer");
      expect(sent?.form.has("photo")).toBe(true);
    });

    it("classifies multipart failures like plain ones", async () => {
      const transport = new StubTransport(async () => jsonResponse(413, { code: "too_large" }));
      const dispatcher = new RequestDispatcher({ transport });
      const onError = vi.fn();

      dispatcher.subscribe(upload(), vi.fn(), onError, { multipart: { photo } });
      await flush();

      expect(onError).toHaveBeenCalledTimes(1);
      const [error] = onError.mock.calls[0] ?? [];
      expect(isBackendError(error) && error.payload).toEqual({ code: "too_large" });
    });

    it("supports the observable form", async () => {
      const transport = new StubTransport(async () => jsonResponse(201, { id: "p2" }));
      const dispatcher = new RequestDispatcher({ transport });

      await expect(
        firstValueFrom(dispatcher.observe(upload(), { multipart: { photo } })),
      ).resolves.toEqual({ id: "p2" });
    });
  });

  // ==========================================================================
  // logging
  // ==========================================================================

  describe("logging", () => {
    it("notes when telemetry is enabled before the OpenTelemetry API is loaded", () => {
      const transport = new StubTransport(async () => jsonResponse(200, {}));
      const logger = createLogger();

      new RequestDispatcher({ transport, logger, telemetry: true });

      expect(logger.debug).toHaveBeenCalledTimes(1);
      expect(logger.debug).toHaveBeenCalledWith(
        "Telemetry enabled but @opentelemetry/api is not loaded yet",
        { serviceName: "typed-request", hint: "await initTelemetry() before issuing requests" },
      );
    });

    it("says nothing about telemetry when it is disabled", () => {
      const transport = new StubTransport(async () => jsonResponse(200, {}));
      const logger = createLogger();

      new RequestDispatcher({ transport, logger });

      expect(logger.debug).not.toHaveBeenCalled();
    });

    it("logs transport failures as warnings", async () => {
      const transport = new StubTransport(async () =>
        textResponse(500, "oops", "Internal Server Error"),
      );
      const logger = createLogger();
      const dispatcher = new RequestDispatcher({ transport, logger });

      await dispatcher.send(login()).catch(() => undefined);

      expect(logger.warn).toHaveBeenCalledWith("Request failed", {
        method: "POST",
        url: "https://api.example.com/login",
        status: 500,
        error: "Response status code was unacceptable: 500 Internal Server Error",
      });
    });

    it("logs backend errors at info level", async () => {
      const transport = new StubTransport(async () => jsonResponse(401, { code: "bad_credentials" }));
      const logger = createLogger();
      const dispatcher = new RequestDispatcher({ transport, logger });

      await dispatcher.send(login()).catch(() => undefined);

      expect(logger.info).toHaveBeenCalledWith("Backend returned an error payload", {
        method: "POST",
        url: "https://api.example.com/login",
        status: 401,
      });
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("logs cancelled calls at debug level, not as failures", async () => {
      const transport = new StubTransport(
        () =>
          new Promise((_, reject) => {
            setTimeout(() => reject(new Error("aborted")), 0);
          }),
      );
      const logger = createLogger();
      const dispatcher = new RequestDispatcher({ transport, logger });

      dispatcher.subscribe(login(), vi.fn(), vi.fn());
      dispatcher.cancelAll();
      await flush();
      await flush();

      expect(logger.debug).toHaveBeenCalledWith("Request cancelled", {
        method: "POST",
        url: "https://api.example.com/login",
      });
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });
});
