import { vi } from "vitest";
import type { Mock } from "vitest";
import type { SleepFn } from "@potkeeper/mover";
import type { CredentialProvider, FetchFn } from "../src/types.js";

export interface MockReply {
  readonly status?: number;
  readonly body?: unknown;
  readonly error?: Error;
}

/** Fetch stub answering from a fixed list of replies, in order. */
export function mockFetch(replies: readonly MockReply[]): Mock<FetchFn> {
  let call = 0;
  return vi.fn<FetchFn>(async () => {
    const reply = replies[call];
    call++;
    if (reply === undefined) {
      throw new Error(`Mock fetch called more times than expected (call ${call})`);
    }
    if (reply.error !== undefined) {
      throw reply.error;
    }
    const text =
      reply.body === undefined ? "" : typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status ?? 200 });
  });
}

export interface RecordedRequest {
  readonly url: string;
  readonly method: string | undefined;
  readonly headers: Headers;
  readonly body: string | undefined;
}

export function requestAt(fetchFn: Mock<FetchFn>, index: number): RecordedRequest {
  const call = fetchFn.mock.calls[index];
  if (call === undefined) {
    throw new Error(`fetch was not called ${index + 1} times`);
  }
  const [url, init] = call;
  return {
    url,
    method: init.method,
    headers: new Headers(init.headers),
    body: typeof init.body === "string" ? init.body : undefined,
  };
}

export function jsonBody(request: RecordedRequest): unknown {
  return request.body === undefined ? undefined : JSON.parse(request.body);
}

export function noSleep(): Mock<SleepFn> {
  return vi.fn<SleepFn>().mockResolvedValue(undefined);
}

export function staticCredentials(token = "test-secret"): CredentialProvider & {
  accessToken: Mock<CredentialProvider["accessToken"]>;
} {
  return { accessToken: vi.fn<CredentialProvider["accessToken"]>().mockResolvedValue(token) };
}

export async function catchError(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (err: unknown) {
    return err;
  }
  throw new Error("expected the call to fail");
}
