import fetch, { type Response } from "node-fetch";
import {
  UnreachableError,
  UpstreamError,
  getErrorMessage,
} from "../errors.js";
import type { NodeClientContext } from "./node-client-types.js";

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface RequestOptions {
  body?: unknown;
  /** Aborts the call early; the client timeout still applies */
  signal?: AbortSignal;
}

/**
 * Issue a single call to the agent. Transport failures and timeouts become
 * UnreachableError; the status code is not inspected here.
 */
export async function send(
  ctx: NodeClientContext,
  method: HttpMethod,
  path: string,
  { body, signal }: RequestOptions = {},
): Promise<Response> {
  const headers: Record<string, string> = { Accept: "application/json" };
  let payload: string | undefined;
  if (body !== undefined) {
    headers["Content-Type"] = "application/json";
    payload = JSON.stringify(body);
  }

  try {
    return await fetch(`${ctx.address}${path}`, {
      method,
      headers,
      body: payload,
      signal: signal
        ? AbortSignal.any([signal, AbortSignal.timeout(ctx.timeoutMs)])
        : AbortSignal.timeout(ctx.timeoutMs),
    });
  } catch (error) {
    throw new UnreachableError(ctx.name, getErrorMessage(error));
  }
}

/**
 * Read a response body as text; a body cut short by the timeout counts as
 * a transport failure
 */
export async function readText(
  ctx: NodeClientContext,
  response: Response,
): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new UnreachableError(ctx.name, getErrorMessage(error));
  }
}

/**
 * Like send, but any status >= 400 is raised as UpstreamError carrying the
 * response body
 */
export async function request(
  ctx: NodeClientContext,
  method: HttpMethod,
  path: string,
  options: RequestOptions = {},
): Promise<Response> {
  const response = await send(ctx, method, path, options);
  if (response.status >= 400) {
    throw new UpstreamError(
      ctx.name,
      response.status,
      await readText(ctx, response),
    );
  }
  return response;
}

/**
 * Request a JSON document and check its shape before handing it out
 */
export async function requestJson<T>(
  ctx: NodeClientContext,
  method: HttpMethod,
  path: string,
  guard: (value: unknown) => value is T,
  body?: unknown,
): Promise<T> {
  const response = await request(ctx, method, path, { body });
  const text = await readText(ctx, response);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new UpstreamError(
      ctx.name,
      response.status,
      `invalid JSON from ${method} ${path}: ${getErrorMessage(error)}`,
    );
  }

  if (!guard(parsed)) {
    throw new UpstreamError(
      ctx.name,
      response.status,
      `unexpected response shape from ${method} ${path}`,
    );
  }
  return parsed;
}
