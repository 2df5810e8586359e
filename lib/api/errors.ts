import { NextResponse } from "next/server";
import { v4 as uuid } from "uuid";

import { createOpsLogger } from "@/lib/ops/eventLog";

type ApiErrorInput = {
  status?: number;
  code: string;
  userMessage: string;
  requestId?: string;
  route: string;
  details?: unknown;
  cause?: unknown;
};

const log = createOpsLogger("api");

function toErrorMessage(cause: unknown) {
  if (!cause) return "";
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function makeRequestId() {
  return uuid();
}

/** JSON error body `{ error, code, requestId }` plus an x-request-id header. */
export function apiError(input: ApiErrorInput) {
  const status = input.status ?? 500;
  const requestId = input.requestId || makeRequestId();

  const entry = {
    route: input.route,
    requestId,
    code: input.code,
    status,
    userMessage: input.userMessage,
    details: input.details ?? null,
    cause: toErrorMessage(input.cause),
  };
  if (status >= 500) log.error("request failed", entry);
  else log.warn("request rejected", entry);

  const body: Record<string, unknown> = {
    error: input.userMessage,
    code: input.code,
    requestId,
  };
  if (process.env.NODE_ENV !== "production" && input.details !== undefined) {
    body.details = input.details;
  }

  return NextResponse.json(body, {
    status,
    headers: { "x-request-id": requestId },
  });
}

export function apiOk<T>(payload: T, requestId: string, status = 200) {
  return NextResponse.json(payload, { status, headers: { "x-request-id": requestId } });
}
