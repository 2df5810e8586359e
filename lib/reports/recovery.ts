import { createOpsLogger } from "@/lib/ops/eventLog";

export type ExtractionIssueCode = "NO_MATCH" | "AMBIGUOUS_BOUNDARY" | "TYPE_COERCION" | "INTERNAL";

export type ExtractionIssue = {
  code: ExtractionIssueCode;
  scope: string;
  message: string;
};

export type IssueSink = ExtractionIssue[];

const log = createOpsLogger("reports");

function toErrorMessage(cause: unknown) {
  if (!cause) return "";
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function noteIssue(sink: IssueSink | undefined, code: ExtractionIssueCode, scope: string, message: string) {
  if (!sink) return;
  sink.push({ code, scope, message });
}

/**
 * Run one extraction stage. A throw becomes the fallback value plus an
 * INTERNAL issue and an error log line; callers never see the exception.
 */
export function recover<T>(scope: string, fallback: T, run: () => T, sink?: IssueSink): T {
  try {
    return run();
  } catch (cause) {
    log.error("extraction stage failed", {
      stage: scope,
      cause: toErrorMessage(cause),
      stack: cause instanceof Error ? cause.stack : undefined,
    });
    noteIssue(sink, "INTERNAL", scope, toErrorMessage(cause) || "unknown failure");
    return fallback;
  }
}
