import type { CoreError, ErrorKind } from "../core/types.js";

export interface FieldError {
  path: string;
  message: string;
}

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  requestId?: string;
  errors?: FieldError[];
}

export type ProblemCode =
  | "INVALID_ARGUMENT"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "NOT_FOUND"
  | "METHOD_NOT_ALLOWED"
  | "CONFLICT"
  | "STORAGE_FAILURE"
  | "INTERNAL";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function problem(params: {
  status: number;
  code: ProblemCode;
  detail?: string;
  instance?: string;
  errors?: FieldError[];
  requestId?: string;
}): Problem {
  const type = `https://errors.termindex.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  return {
    type,
    title: codeToTitle(params.code),
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

const KIND_TO_PROBLEM: Record<ErrorKind, { status: number; code: ProblemCode }> = {
  rejected_input: { status: 400, code: "INVALID_ARGUMENT" },
  not_found: { status: 404, code: "NOT_FOUND" },
  conflict: { status: 409, code: "CONFLICT" },
  persistence_failure: { status: 500, code: "STORAGE_FAILURE" },
};

/** Maps a core failure onto its HTTP problem document. */
export function problemFromError(error: CoreError, instance: string, requestId: string): Problem {
  const { status, code } = KIND_TO_PROBLEM[error.kind];
  return problem({ status, code, detail: error.message, instance, requestId });
}

function codeToTitle(code: ProblemCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "UNSUPPORTED_MEDIA_TYPE":
      return "Unsupported media type";
    case "NOT_FOUND":
      return "Not found";
    case "METHOD_NOT_ALLOWED":
      return "Method not allowed";
    case "CONFLICT":
      return "Conflict";
    case "STORAGE_FAILURE":
      return "Storage failure";
    default:
      return "Internal error";
  }
}
