/** Error categories reported to the client. */
export type ErrorCategory =
  | "unavailable"
  | "not_found"
  | "validation"
  | "timeout"
  | "state";

/** Base fields present in every response. */
export interface ResponseBase {
  status: "success" | "error";
  tool: string;
  duration_ms: number;
  command_executed: string | null;
}

/** Successful response with tool-specific data. */
export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  total?: number;
  summary?: string;
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  remediation: string[];
  exit_code?: number;
}

export type ToolResponse = SuccessResponse | ErrorResponse;
